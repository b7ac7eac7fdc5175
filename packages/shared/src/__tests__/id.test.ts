import { describe, it, expect } from 'vitest';
import { SnowflakeGenerator, createIdGenerator } from '../id';

const EPOCH_MS = Date.UTC(2026, 0, 1);

describe('SnowflakeGenerator', () => {
  it('generates unique IDs', () => {
    const gen = new SnowflakeGenerator(1);
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(gen.generate());
    }
    expect(ids.size).toBe(1000);
  });

  it('generates monotonically increasing IDs', () => {
    const gen = new SnowflakeGenerator(0);
    let prev = BigInt(gen.generate());
    for (let i = 0; i < 100; i++) {
      const current = BigInt(gen.generate());
      expect(current).toBeGreaterThan(prev);
      prev = current;
    }
  });

  it('packs timestamp, node and sequence', () => {
    const gen = new SnowflakeGenerator(3, () => EPOCH_MS + 5);
    expect(gen.generate()).toBe('20983808');
    expect(gen.generate()).toBe('20983809');
  });

  it('moves to the next millisecond once the counter is spent', () => {
    let reads = 0;
    const gen = new SnowflakeGenerator(3, () => (++reads <= 4097 ? EPOCH_MS + 5 : EPOCH_MS + 6));
    const ids: string[] = [];
    for (let i = 0; i < 4097; i++) ids.push(gen.generate());

    expect(ids[4095]).toBe(String(20983808 + 4095));
    expect(ids[4096]).toBe('25178112');
    expect(SnowflakeGenerator.parse(ids[4096])).toMatchObject({ nodeId: 3, sequence: 0 });
  });

  it('parses an ID back to components', () => {
    const gen = new SnowflakeGenerator(42);
    const parsed = SnowflakeGenerator.parse(gen.generate());

    expect(parsed.nodeId).toBe(42);
    expect(parsed.sequence).toBe(0);
    expect(parsed.timestamp.getTime()).toBeGreaterThan(Date.now() - 5000);
    expect(parsed.timestamp.getTime()).toBeLessThanOrEqual(Date.now());
  });

  it('refuses to generate when the clock moves backwards', () => {
    let now = EPOCH_MS + 100;
    const gen = new SnowflakeGenerator(0, () => now);
    gen.generate();
    now -= 10;
    expect(() => gen.generate()).toThrow('Clock moved backwards');
  });

  it('rejects invalid nodeId', () => {
    expect(() => new SnowflakeGenerator(-1)).toThrow();
    expect(() => new SnowflakeGenerator(1024)).toThrow();
    expect(() => new SnowflakeGenerator(1.5)).toThrow(RangeError);
  });

  it('accepts boundary nodeId values', () => {
    expect(() => new SnowflakeGenerator(0)).not.toThrow();
    expect(() => new SnowflakeGenerator(1023)).not.toThrow();
  });
});

describe('createIdGenerator', () => {
  it('returns decimal strings that fit a BIGINT', () => {
    const generateId = createIdGenerator(7);
    const id = generateId();
    expect(id).toMatch(/^\d+$/);
    expect(BigInt(id)).toBeLessThan(2n ** 63n);
    expect(SnowflakeGenerator.parse(id).nodeId).toBe(7);
  });
});

/** Milliseconds since the Unix epoch at 2026-01-01T00:00:00Z. */
const EPOCH_MS = 1767225600000n;

// 41 bits of time | 10 bits of node | 12 bits of per-millisecond counter
const COUNTER_WIDTH = 12n;
const NODE_WIDTH = 10n;
const NODE_OFFSET = COUNTER_WIDTH;
const TIME_OFFSET = COUNTER_WIDTH + NODE_WIDTH;
const COUNTER_MASK = (1n << COUNTER_WIDTH) - 1n;
const NODE_MASK = (1n << NODE_WIDTH) - 1n;

export interface SnowflakeParts {
  timestamp: Date;
  nodeId: number;
  sequence: number;
}

/**
 * Time-ordered 63-bit ids rendered as decimal strings, so they fit a
 * Postgres BIGINT and sort by creation time within one node.
 */
export class SnowflakeGenerator {
  private readonly node: bigint;
  private counter = 0n;
  private lastTick = -1n;

  constructor(
    nodeId: number,
    private readonly clock: () => number = Date.now,
  ) {
    if (!Number.isInteger(nodeId) || nodeId < 0 || BigInt(nodeId) > NODE_MASK) {
      throw new RangeError(`Snowflake node id ${nodeId} is outside 0..${NODE_MASK}`);
    }
    this.node = BigInt(nodeId);
  }

  generate(): string {
    let tick = this.tick();
    if (tick < this.lastTick) {
      throw new Error(`Clock moved backwards by ${this.lastTick - tick}ms; not issuing ids`);
    }

    if (tick > this.lastTick) {
      this.counter = 0n;
    } else {
      this.counter = (this.counter + 1n) & COUNTER_MASK;
      // Counter wrapped: this millisecond is spent.
      if (this.counter === 0n) tick = this.nextTickAfter(this.lastTick);
    }
    this.lastTick = tick;

    return ((tick << TIME_OFFSET) | (this.node << NODE_OFFSET) | this.counter).toString();
  }

  static parse(id: string): SnowflakeParts {
    const raw = BigInt(id);
    return {
      timestamp: new Date(Number((raw >> TIME_OFFSET) + EPOCH_MS)),
      nodeId: Number((raw >> NODE_OFFSET) & NODE_MASK),
      sequence: Number(raw & COUNTER_MASK),
    };
  }

  private tick(): bigint {
    return BigInt(this.clock()) - EPOCH_MS;
  }

  private nextTickAfter(previous: bigint): bigint {
    let tick = this.tick();
    while (tick <= previous) tick = this.tick();
    return tick;
  }
}

/** Binds a generator to the `() => string` shape the services take. */
export function createIdGenerator(nodeId: number): () => string {
  const generator = new SnowflakeGenerator(nodeId);
  return () => generator.generate();
}

import { describe, it, expect, vi } from 'vitest';
import { createTransactionRunner, type Queryable } from '../client';
import { createFakeClient, createMockLogger, pgError, type RecordedQuery } from './helpers';

function setup(maxRetries = 3) {
  const clients: Array<ReturnType<typeof createFakeClient>> = [];
  const connect = vi.fn(async () => {
    const fake = createFakeClient();
    clients.push(fake);
    return fake.client;
  });
  const logger = createMockLogger();
  const run = createTransactionRunner(connect, { maxRetries, logger });
  const statements = (index: number): string[] => clients[index].calls.map((call: RecordedQuery) => call.text);
  return { run, connect, clients, logger, statements };
}

describe('createTransactionRunner', () => {
  it('commits and returns the callback result', async () => {
    const { run, clients, statements } = setup();
    const result = await run(async (tx) => {
      await tx.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(statements(0)).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(clients[0].release).toHaveBeenCalledOnce();
  });

  it('opens serializable transactions on request', async () => {
    const { run, statements } = setup();
    await run(async () => undefined, { isolation: 'serializable' });
    expect(statements(0)[0]).toBe('BEGIN ISOLATION LEVEL SERIALIZABLE');
  });

  it('rolls back and rethrows on failure', async () => {
    const { run, clients, statements } = setup();
    await expect(
      run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrowError('boom');

    expect(statements(0)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(clients[0].release).toHaveBeenCalledOnce();
  });

  it('retries serialization failures on a fresh connection', async () => {
    const { run, connect, logger, statements } = setup();
    const fn = vi
      .fn<(tx: Queryable) => Promise<string>>()
      .mockRejectedValueOnce(pgError('40001'))
      .mockResolvedValueOnce('ok');

    expect(await run(fn)).toBe('ok');
    expect(connect).toHaveBeenCalledTimes(2);
    expect(statements(0)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(statements(1)).toEqual(['BEGIN', 'COMMIT']);
    expect(logger.warn).toHaveBeenCalledWith({ attempt: 1, sqlState: '40001' }, 'Retrying transaction after conflict');
  });

  it('surfaces CONCURRENT_CONFLICT once retries are exhausted', async () => {
    const { run, logger } = setup(2);
    const fn = vi.fn<(tx: Queryable) => Promise<void>>().mockRejectedValue(pgError('40P01'));

    await expect(run(fn)).rejects.toMatchObject({
      kind: 'CONCURRENT_CONFLICT',
      category: 'ConcurrentConflict',
      details: { attempts: 3, sqlState: '40P01' },
    });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('does not retry other database errors', async () => {
    const { run, connect } = setup();
    const fn = vi.fn<(tx: Queryable) => Promise<void>>().mockRejectedValue(pgError('23505'));

    await expect(run(fn)).rejects.toMatchObject({ code: '23505' });
    expect(connect).toHaveBeenCalledOnce();
  });

  it('logs a failed rollback and still surfaces the original error', async () => {
    const fake = createFakeClient([{}, new Error('connection lost')]);
    const logger = createMockLogger();
    const run = createTransactionRunner(async () => fake.client, { maxRetries: 0, logger });

    await expect(
      run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrowError('boom');
    expect(logger.error).toHaveBeenCalledWith({ err: 'connection lost' }, 'Rollback failed');
    expect(fake.release).toHaveBeenCalledOnce();
  });
});

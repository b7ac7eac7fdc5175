import { Pool, type PoolConfig } from 'pg';
import { DomainError, type TransactionOptions, type TransactionRunner } from '@homestock/domain';
import { type SafeLogger } from '@homestock/shared';
import { type Row } from './rows';
import { pgErrorCode } from './pg-errors';

/** The slice of a pg client the repositories use; also the transaction handle. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
}

export interface TxClient extends Queryable {
  release(err?: Error | boolean): void;
}

export type Connect = () => Promise<TxClient>;

const RETRYABLE_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]);

export function createPool(config: PoolConfig, logger: SafeLogger): Pool {
  const pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ max: config.max }, 'Database pool initialized');
  return pool;
}

export function poolConnector(pool: Pool): Connect {
  return async () => {
    const client = await pool.connect();
    return {
      query: (text, values) => client.query(text, values),
      release: (err) => client.release(err),
    };
  };
}

function beginStatement(options?: TransactionOptions): string {
  return options?.isolation === 'serializable' ? 'BEGIN ISOLATION LEVEL SERIALIZABLE' : 'BEGIN';
}

/**
 * Runs `fn` in its own transaction on a dedicated connection. Serialization
 * failures and deadlocks restart the whole callback up to `maxRetries` times,
 * then surface as `CONCURRENT_CONFLICT`.
 */
export function createTransactionRunner(
  connect: Connect,
  opts: { maxRetries: number; logger: SafeLogger },
): TransactionRunner<Queryable> {
  const runOnce = async <T>(fn: (tx: Queryable) => Promise<T>, options?: TransactionOptions): Promise<T> => {
    const client = await connect();
    try {
      await client.query(beginStatement(options));
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        opts.logger.error(
          { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
          'Rollback failed',
        );
      });
      throw err;
    } finally {
      client.release();
    }
  };

  return async <T>(fn: (tx: Queryable) => Promise<T>, options?: TransactionOptions): Promise<T> => {
    for (let attempt = 0; ; attempt++) {
      try {
        return await runOnce(fn, options);
      } catch (err) {
        const code = pgErrorCode(err);
        if (code === undefined || !RETRYABLE_CODES.has(code)) throw err;
        if (attempt >= opts.maxRetries) {
          throw new DomainError(
            'CONCURRENT_CONFLICT',
            'Transaction kept conflicting with concurrent writers',
            { attempts: attempt + 1, sqlState: code },
            { cause: err },
          );
        }
        opts.logger.warn({ attempt: attempt + 1, sqlState: code }, 'Retrying transaction after conflict');
      }
    }
  };
}

import { vi, type Mock } from 'vitest';
import { type SafeLogger } from '@homestock/shared';
import { type Queryable, type TxClient } from '../client';
import { type Row } from '../rows';

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

export type FakeResponse = { rows?: Row[]; rowCount?: number } | Error;

/** Answers queries in order from `responses`; anything past the end gets an empty result. */
export function createFakeClient(responses: FakeResponse[] = []): {
  client: TxClient;
  calls: RecordedQuery[];
  release: Mock<TxClient['release']>;
} {
  const calls: RecordedQuery[] = [];
  const queue = [...responses];
  const release = vi.fn<TxClient['release']>();
  const client: TxClient = {
    query: async (text, values) => {
      calls.push(values === undefined ? { text } : { text, values });
      const next = queue.shift();
      if (next instanceof Error) throw next;
      const rows = next?.rows ?? [];
      return { rows, rowCount: next?.rowCount ?? rows.length };
    },
    release,
  };
  return { client, calls, release };
}

export function queryable(responses: FakeResponse[] = []): { tx: Queryable; calls: RecordedQuery[] } {
  const { client, calls } = createFakeClient(responses);
  return { tx: client, calls };
}

/** Collapses whitespace so assertions can match SQL on one line. */
export function sql(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, constraint });
}

export function createMockLogger(): SafeLogger {
  const logger: SafeLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
  };
  return logger;
}

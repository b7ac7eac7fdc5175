import {
  type Category,
  type EntityKind,
  type FamilyGroup,
  type Item,
  type ItemImage,
  type MarketListing,
  type Membership,
  type Message,
  type MessageAttachment,
  type MessageReaction,
  type ReferenceItem,
  type Thread,
  type TransactionRunner,
  type User,
} from '@homestock/domain';

export interface EntityRows {
  user: User;
  group: FamilyGroup;
  membership: Membership;
  category: Category;
  referenceItem: ReferenceItem;
  listing: MarketListing;
  item: Item;
  itemImage: ItemImage;
  thread: Thread;
  message: Message;
  reaction: MessageReaction;
  attachment: MessageAttachment;
}

export type MemoryTables = { [K in EntityKind]: Map<string, EntityRows[K]> };

export interface MemoryTx {
  tables: MemoryTables;
}

function emptyTables(): MemoryTables {
  return {
    user: new Map(),
    group: new Map(),
    membership: new Map(),
    category: new Map(),
    referenceItem: new Map(),
    listing: new Map(),
    item: new Map(),
    itemImage: new Map(),
    thread: new Map(),
    message: new Map(),
    reaction: new Map(),
    attachment: new Map(),
  };
}

const settle = (): void => undefined;

/**
 * Process-local stand-in for Postgres. Transactions run one at a time and a
 * failed transaction restores the tables as they were when it began.
 */
export class MemoryDatabase {
  private tables: MemoryTables = emptyTables();
  private queue: Promise<void> = Promise.resolve();
  private transactionCount = 0;

  readonly withTransaction: TransactionRunner<MemoryTx> = <T>(fn: (tx: MemoryTx) => Promise<T>): Promise<T> => {
    const result = this.queue.then(() => this.runIsolated(fn));
    // Callers observe failures through `result`; the queue only orders.
    this.queue = result.then(settle, settle);
    return result;
  };

  private async runIsolated<T>(fn: (tx: MemoryTx) => Promise<T>): Promise<T> {
    this.transactionCount++;
    const snapshot = structuredClone(this.tables);
    try {
      return await fn({ tables: this.tables });
    } catch (err) {
      this.tables = snapshot;
      throw err;
    }
  }

  /** Copies of every committed row of `kind`. */
  rows<K extends EntityKind>(kind: K): Array<EntityRows[K]> {
    const table: Map<string, EntityRows[K]> = this.tables[kind];
    return [...table.values()].map((row) => structuredClone(row));
  }

  count(kind: EntityKind): number {
    return this.tables[kind].size;
  }

  get transactions(): number {
    return this.transactionCount;
  }
}

import { type EntityKind, type LinkField, type RelationStore } from '@homestock/domain';
import { type EntityRows, type MemoryTables, type MemoryTx } from './memory-database';

type Links = Partial<Record<LinkField, string | null>>;

const LINKS: { [K in EntityKind]: (row: EntityRows[K]) => Links } = {
  user: (row) => ({ id: row.id }),
  group: (row) => ({ id: row.id }),
  membership: (row) => ({ userId: row.userId, groupId: row.groupId }),
  category: (row) => ({ id: row.id, parentId: row.parentId }),
  referenceItem: (row) => ({ id: row.id, categoryId: row.categoryId }),
  listing: (row) => ({ id: row.id, refItemId: row.refItemId }),
  item: (row) => ({
    id: row.id,
    ownerId: row.ownerId,
    groupId: row.groupId,
    refItemId: row.refItemId,
    categoryId: row.categoryId,
  }),
  itemImage: (row) => ({ id: row.id, itemId: row.itemId }),
  thread: (row) => ({ id: row.id, itemId: row.itemId }),
  message: (row) => ({ id: row.id, threadId: row.threadId, authorId: row.authorId, parentId: row.parentId }),
  reaction: (row) => ({ id: row.id, messageId: row.messageId, userId: row.userId }),
  attachment: (row) => ({ id: row.id, messageId: row.messageId }),
};

const CLEARERS: { [K in EntityKind]?: Partial<Record<LinkField, (row: EntityRows[K]) => EntityRows[K]>> } = {
  category: { parentId: (row) => ({ ...row, parentId: null }) },
  item: {
    categoryId: (row) => ({ ...row, categoryId: null, updatedAt: new Date() }),
    refItemId: (row) => ({ ...row, refItemId: null, updatedAt: new Date() }),
  },
  message: { parentId: (row) => ({ ...row, parentId: null, updatedAt: new Date() }) },
};

const BLOBS: { [K in EntityKind]?: (row: EntityRows[K]) => string } = {
  itemImage: (row) => row.blobHandle,
  attachment: (row) => row.blobHandle,
};

function matching<K extends EntityKind>(
  tables: MemoryTables,
  kind: K,
  field: LinkField,
  values: string[],
): Array<[string, EntityRows[K]]> {
  const wanted = new Set(values);
  const table: Map<string, EntityRows[K]> = tables[kind];
  const links = LINKS[kind];
  return [...table].filter(([, row]) => {
    const value = links(row)[field];
    return value !== undefined && value !== null && wanted.has(value);
  });
}

function idsOf<K extends EntityKind>(tables: MemoryTables, kind: K, field: LinkField, values: string[]): string[] {
  const links = LINKS[kind];
  const ids: string[] = [];
  for (const [, row] of matching(tables, kind, field, values)) {
    const id = links(row).id;
    if (id) ids.push(id);
  }
  return ids;
}

function clearMatching<K extends EntityKind>(tables: MemoryTables, kind: K, field: LinkField, values: string[]): number {
  const clear = CLEARERS[kind]?.[field];
  if (!clear) {
    throw new Error(`Cannot clear ${kind}.${field}`);
  }
  const table: Map<string, EntityRows[K]> = tables[kind];
  const rows = matching(tables, kind, field, values);
  for (const [key, row] of rows) {
    table.set(key, clear(row));
  }
  return rows.length;
}

function blobHandlesOf<K extends EntityKind>(tables: MemoryTables, kind: K, field: LinkField, values: string[]): string[] {
  const blobOf = BLOBS[kind];
  if (!blobOf) return [];
  return matching(tables, kind, field, values).map(([, row]) => blobOf(row));
}

export class MemoryRelationStore implements RelationStore<MemoryTx> {
  async findIds(tx: MemoryTx, kind: EntityKind, field: LinkField, values: string[]): Promise<string[]> {
    return idsOf(tx.tables, kind, field, values);
  }

  async countWhere(tx: MemoryTx, kind: EntityKind, field: LinkField, values: string[]): Promise<number> {
    return matching(tx.tables, kind, field, values).length;
  }

  async deleteWhere(tx: MemoryTx, kind: EntityKind, field: LinkField, values: string[]): Promise<number> {
    const rows = matching(tx.tables, kind, field, values);
    for (const [key] of rows) {
      tx.tables[kind].delete(key);
    }
    return rows.length;
  }

  async clearField(tx: MemoryTx, kind: EntityKind, field: LinkField, values: string[]): Promise<number> {
    return clearMatching(tx.tables, kind, field, values);
  }

  async blobHandlesWhere(tx: MemoryTx, kind: EntityKind, field: LinkField, values: string[]): Promise<string[]> {
    return blobHandlesOf(tx.tables, kind, field, values);
  }
}

import { type EntityKind, type LinkField, type RelationStore } from '@homestock/domain';
import { type Queryable } from '../client';

interface TableSpec {
  table: string;
  columns: Partial<Record<LinkField, string>>;
  blobColumn?: string;
}

// Identifiers interpolated into SQL come only from this map.
const TABLES: Record<EntityKind, TableSpec> = {
  user: { table: 'users', columns: { id: 'id' } },
  group: { table: 'family_groups', columns: { id: 'id' } },
  membership: { table: 'memberships', columns: { userId: 'user_id', groupId: 'group_id' } },
  category: { table: 'categories', columns: { id: 'id', parentId: 'parent_id' } },
  referenceItem: { table: 'reference_items', columns: { id: 'id', categoryId: 'category_id' } },
  listing: { table: 'market_listings', columns: { id: 'id', refItemId: 'ref_item_id' } },
  item: {
    table: 'items',
    columns: {
      id: 'id',
      ownerId: 'owner_id',
      groupId: 'group_id',
      refItemId: 'ref_item_id',
      categoryId: 'category_id',
    },
  },
  itemImage: { table: 'item_images', columns: { id: 'id', itemId: 'item_id' }, blobColumn: 'blob_handle' },
  thread: { table: 'threads', columns: { id: 'id', itemId: 'item_id' } },
  message: {
    table: 'messages',
    columns: { id: 'id', threadId: 'thread_id', authorId: 'author_id', parentId: 'parent_id' },
  },
  reaction: { table: 'message_reactions', columns: { id: 'id', messageId: 'message_id', userId: 'user_id' } },
  attachment: {
    table: 'message_attachments',
    columns: { id: 'id', messageId: 'message_id' },
    blobColumn: 'blob_handle',
  },
};

function resolve(kind: EntityKind, field: LinkField): { table: string; column: string } {
  const spec = TABLES[kind];
  const column = spec.columns[field];
  if (!column) {
    throw new Error(`No column for ${kind}.${field}`);
  }
  return { table: spec.table, column };
}

/** Set-based row access for the cascade routine; every call is one statement. */
export class PgRelationStore implements RelationStore<Queryable> {
  async findIds(tx: Queryable, kind: EntityKind, field: LinkField, values: string[]): Promise<string[]> {
    if (values.length === 0) return [];
    const { table, column } = resolve(kind, field);
    const result = await tx.query(
      `SELECT id FROM ${table} WHERE ${column} = ANY($1::bigint[]) ORDER BY id`,
      [values],
    );
    return result.rows.map((row) => String(row.id));
  }

  async countWhere(tx: Queryable, kind: EntityKind, field: LinkField, values: string[]): Promise<number> {
    if (values.length === 0) return 0;
    const { table, column } = resolve(kind, field);
    const result = await tx.query(
      `SELECT COUNT(*)::int AS count FROM ${table} WHERE ${column} = ANY($1::bigint[])`,
      [values],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async deleteWhere(tx: Queryable, kind: EntityKind, field: LinkField, values: string[]): Promise<number> {
    if (values.length === 0) return 0;
    const { table, column } = resolve(kind, field);
    const result = await tx.query(`DELETE FROM ${table} WHERE ${column} = ANY($1::bigint[])`, [values]);
    return result.rowCount ?? 0;
  }

  async clearField(tx: Queryable, kind: EntityKind, field: LinkField, values: string[]): Promise<number> {
    if (values.length === 0) return 0;
    const { table, column } = resolve(kind, field);
    const result = await tx.query(
      `UPDATE ${table} SET ${column} = NULL WHERE ${column} = ANY($1::bigint[])`,
      [values],
    );
    return result.rowCount ?? 0;
  }

  async blobHandlesWhere(tx: Queryable, kind: EntityKind, field: LinkField, values: string[]): Promise<string[]> {
    const blobColumn = TABLES[kind].blobColumn;
    if (values.length === 0 || !blobColumn) return [];
    const { table, column } = resolve(kind, field);
    const result = await tx.query(
      `SELECT ${blobColumn} AS blob_handle FROM ${table} WHERE ${column} = ANY($1::bigint[])`,
      [values],
    );
    return result.rows.map((row) => String(row.blob_handle));
  }
}

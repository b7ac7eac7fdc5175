import {
  ConditionRankSchema,
  ItemStatusSchema,
  type ConditionRank,
  type Item,
  type ItemPatch,
  type ItemRepository,
  type ItemStatus,
} from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toEnum, toNullableString, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const ITEM_COLUMNS = `id, owner_id, group_id, ref_item_id, category_id, name, description,
  condition, status, created_at, updated_at`;

const PATCH_COLUMNS = [
  ['name', 'name'],
  ['description', 'description'],
  ['condition', 'condition'],
  ['refItemId', 'ref_item_id'],
  ['categoryId', 'category_id'],
  ['status', 'status'],
] as const;

export class PgItemRepository implements ItemRepository<Queryable> {
  async create(
    tx: Queryable,
    item: {
      id: string;
      ownerId: string;
      groupId: string;
      refItemId: string | null;
      categoryId: string | null;
      name: string;
      description: string | null;
      condition: ConditionRank | null;
    },
  ): Promise<Item> {
    const result = await translateWriteErrors(() =>
      tx.query(
        `INSERT INTO items (id, owner_id, group_id, ref_item_id, category_id, name, description, condition)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${ITEM_COLUMNS}`,
        [
          item.id,
          item.ownerId,
          item.groupId,
          item.refItemId,
          item.categoryId,
          item.name,
          item.description,
          item.condition,
        ],
      ),
    );
    return mapItemRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<Item | null> {
    const result = await tx.query(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = $1`, [id]);
    return result.rows[0] ? mapItemRow(result.rows[0]) : null;
  }

  async update(tx: Queryable, id: string, patch: ItemPatch): Promise<Item | null> {
    const assignments = ['updated_at = NOW()'];
    const values: unknown[] = [id];
    for (const [field, column] of PATCH_COLUMNS) {
      const value = patch[field];
      if (value === undefined) continue;
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }

    const result = await translateWriteErrors(() =>
      tx.query(`UPDATE items SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${ITEM_COLUMNS}`, values),
    );
    return result.rows[0] ? mapItemRow(result.rows[0]) : null;
  }

  async listByGroup(tx: Queryable, groupId: string, opts: { status?: ItemStatus }): Promise<Item[]> {
    const result = await tx.query(
      `SELECT ${ITEM_COLUMNS} FROM items
       WHERE group_id = $1 AND ($2::text IS NULL OR status = $2)
       ORDER BY created_at ASC, id ASC`,
      [groupId, opts.status ?? null],
    );
    return result.rows.map(mapItemRow);
  }

  async listOwnedIds(tx: Queryable, groupId: string, ownerId: string): Promise<string[]> {
    const result = await tx.query(
      `SELECT id FROM items
       WHERE group_id = $1 AND owner_id = $2
       ORDER BY created_at ASC, id ASC`,
      [groupId, ownerId],
    );
    return result.rows.map((row) => String(row.id));
  }
}

function mapItemRow(row: Row): Item {
  return {
    id: String(row.id),
    ownerId: String(row.owner_id),
    groupId: String(row.group_id),
    refItemId: toNullableString(row.ref_item_id),
    categoryId: toNullableString(row.category_id),
    name: String(row.name),
    description: toNullableString(row.description),
    condition: row.condition === null ? null : toEnum(ConditionRankSchema, row.condition),
    status: toEnum(ItemStatusSchema, row.status),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

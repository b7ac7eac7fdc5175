import { type ReferenceItem, type ReferenceItemRepository } from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toNullableString, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const REF_ITEM_COLUMNS = 'id, category_id, name, brand, created_at';

export class PgReferenceItemRepository implements ReferenceItemRepository<Queryable> {
  async create(
    tx: Queryable,
    item: { id: string; categoryId: string; name: string; brand: string | null },
  ): Promise<ReferenceItem> {
    const result = await translateWriteErrors(
      () =>
        tx.query(
          `INSERT INTO reference_items (id, category_id, name, brand)
           VALUES ($1, $2, $3, $4)
           RETURNING ${REF_ITEM_COLUMNS}`,
          [item.id, item.categoryId, item.name, item.brand],
        ),
    );
    return mapReferenceItemRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<ReferenceItem | null> {
    const result = await tx.query(`SELECT ${REF_ITEM_COLUMNS} FROM reference_items WHERE id = $1`, [id]);
    return result.rows[0] ? mapReferenceItemRow(result.rows[0]) : null;
  }

  async listByCategory(tx: Queryable, categoryId: string): Promise<ReferenceItem[]> {
    const result = await tx.query(
      `SELECT ${REF_ITEM_COLUMNS} FROM reference_items
       WHERE category_id = $1
       ORDER BY name ASC, id ASC`,
      [categoryId],
    );
    return result.rows.map(mapReferenceItemRow);
  }
}

function mapReferenceItemRow(row: Row): ReferenceItem {
  return {
    id: String(row.id),
    categoryId: String(row.category_id),
    name: String(row.name),
    brand: toNullableString(row.brand),
    createdAt: toDate(row.created_at),
  };
}

import { type Category, type CategoryRepository } from '@homestock/domain';
import { type Queryable } from '../client';
import { toNullableString, type Row } from '../rows';

/** Advisory lock key shared by every taxonomy writer. */
const TAXONOMY_LOCK_KEY = 7_401_001;

export class PgCategoryRepository implements CategoryRepository<Queryable> {
  async create(tx: Queryable, category: { id: string; name: string; parentId: string | null }): Promise<Category> {
    const result = await tx.query(
      `INSERT INTO categories (id, name, parent_id)
       VALUES ($1, $2, $3)
       RETURNING id, name, parent_id`,
      [category.id, category.name, category.parentId],
    );
    return mapCategoryRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<Category | null> {
    const result = await tx.query(`SELECT id, name, parent_id FROM categories WHERE id = $1`, [id]);
    return result.rows[0] ? mapCategoryRow(result.rows[0]) : null;
  }

  async listRoots(tx: Queryable): Promise<Category[]> {
    const result = await tx.query(
      `SELECT id, name, parent_id FROM categories
       WHERE parent_id IS NULL
       ORDER BY name ASC, id ASC`,
    );
    return result.rows.map(mapCategoryRow);
  }

  async listChildren(tx: Queryable, parentIds: string[]): Promise<Category[]> {
    if (parentIds.length === 0) return [];
    const result = await tx.query(
      `SELECT id, name, parent_id FROM categories
       WHERE parent_id = ANY($1::bigint[])
       ORDER BY name ASC, id ASC`,
      [parentIds],
    );
    return result.rows.map(mapCategoryRow);
  }

  async updateParent(tx: Queryable, id: string, parentId: string | null): Promise<void> {
    await tx.query(`UPDATE categories SET parent_id = $2 WHERE id = $1`, [id, parentId]);
  }

  async rename(tx: Queryable, id: string, name: string): Promise<Category | null> {
    const result = await tx.query(
      `UPDATE categories SET name = $2 WHERE id = $1 RETURNING id, name, parent_id`,
      [id, name],
    );
    return result.rows[0] ? mapCategoryRow(result.rows[0]) : null;
  }

  async lockTree(tx: Queryable): Promise<void> {
    await tx.query(`SELECT pg_advisory_xact_lock($1)`, [TAXONOMY_LOCK_KEY]);
  }
}

function mapCategoryRow(row: Row): Category {
  return {
    id: String(row.id),
    name: String(row.name),
    parentId: toNullableString(row.parent_id),
  };
}

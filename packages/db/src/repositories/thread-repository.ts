import { type Thread, type ThreadRepository } from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toNullableString, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const THREAD_COLUMNS = 'id, item_id, title, created_at, updated_at';

export class PgThreadRepository implements ThreadRepository<Queryable> {
  async createIfAbsent(
    tx: Queryable,
    thread: { id: string; itemId: string; title: string | null },
  ): Promise<{ thread: Thread; created: boolean }> {
    const inserted = await translateWriteErrors(() =>
      tx.query(
        `INSERT INTO threads (id, item_id, title)
         VALUES ($1, $2, $3)
         ON CONFLICT (item_id) DO NOTHING
         RETURNING ${THREAD_COLUMNS}`,
        [thread.id, thread.itemId, thread.title],
      ),
    );
    if (inserted.rows[0]) {
      return { thread: mapThreadRow(inserted.rows[0]), created: true };
    }

    const existing = await this.findByItem(tx, thread.itemId);
    if (!existing) {
      throw new Error(`Thread for item ${thread.itemId} vanished after insert conflict`);
    }
    return { thread: existing, created: false };
  }

  async findById(tx: Queryable, id: string): Promise<Thread | null> {
    const result = await tx.query(`SELECT ${THREAD_COLUMNS} FROM threads WHERE id = $1`, [id]);
    return result.rows[0] ? mapThreadRow(result.rows[0]) : null;
  }

  async findByItem(tx: Queryable, itemId: string): Promise<Thread | null> {
    const result = await tx.query(`SELECT ${THREAD_COLUMNS} FROM threads WHERE item_id = $1`, [itemId]);
    return result.rows[0] ? mapThreadRow(result.rows[0]) : null;
  }

  async touch(tx: Queryable, id: string): Promise<void> {
    await tx.query(`UPDATE threads SET updated_at = NOW() WHERE id = $1`, [id]);
  }
}

function mapThreadRow(row: Row): Thread {
  return {
    id: String(row.id),
    itemId: String(row.item_id),
    title: toNullableString(row.title),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

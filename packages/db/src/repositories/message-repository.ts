import { type Message, type MessageRepository } from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toNullableString, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const MESSAGE_COLUMNS = 'id, thread_id, author_id, parent_id, content, is_edited, created_at, updated_at';

export class PgMessageRepository implements MessageRepository<Queryable> {
  async create(
    tx: Queryable,
    msg: { id: string; threadId: string; authorId: string; parentId: string | null; content: string },
  ): Promise<Message> {
    const result = await translateWriteErrors(() =>
      tx.query(
        `INSERT INTO messages (id, thread_id, author_id, parent_id, content)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${MESSAGE_COLUMNS}`,
        [msg.id, msg.threadId, msg.authorId, msg.parentId, msg.content],
      ),
    );
    return mapMessageRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<Message | null> {
    const result = await tx.query(`SELECT ${MESSAGE_COLUMNS} FROM messages WHERE id = $1`, [id]);
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  async listByThread(tx: Queryable, threadId: string): Promise<Message[]> {
    const result = await tx.query(
      `SELECT ${MESSAGE_COLUMNS} FROM messages
       WHERE thread_id = $1
       ORDER BY created_at ASC, id ASC`,
      [threadId],
    );
    return result.rows.map(mapMessageRow);
  }

  async updateContent(tx: Queryable, id: string, content: string): Promise<Message | null> {
    const result = await tx.query(
      `UPDATE messages SET content = $2, is_edited = TRUE, updated_at = NOW()
       WHERE id = $1
       RETURNING ${MESSAGE_COLUMNS}`,
      [id, content],
    );
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  async updateParent(tx: Queryable, id: string, parentId: string | null): Promise<Message | null> {
    const result = await tx.query(
      `UPDATE messages SET parent_id = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${MESSAGE_COLUMNS}`,
      [id, parentId],
    );
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  async liftReplies(tx: Queryable, parentId: string, newParentId: string | null): Promise<number> {
    const result = await tx.query(
      `UPDATE messages SET parent_id = $2, updated_at = NOW() WHERE parent_id = $1`,
      [parentId, newParentId],
    );
    return result.rowCount ?? 0;
  }
}

function mapMessageRow(row: Row): Message {
  return {
    id: String(row.id),
    threadId: String(row.thread_id),
    authorId: String(row.author_id),
    parentId: toNullableString(row.parent_id),
    content: String(row.content),
    isEdited: row.is_edited === true,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

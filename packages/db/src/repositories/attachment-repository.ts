import { type AttachmentRepository, type MessageAttachment } from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, type Row } from '../rows';

const ATTACHMENT_COLUMNS = 'id, message_id, blob_handle, uploaded_at';

export class PgAttachmentRepository implements AttachmentRepository<Queryable> {
  async create(
    tx: Queryable,
    attachment: { id: string; messageId: string; blobHandle: string },
  ): Promise<MessageAttachment> {
    const result = await tx.query(
      `INSERT INTO message_attachments (id, message_id, blob_handle)
       VALUES ($1, $2, $3)
       RETURNING ${ATTACHMENT_COLUMNS}`,
      [attachment.id, attachment.messageId, attachment.blobHandle],
    );
    return mapAttachmentRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<MessageAttachment | null> {
    const result = await tx.query(`SELECT ${ATTACHMENT_COLUMNS} FROM message_attachments WHERE id = $1`, [id]);
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  async listByMessage(tx: Queryable, messageId: string): Promise<MessageAttachment[]> {
    const result = await tx.query(
      `SELECT ${ATTACHMENT_COLUMNS} FROM message_attachments
       WHERE message_id = $1
       ORDER BY uploaded_at ASC, id ASC`,
      [messageId],
    );
    return result.rows.map(mapAttachmentRow);
  }
}

function mapAttachmentRow(row: Row): MessageAttachment {
  return {
    id: String(row.id),
    messageId: String(row.message_id),
    blobHandle: String(row.blob_handle),
    uploadedAt: toDate(row.uploaded_at),
  };
}

import { type ItemImage, type ItemImageRepository } from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, type Row } from '../rows';

export class PgItemImageRepository implements ItemImageRepository<Queryable> {
  async create(tx: Queryable, image: { id: string; itemId: string; blobHandle: string }): Promise<ItemImage> {
    const result = await tx.query(
      `INSERT INTO item_images (id, item_id, blob_handle)
       VALUES ($1, $2, $3)
       RETURNING id, item_id, blob_handle, uploaded_at`,
      [image.id, image.itemId, image.blobHandle],
    );
    return mapImageRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<ItemImage | null> {
    const result = await tx.query(
      `SELECT id, item_id, blob_handle, uploaded_at FROM item_images WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapImageRow(result.rows[0]) : null;
  }

  async listByItem(tx: Queryable, itemId: string): Promise<ItemImage[]> {
    const result = await tx.query(
      `SELECT id, item_id, blob_handle, uploaded_at FROM item_images
       WHERE item_id = $1
       ORDER BY uploaded_at ASC, id ASC`,
      [itemId],
    );
    return result.rows.map(mapImageRow);
  }
}

function mapImageRow(row: Row): ItemImage {
  return {
    id: String(row.id),
    itemId: String(row.item_id),
    blobHandle: String(row.blob_handle),
    uploadedAt: toDate(row.uploaded_at),
  };
}

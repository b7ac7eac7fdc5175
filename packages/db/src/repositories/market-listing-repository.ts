import {
  ConditionRankSchema,
  ListingStatusSchema,
  type ConditionRank,
  type ListingCursor,
  type ListingFilter,
  type ListingStatus,
  type MarketListing,
  type MarketListingRepository,
} from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toEnum, type Row } from '../rows';

// NUMERIC and DATE leave the database as text so neither passes through a JS number or Date.
const LISTING_COLUMNS = `id, ref_item_id, price::text AS price, condition,
  to_char(listing_date, 'YYYY-MM-DD') AS listing_date, status, created_at`;

export class PgMarketListingRepository implements MarketListingRepository<Queryable> {
  async create(
    tx: Queryable,
    listing: {
      id: string;
      refItemId: string;
      price: string;
      condition: ConditionRank;
      listingDate: string;
      status: ListingStatus;
    },
  ): Promise<MarketListing> {
    const result = await tx.query(
      `INSERT INTO market_listings (id, ref_item_id, price, condition, listing_date, status)
       VALUES ($1, $2, $3::numeric, $4, $5::date, $6)
       RETURNING ${LISTING_COLUMNS}`,
      [listing.id, listing.refItemId, listing.price, listing.condition, listing.listingDate, listing.status],
    );
    return mapListingRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<MarketListing | null> {
    const result = await tx.query(`SELECT ${LISTING_COLUMNS} FROM market_listings WHERE id = $1`, [id]);
    return result.rows[0] ? mapListingRow(result.rows[0]) : null;
  }

  async updateStatus(tx: Queryable, id: string, status: ListingStatus): Promise<MarketListing | null> {
    const result = await tx.query(
      `UPDATE market_listings SET status = $2 WHERE id = $1 RETURNING ${LISTING_COLUMNS}`,
      [id, status],
    );
    return result.rows[0] ? mapListingRow(result.rows[0]) : null;
  }

  async listPage(
    tx: Queryable,
    refItemId: string,
    filter: ListingFilter,
    cursor: ListingCursor | null,
    limit: number,
  ): Promise<MarketListing[]> {
    const result = await tx.query(
      `SELECT ${LISTING_COLUMNS}
       FROM market_listings
       WHERE ref_item_id = $1
         AND ($2::text IS NULL OR status = $2)
         AND ($3::date IS NULL OR listing_date >= $3::date)
         AND ($4::date IS NULL OR listing_date <= $4::date)
         AND ($5::date IS NULL OR (listing_date, id) < ($5::date, $6::bigint))
       ORDER BY listing_date DESC, id DESC
       LIMIT $7`,
      [
        refItemId,
        filter.status ?? null,
        filter.from ?? null,
        filter.to ?? null,
        cursor?.listingDate ?? null,
        cursor?.id ?? null,
        limit,
      ],
    );
    return result.rows.map(mapListingRow);
  }
}

function mapListingRow(row: Row): MarketListing {
  return {
    id: String(row.id),
    refItemId: String(row.ref_item_id),
    price: String(row.price),
    condition: toEnum(ConditionRankSchema, row.condition),
    listingDate: String(row.listing_date),
    status: toEnum(ListingStatusSchema, row.status),
    createdAt: toDate(row.created_at),
  };
}

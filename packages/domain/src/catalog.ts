import { type ConditionRank, type ListingStatus } from './enums';

export interface Category {
  id: string;
  name: string;
  parentId: string | null;
}

export interface ReferenceItem {
  id: string;
  categoryId: string;
  name: string;
  brand: string | null;
  createdAt: Date;
}

export interface MarketListing {
  id: string;
  refItemId: string;
  /** Two-decimal string, e.g. `"1200.00"`. */
  price: string;
  condition: ConditionRank;
  /** `YYYY-MM-DD` */
  listingDate: string;
  status: ListingStatus;
  createdAt: Date;
}

export interface ListingFilter {
  status?: ListingStatus;
  /** Inclusive lower bound, `YYYY-MM-DD`. */
  from?: string;
  /** Inclusive upper bound, `YYYY-MM-DD`. */
  to?: string;
}

/** Keyset position: the last listing of the previous page. */
export interface ListingCursor {
  listingDate: string;
  id: string;
}

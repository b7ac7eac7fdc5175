import {
  type ReferenceItem,
  type MarketListing,
  type ListingFilter,
  type ListingCursor,
} from './catalog';
import {
  type CategoryRepository,
  type ReferenceItemRepository,
  type MarketListingRepository,
} from './ports';
import {
  ConditionRankSchema,
  ListingStatusSchema,
  parseEnum,
  type ConditionRank,
  type ListingStatus,
} from './enums';
import { DomainError } from './errors';
import { parseListingDate, parsePrice } from './money';
import { deleteAtomically, type CascadeReport, type DeletionDeps } from './cascade';
import { ListingFilterSchema, ReferenceItemInputSchema, isId, parseInput } from './validation';

export interface ReferenceCatalogServiceDeps<Tx> extends DeletionDeps<Tx> {
  categoryRepo: CategoryRepository<Tx>;
  refItemRepo: ReferenceItemRepository<Tx>;
  listingRepo: MarketListingRepository<Tx>;
  generateId: () => string;
  listingPageSize: number;
}

export interface RecordListingInput {
  price: string | number;
  condition: ConditionRank;
  listingDate: string | Date;
  status: ListingStatus;
}

const ALLOWED_TRANSITIONS: Record<ListingStatus, ReadonlySet<ListingStatus>> = {
  active: new Set<ListingStatus>(['active', 'sold', 'removed']),
  sold: new Set<ListingStatus>(['sold']),
  removed: new Set<ListingStatus>(['removed']),
};

export class ReferenceCatalogService<Tx> {
  constructor(private readonly deps: ReferenceCatalogServiceDeps<Tx>) {}

  async addReferenceItem(categoryId: string, name: string, brand?: string | null): Promise<ReferenceItem> {
    const input = parseInput(ReferenceItemInputSchema, { name, brand });
    const { categoryRepo, refItemRepo, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const category = isId(categoryId) ? await categoryRepo.findById(tx, categoryId) : null;
      if (!category) {
        throw new DomainError('CATEGORY_NOT_FOUND', 'Category not found', { categoryId });
      }
      return refItemRepo.create(tx, {
        id: generateId(),
        categoryId,
        name: input.name,
        brand: input.brand || null,
      });
    });
  }

  async getReferenceItem(refItemId: string): Promise<ReferenceItem> {
    return this.deps.withTransaction(async (tx) => this.loadReferenceItem(tx, refItemId));
  }

  async findReferenceItems(categoryId: string): Promise<ReferenceItem[]> {
    return this.deps.withTransaction(async (tx) => {
      const category = isId(categoryId) ? await this.deps.categoryRepo.findById(tx, categoryId) : null;
      if (!category) {
        throw new DomainError('CATEGORY_NOT_FOUND', 'Category not found', { categoryId });
      }
      return this.deps.refItemRepo.listByCategory(tx, categoryId);
    });
  }

  async recordListing(refItemId: string, input: RecordListingInput): Promise<MarketListing> {
    const price = parsePrice(input.price);
    const condition = parseEnum(ConditionRankSchema, 'condition', input.condition);
    const status = parseEnum(ListingStatusSchema, 'status', input.status);
    const listingDate = parseListingDate(input.listingDate);

    return this.deps.withTransaction(async (tx) => {
      await this.loadReferenceItem(tx, refItemId);
      return this.deps.listingRepo.create(tx, {
        id: this.deps.generateId(),
        refItemId,
        price,
        condition,
        listingDate,
        status,
      });
    });
  }

  /** Listings only move forward: `active` → `sold` | `removed`. Same-status writes are no-ops. */
  async updateListingStatus(listingId: string, status: ListingStatus): Promise<MarketListing> {
    const next = parseEnum(ListingStatusSchema, 'status', status);

    return this.deps.withTransaction(async (tx) => {
      const listing = isId(listingId) ? await this.deps.listingRepo.findById(tx, listingId) : null;
      if (!listing) {
        throw new DomainError('LISTING_NOT_FOUND', 'Listing not found', { listingId });
      }
      if (!ALLOWED_TRANSITIONS[listing.status].has(next)) {
        throw new DomainError('INVALID_STATUS_TRANSITION', `Listing cannot move from ${listing.status} to ${next}`, {
          listingId,
          from: listing.status,
          to: next,
        });
      }
      if (listing.status === next) return listing;

      const updated = await this.deps.listingRepo.updateStatus(tx, listingId, next);
      if (!updated) {
        throw new DomainError('LISTING_NOT_FOUND', 'Listing not found', { listingId });
      }
      return updated;
    });
  }

  /**
   * Listings for `refItemId`, most recent listing date first. Nothing is read until
   * iteration starts, and every iteration starts over from the newest listing.
   */
  listingsFor(refItemId: string, filter: ListingFilter = {}): AsyncIterable<MarketListing> {
    const parsed = parseInput(ListingFilterSchema, filter);
    const normalized: ListingFilter = {
      status: parsed.status,
      from: parsed.from === undefined ? undefined : parseListingDate(parsed.from),
      to: parsed.to === undefined ? undefined : parseListingDate(parsed.to),
    };
    return { [Symbol.asyncIterator]: () => this.pageListings(refItemId, normalized) };
  }

  async deleteReferenceItem(refItemId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'referenceItem', id: refItemId }, async (tx) => {
      await this.loadReferenceItem(tx, refItemId);
    });
  }

  private async *pageListings(refItemId: string, filter: ListingFilter): AsyncGenerator<MarketListing> {
    const { listingRepo, listingPageSize } = this.deps;
    let cursor: ListingCursor | null = null;
    let first = true;

    for (;;) {
      const after: ListingCursor | null = cursor;
      const checkExists = first;
      const page: MarketListing[] = await this.deps.withTransaction(async (tx) => {
        if (checkExists) await this.loadReferenceItem(tx, refItemId);
        return listingRepo.listPage(tx, refItemId, filter, after, listingPageSize);
      });
      first = false;

      yield* page;
      if (page.length < listingPageSize) return;

      const last = page[page.length - 1];
      cursor = { listingDate: last.listingDate, id: last.id };
    }
  }

  private async loadReferenceItem(tx: Tx, refItemId: string): Promise<ReferenceItem> {
    const refItem = isId(refItemId) ? await this.deps.refItemRepo.findById(tx, refItemId) : null;
    if (!refItem) {
      throw new DomainError('REFERENCE_ITEM_NOT_FOUND', 'Reference item not found', { refItemId });
    }
    return refItem;
  }
}

import { type BlobStore, type CredentialHasher, type LoggerPort, type Repositories, type TransactionRunner } from './ports';
import { IdentityService } from './identity-service';
import { MembershipService } from './membership-service';
import { TaxonomyService } from './taxonomy-service';
import { ReferenceCatalogService } from './reference-catalog-service';
import { ItemService } from './item-service';
import { MediaService } from './media-service';
import { DiscussionService } from './discussion-service';

export interface CoreInfrastructure<Tx> {
  repos: Repositories<Tx>;
  withTransaction: TransactionRunner<Tx>;
  blobStore: BlobStore;
  hasher: CredentialHasher;
  logger: LoggerPort;
  generateId: () => string;
  maxTraversalDepth: number;
  listingPageSize: number;
}

export interface CoreServices<Tx> {
  identity: IdentityService<Tx>;
  membership: MembershipService<Tx>;
  taxonomy: TaxonomyService<Tx>;
  referenceCatalog: ReferenceCatalogService<Tx>;
  items: ItemService<Tx>;
  media: MediaService<Tx>;
  discussion: DiscussionService<Tx>;
}

/** Wires every service onto one set of repositories and one transaction runner. */
export function createServices<Tx>(infra: CoreInfrastructure<Tx>): CoreServices<Tx> {
  const { repos, withTransaction, blobStore, hasher, logger, generateId } = infra;
  const deletion = { relations: repos.relations, blobStore, logger, withTransaction };

  return {
    identity: new IdentityService({ ...deletion, userRepo: repos.users, hasher, generateId }),
    membership: new MembershipService({
      ...deletion,
      userRepo: repos.users,
      groupRepo: repos.groups,
      memberRepo: repos.memberships,
      itemRepo: repos.items,
      generateId,
    }),
    taxonomy: new TaxonomyService({
      ...deletion,
      categoryRepo: repos.categories,
      generateId,
      maxTraversalDepth: infra.maxTraversalDepth,
    }),
    referenceCatalog: new ReferenceCatalogService({
      ...deletion,
      categoryRepo: repos.categories,
      refItemRepo: repos.referenceItems,
      listingRepo: repos.listings,
      generateId,
      listingPageSize: infra.listingPageSize,
    }),
    items: new ItemService({
      ...deletion,
      itemRepo: repos.items,
      memberRepo: repos.memberships,
      categoryRepo: repos.categories,
      refItemRepo: repos.referenceItems,
      generateId,
    }),
    media: new MediaService({
      ...deletion,
      itemRepo: repos.items,
      imageRepo: repos.itemImages,
      threadRepo: repos.threads,
      messageRepo: repos.messages,
      attachmentRepo: repos.attachments,
      memberRepo: repos.memberships,
      generateId,
    }),
    discussion: new DiscussionService({
      ...deletion,
      itemRepo: repos.items,
      threadRepo: repos.threads,
      messageRepo: repos.messages,
      reactionRepo: repos.reactions,
      memberRepo: repos.memberships,
      generateId,
      maxTraversalDepth: infra.maxTraversalDepth,
    }),
  };
}

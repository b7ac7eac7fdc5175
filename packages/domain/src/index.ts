export type { User } from './user';
export type { FamilyGroup, Membership } from './group';
export type { Category, ReferenceItem, MarketListing, ListingFilter, ListingCursor } from './catalog';
export type { Item, ItemImage, ItemPatch } from './item';
export type { Thread, Message, MessageReaction, MessageAttachment } from './discussion';
export {
  MemberRoleSchema,
  CapabilitySchema,
  ConditionRankSchema,
  ListingStatusSchema,
  ItemStatusSchema,
  ReactionTypeSchema,
  parseEnum,
  type MemberRole,
  type Capability,
  type ConditionRank,
  type ListingStatus,
  type ItemStatus,
  type ReactionType,
} from './enums';
export {
  DomainError,
  isDomainError,
  type DomainErrorKind,
  type ErrorCategory,
  type ErrorDetailValue,
} from './errors';
export { parsePrice, parseListingDate } from './money';
export {
  MESSAGE_CONTENT_MAX_LENGTH,
  isId,
  parseInput,
  type CreateItemInput,
  type UpdateItemInput,
} from './validation';
export {
  OWNS_EDGES,
  REFERENCE_EDGES,
  BLOB_KINDS,
  ownedEdgesOf,
  referencesTo,
  type EntityKind,
  type EntityRef,
  type LinkField,
  type OwnsEdge,
  type ReferenceEdge,
} from './ownership';
export { ROLE_CAPABILITIES, roleAllows, membershipAllows, requireCapability } from './permissions';
export { climb, type TreeNode } from './traversal';
export {
  cascadeDelete,
  deleteAtomically,
  releaseBlobs,
  type CascadeReport,
  type DeletionDeps,
} from './cascade';
export type {
  TransactionOptions,
  TransactionRunner,
  LoggerPort,
  RowLock,
  CredentialHasher,
  BlobStore,
  UserRepository,
  GroupRepository,
  MembershipRepository,
  CategoryRepository,
  ReferenceItemRepository,
  MarketListingRepository,
  ItemRepository,
  ItemImageRepository,
  ThreadRepository,
  MessageRepository,
  ReactionRepository,
  AttachmentRepository,
  RelationStore,
  Repositories,
} from './ports';
export { IdentityService, type IdentityServiceDeps } from './identity-service';
export { MembershipService, type MembershipServiceDeps } from './membership-service';
export { TaxonomyService, type TaxonomyServiceDeps } from './taxonomy-service';
export {
  ReferenceCatalogService,
  type ReferenceCatalogServiceDeps,
  type RecordListingInput,
} from './reference-catalog-service';
export { ItemService, type ItemServiceDeps } from './item-service';
export { MediaService, type MediaServiceDeps } from './media-service';
export { DiscussionService, type DiscussionServiceDeps } from './discussion-service';
export { createServices, type CoreInfrastructure, type CoreServices } from './services';

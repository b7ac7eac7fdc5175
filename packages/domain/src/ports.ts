import { type User } from './user';
import { type FamilyGroup, type Membership } from './group';
import {
  type Category,
  type ReferenceItem,
  type MarketListing,
  type ListingFilter,
  type ListingCursor,
} from './catalog';
import { type Item, type ItemImage, type ItemPatch } from './item';
import { type Thread, type Message, type MessageReaction, type MessageAttachment } from './discussion';
import {
  type MemberRole,
  type ConditionRank,
  type ListingStatus,
  type ItemStatus,
  type ReactionType,
} from './enums';
import { type EntityKind, type LinkField } from './ownership';

export interface TransactionOptions {
  isolation?: 'read committed' | 'serializable';
}

export type TransactionRunner<Tx> = <T>(
  fn: (tx: Tx) => Promise<T>,
  options?: TransactionOptions,
) => Promise<T>;

export interface LoggerPort {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
}

/** Hashing itself lives outside the core; the core only compares. */
export interface CredentialHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, credentialHash: string): Promise<boolean>;
}

export interface BlobStore {
  storeBlob(bytes: Uint8Array): Promise<string>;
  fetchBlob(handle: string): Promise<Uint8Array>;
  deleteBlob(handle: string): Promise<void>;
}

export interface UserRepository<Tx> {
  /** Throws `DUPLICATE_LOGIN` when the login id is taken. */
  create(
    tx: Tx,
    user: { id: string; loginId: string; credentialHash: string; displayName: string },
  ): Promise<User>;
  findById(tx: Tx, id: string): Promise<User | null>;
  findByLoginId(tx: Tx, loginId: string): Promise<User | null>;
  updateDisplayName(tx: Tx, id: string, displayName: string): Promise<User | null>;
}

export interface GroupRepository<Tx> {
  create(tx: Tx, group: { id: string; name: string }): Promise<FamilyGroup>;
  findById(tx: Tx, id: string): Promise<FamilyGroup | null>;
  listForUser(tx: Tx, userId: string): Promise<Array<FamilyGroup & { role: MemberRole }>>;
}

/** Row lock taken by a locking read: `share` blocks writers, `update` blocks both. */
export type RowLock = 'share' | 'update';

export interface MembershipRepository<Tx> {
  /** Throws `DUPLICATE_MEMBERSHIP` when the pair already exists. */
  add(tx: Tx, member: { userId: string; groupId: string; role: MemberRole }): Promise<Membership>;
  find(tx: Tx, groupId: string, userId: string): Promise<Membership | null>;
  findLocked(tx: Tx, groupId: string, userId: string, lock: RowLock): Promise<Membership | null>;
  updateRole(tx: Tx, groupId: string, userId: string, role: MemberRole): Promise<Membership | null>;
  /** Returns whether a row was removed. */
  remove(tx: Tx, groupId: string, userId: string): Promise<boolean>;
  listByGroup(tx: Tx, groupId: string): Promise<Membership[]>;
}

export interface CategoryRepository<Tx> {
  create(tx: Tx, category: { id: string; name: string; parentId: string | null }): Promise<Category>;
  findById(tx: Tx, id: string): Promise<Category | null>;
  listRoots(tx: Tx): Promise<Category[]>;
  /** Children of any of `parentIds`, ordered by name then id. */
  listChildren(tx: Tx, parentIds: string[]): Promise<Category[]>;
  updateParent(tx: Tx, id: string, parentId: string | null): Promise<void>;
  rename(tx: Tx, id: string, name: string): Promise<Category | null>;
  /** Serializes taxonomy writers for the rest of the transaction. */
  lockTree(tx: Tx): Promise<void>;
}

export interface ReferenceItemRepository<Tx> {
  create(
    tx: Tx,
    item: { id: string; categoryId: string; name: string; brand: string | null },
  ): Promise<ReferenceItem>;
  findById(tx: Tx, id: string): Promise<ReferenceItem | null>;
  listByCategory(tx: Tx, categoryId: string): Promise<ReferenceItem[]>;
}

export interface MarketListingRepository<Tx> {
  create(
    tx: Tx,
    listing: {
      id: string;
      refItemId: string;
      price: string;
      condition: ConditionRank;
      listingDate: string;
      status: ListingStatus;
    },
  ): Promise<MarketListing>;
  findById(tx: Tx, id: string): Promise<MarketListing | null>;
  updateStatus(tx: Tx, id: string, status: ListingStatus): Promise<MarketListing | null>;
  /** One page ordered by listing date descending, then id descending, strictly after `cursor`. */
  listPage(
    tx: Tx,
    refItemId: string,
    filter: ListingFilter,
    cursor: ListingCursor | null,
    limit: number,
  ): Promise<MarketListing[]>;
}

export interface ItemRepository<Tx> {
  create(
    tx: Tx,
    item: {
      id: string;
      ownerId: string;
      groupId: string;
      refItemId: string | null;
      categoryId: string | null;
      name: string;
      description: string | null;
      condition: ConditionRank | null;
    },
  ): Promise<Item>;
  findById(tx: Tx, id: string): Promise<Item | null>;
  update(tx: Tx, id: string, patch: ItemPatch): Promise<Item | null>;
  listByGroup(tx: Tx, groupId: string, opts: { status?: ItemStatus }): Promise<Item[]>;
  /** Ids of every item `ownerId` owns in `groupId`, oldest first. */
  listOwnedIds(tx: Tx, groupId: string, ownerId: string): Promise<string[]>;
}

export interface ItemImageRepository<Tx> {
  create(tx: Tx, image: { id: string; itemId: string; blobHandle: string }): Promise<ItemImage>;
  findById(tx: Tx, id: string): Promise<ItemImage | null>;
  listByItem(tx: Tx, itemId: string): Promise<ItemImage[]>;
}

export interface ThreadRepository<Tx> {
  /** Inserts unless the item already has a thread; either way returns the item's thread. */
  createIfAbsent(
    tx: Tx,
    thread: { id: string; itemId: string; title: string | null },
  ): Promise<{ thread: Thread; created: boolean }>;
  findById(tx: Tx, id: string): Promise<Thread | null>;
  findByItem(tx: Tx, itemId: string): Promise<Thread | null>;
  touch(tx: Tx, id: string): Promise<void>;
}

export interface MessageRepository<Tx> {
  create(
    tx: Tx,
    msg: { id: string; threadId: string; authorId: string; parentId: string | null; content: string },
  ): Promise<Message>;
  findById(tx: Tx, id: string): Promise<Message | null>;
  /** Creation order. */
  listByThread(tx: Tx, threadId: string): Promise<Message[]>;
  updateContent(tx: Tx, id: string, content: string): Promise<Message | null>;
  updateParent(tx: Tx, id: string, parentId: string | null): Promise<Message | null>;
  /** Re-points every direct reply of `parentId` to `newParentId`; returns the count. */
  liftReplies(tx: Tx, parentId: string, newParentId: string | null): Promise<number>;
}

export interface ReactionRepository<Tx> {
  /** Throws `DUPLICATE_REACTION` when the (message, user, type) triple exists. */
  add(
    tx: Tx,
    reaction: { id: string; messageId: string; userId: string; type: ReactionType },
  ): Promise<MessageReaction>;
  remove(tx: Tx, messageId: string, userId: string, type: ReactionType): Promise<boolean>;
  listByMessage(tx: Tx, messageId: string): Promise<MessageReaction[]>;
}

export interface AttachmentRepository<Tx> {
  create(
    tx: Tx,
    attachment: { id: string; messageId: string; blobHandle: string },
  ): Promise<MessageAttachment>;
  findById(tx: Tx, id: string): Promise<MessageAttachment | null>;
  listByMessage(tx: Tx, messageId: string): Promise<MessageAttachment[]>;
}

/** Engine-neutral row access used by the cascade routine. */
export interface RelationStore<Tx> {
  findIds(tx: Tx, kind: EntityKind, field: LinkField, values: string[]): Promise<string[]>;
  countWhere(tx: Tx, kind: EntityKind, field: LinkField, values: string[]): Promise<number>;
  /** Returns the number of rows removed. */
  deleteWhere(tx: Tx, kind: EntityKind, field: LinkField, values: string[]): Promise<number>;
  clearField(tx: Tx, kind: EntityKind, field: LinkField, values: string[]): Promise<number>;
  blobHandlesWhere(tx: Tx, kind: EntityKind, field: LinkField, values: string[]): Promise<string[]>;
}

export interface Repositories<Tx> {
  users: UserRepository<Tx>;
  groups: GroupRepository<Tx>;
  memberships: MembershipRepository<Tx>;
  categories: CategoryRepository<Tx>;
  referenceItems: ReferenceItemRepository<Tx>;
  listings: MarketListingRepository<Tx>;
  items: ItemRepository<Tx>;
  itemImages: ItemImageRepository<Tx>;
  threads: ThreadRepository<Tx>;
  messages: MessageRepository<Tx>;
  reactions: ReactionRepository<Tx>;
  attachments: AttachmentRepository<Tx>;
  relations: RelationStore<Tx>;
}

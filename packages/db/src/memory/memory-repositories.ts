import {
  DomainError,
  type AttachmentRepository,
  type Category,
  type CategoryRepository,
  type ConditionRank,
  type EntityKind,
  type FamilyGroup,
  type GroupRepository,
  type Item,
  type ItemImage,
  type ItemImageRepository,
  type ItemPatch,
  type ItemRepository,
  type ItemStatus,
  type ListingCursor,
  type ListingFilter,
  type ListingStatus,
  type MarketListing,
  type MarketListingRepository,
  type MemberRole,
  type Membership,
  type MembershipRepository,
  type Message,
  type MessageAttachment,
  type MessageReaction,
  type MessageRepository,
  type ReactionRepository,
  type ReactionType,
  type ReferenceItem,
  type ReferenceItemRepository,
  type Repositories,
  type RowLock,
  type Thread,
  type ThreadRepository,
  type User,
  type UserRepository,
} from '@homestock/domain';
import { type MemoryTables, type MemoryTx } from './memory-database';
import { MemoryRelationStore } from './memory-relation-store';

/** Numeric order for decimal id strings. */
export function compareIds(a: string, b: string): number {
  return a.length - b.length || (a < b ? -1 : a > b ? 1 : 0);
}

function byCreation<T extends { id: string }>(at: (row: T) => Date): (a: T, b: T) => number {
  return (a, b) => at(a).getTime() - at(b).getTime() || compareIds(a.id, b.id);
}

function byNameThenId<T extends { id: string; name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : compareIds(a.id, b.id);
}

/** Mirrors a foreign-key violation; the constraint name follows Postgres' default naming. */
function requireRow(tables: MemoryTables, kind: EntityKind, id: string | null, constraint: string): void {
  if (id !== null && !tables[kind].has(id)) {
    throw new DomainError('REFERENCE_NOT_FOUND', 'Referenced row does not exist', { constraint });
  }
}

function membershipKey(groupId: string, userId: string): string {
  return `${groupId}:${userId}`;
}

function copy<T extends object>(row: T | undefined): T | null {
  return row ? { ...row } : null;
}

export class MemoryUserRepository implements UserRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    user: { id: string; loginId: string; credentialHash: string; displayName: string },
  ): Promise<User> {
    for (const existing of tx.tables.user.values()) {
      if (existing.loginId === user.loginId) {
        throw new DomainError('DUPLICATE_LOGIN', 'Login id already taken', { loginId: user.loginId });
      }
    }
    const now = new Date();
    const row: User = { ...user, createdAt: now, updatedAt: now };
    tx.tables.user.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<User | null> {
    return copy(tx.tables.user.get(id));
  }

  async findByLoginId(tx: MemoryTx, loginId: string): Promise<User | null> {
    for (const user of tx.tables.user.values()) {
      if (user.loginId === loginId) return { ...user };
    }
    return null;
  }

  async updateDisplayName(tx: MemoryTx, id: string, displayName: string): Promise<User | null> {
    const user = tx.tables.user.get(id);
    if (!user) return null;
    const updated: User = { ...user, displayName, updatedAt: new Date() };
    tx.tables.user.set(id, updated);
    return { ...updated };
  }
}

export class MemoryGroupRepository implements GroupRepository<MemoryTx> {
  async create(tx: MemoryTx, group: { id: string; name: string }): Promise<FamilyGroup> {
    const row: FamilyGroup = { ...group, createdAt: new Date() };
    tx.tables.group.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<FamilyGroup | null> {
    return copy(tx.tables.group.get(id));
  }

  async listForUser(tx: MemoryTx, userId: string): Promise<Array<FamilyGroup & { role: MemberRole }>> {
    const result: Array<FamilyGroup & { role: MemberRole }> = [];
    for (const member of tx.tables.membership.values()) {
      const group = tx.tables.group.get(member.groupId);
      if (member.userId === userId && group) {
        result.push({ ...group, role: member.role });
      }
    }
    return result.sort(byNameThenId);
  }
}

export class MemoryMembershipRepository implements MembershipRepository<MemoryTx> {
  async add(tx: MemoryTx, member: { userId: string; groupId: string; role: MemberRole }): Promise<Membership> {
    const key = membershipKey(member.groupId, member.userId);
    if (tx.tables.membership.has(key)) {
      throw new DomainError('DUPLICATE_MEMBERSHIP', 'User is already a member of the group', {
        userId: member.userId,
        groupId: member.groupId,
      });
    }
    requireRow(tx.tables, 'user', member.userId, 'memberships_user_id_fkey');
    requireRow(tx.tables, 'group', member.groupId, 'memberships_group_id_fkey');
    const row: Membership = { ...member, joinedAt: new Date() };
    tx.tables.membership.set(key, row);
    return { ...row };
  }

  async find(tx: MemoryTx, groupId: string, userId: string): Promise<Membership | null> {
    return copy(tx.tables.membership.get(membershipKey(groupId, userId)));
  }

  /** Transactions already run one at a time, so the lock is implied. */
  async findLocked(tx: MemoryTx, groupId: string, userId: string, _lock: RowLock): Promise<Membership | null> {
    return this.find(tx, groupId, userId);
  }

  async updateRole(tx: MemoryTx, groupId: string, userId: string, role: MemberRole): Promise<Membership | null> {
    const key = membershipKey(groupId, userId);
    const member = tx.tables.membership.get(key);
    if (!member) return null;
    const updated: Membership = { ...member, role };
    tx.tables.membership.set(key, updated);
    return { ...updated };
  }

  async remove(tx: MemoryTx, groupId: string, userId: string): Promise<boolean> {
    return tx.tables.membership.delete(membershipKey(groupId, userId));
  }

  async listByGroup(tx: MemoryTx, groupId: string): Promise<Membership[]> {
    return [...tx.tables.membership.values()]
      .filter((member) => member.groupId === groupId)
      .sort((a, b) => a.joinedAt.getTime() - b.joinedAt.getTime() || compareIds(a.userId, b.userId))
      .map((member) => ({ ...member }));
  }
}

export class MemoryCategoryRepository implements CategoryRepository<MemoryTx> {
  async create(tx: MemoryTx, category: { id: string; name: string; parentId: string | null }): Promise<Category> {
    requireRow(tx.tables, 'category', category.parentId, 'categories_parent_id_fkey');
    tx.tables.category.set(category.id, { ...category });
    return { ...category };
  }

  async findById(tx: MemoryTx, id: string): Promise<Category | null> {
    return copy(tx.tables.category.get(id));
  }

  async listRoots(tx: MemoryTx): Promise<Category[]> {
    return [...tx.tables.category.values()]
      .filter((category) => category.parentId === null)
      .sort(byNameThenId)
      .map((category) => ({ ...category }));
  }

  async listChildren(tx: MemoryTx, parentIds: string[]): Promise<Category[]> {
    const parents = new Set(parentIds);
    return [...tx.tables.category.values()]
      .filter((category) => category.parentId !== null && parents.has(category.parentId))
      .sort(byNameThenId)
      .map((category) => ({ ...category }));
  }

  async updateParent(tx: MemoryTx, id: string, parentId: string | null): Promise<void> {
    const category = tx.tables.category.get(id);
    if (!category) return;
    requireRow(tx.tables, 'category', parentId, 'categories_parent_id_fkey');
    tx.tables.category.set(id, { ...category, parentId });
  }

  async rename(tx: MemoryTx, id: string, name: string): Promise<Category | null> {
    const category = tx.tables.category.get(id);
    if (!category) return null;
    const updated: Category = { ...category, name };
    tx.tables.category.set(id, updated);
    return { ...updated };
  }

  /** Transactions are already serialized. */
  async lockTree(): Promise<void> {}
}

export class MemoryReferenceItemRepository implements ReferenceItemRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    item: { id: string; categoryId: string; name: string; brand: string | null },
  ): Promise<ReferenceItem> {
    requireRow(tx.tables, 'category', item.categoryId, 'reference_items_category_id_fkey');
    const row: ReferenceItem = { ...item, createdAt: new Date() };
    tx.tables.referenceItem.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<ReferenceItem | null> {
    return copy(tx.tables.referenceItem.get(id));
  }

  async listByCategory(tx: MemoryTx, categoryId: string): Promise<ReferenceItem[]> {
    return [...tx.tables.referenceItem.values()]
      .filter((item) => item.categoryId === categoryId)
      .sort(byNameThenId)
      .map((item) => ({ ...item }));
  }
}

/** Listing date descending, then id descending. */
function newestFirst(a: { listingDate: string; id: string }, b: { listingDate: string; id: string }): number {
  if (a.listingDate !== b.listingDate) return a.listingDate < b.listingDate ? 1 : -1;
  return compareIds(b.id, a.id);
}

export class MemoryMarketListingRepository implements MarketListingRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    listing: {
      id: string;
      refItemId: string;
      price: string;
      condition: ConditionRank;
      listingDate: string;
      status: ListingStatus;
    },
  ): Promise<MarketListing> {
    requireRow(tx.tables, 'referenceItem', listing.refItemId, 'market_listings_ref_item_id_fkey');
    const row: MarketListing = { ...listing, createdAt: new Date() };
    tx.tables.listing.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<MarketListing | null> {
    return copy(tx.tables.listing.get(id));
  }

  async updateStatus(tx: MemoryTx, id: string, status: ListingStatus): Promise<MarketListing | null> {
    const listing = tx.tables.listing.get(id);
    if (!listing) return null;
    const updated: MarketListing = { ...listing, status };
    tx.tables.listing.set(id, updated);
    return { ...updated };
  }

  async listPage(
    tx: MemoryTx,
    refItemId: string,
    filter: ListingFilter,
    cursor: ListingCursor | null,
    limit: number,
  ): Promise<MarketListing[]> {
    return [...tx.tables.listing.values()]
      .filter(
        (listing) =>
          listing.refItemId === refItemId &&
          (filter.status === undefined || listing.status === filter.status) &&
          (filter.from === undefined || listing.listingDate >= filter.from) &&
          (filter.to === undefined || listing.listingDate <= filter.to) &&
          (cursor === null || newestFirst(listing, cursor) > 0),
      )
      .sort(newestFirst)
      .slice(0, limit)
      .map((listing) => ({ ...listing }));
  }
}

const byItemCreation = byCreation<Item>((item) => item.createdAt);

export class MemoryItemRepository implements ItemRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
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
  ): Promise<Item> {
    requireRow(tx.tables, 'user', item.ownerId, 'items_owner_id_fkey');
    requireRow(tx.tables, 'group', item.groupId, 'items_group_id_fkey');
    requireRow(tx.tables, 'referenceItem', item.refItemId, 'items_ref_item_id_fkey');
    requireRow(tx.tables, 'category', item.categoryId, 'items_category_id_fkey');
    const now = new Date();
    const row: Item = { ...item, status: 'active', createdAt: now, updatedAt: now };
    tx.tables.item.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<Item | null> {
    return copy(tx.tables.item.get(id));
  }

  async update(tx: MemoryTx, id: string, patch: ItemPatch): Promise<Item | null> {
    const item = tx.tables.item.get(id);
    if (!item) return null;
    if (patch.refItemId !== undefined) {
      requireRow(tx.tables, 'referenceItem', patch.refItemId, 'items_ref_item_id_fkey');
    }
    if (patch.categoryId !== undefined) {
      requireRow(tx.tables, 'category', patch.categoryId, 'items_category_id_fkey');
    }
    const updated: Item = { ...item, updatedAt: new Date() };
    if (patch.name !== undefined) updated.name = patch.name;
    if (patch.description !== undefined) updated.description = patch.description;
    if (patch.condition !== undefined) updated.condition = patch.condition;
    if (patch.refItemId !== undefined) updated.refItemId = patch.refItemId;
    if (patch.categoryId !== undefined) updated.categoryId = patch.categoryId;
    if (patch.status !== undefined) updated.status = patch.status;
    tx.tables.item.set(id, updated);
    return { ...updated };
  }

  async listByGroup(tx: MemoryTx, groupId: string, opts: { status?: ItemStatus }): Promise<Item[]> {
    return [...tx.tables.item.values()]
      .filter((item) => item.groupId === groupId && (opts.status === undefined || item.status === opts.status))
      .sort(byItemCreation)
      .map((item) => ({ ...item }));
  }

  async listOwnedIds(tx: MemoryTx, groupId: string, ownerId: string): Promise<string[]> {
    return [...tx.tables.item.values()]
      .filter((item) => item.groupId === groupId && item.ownerId === ownerId)
      .sort(byItemCreation)
      .map((item) => item.id);
  }
}

export class MemoryItemImageRepository implements ItemImageRepository<MemoryTx> {
  async create(tx: MemoryTx, image: { id: string; itemId: string; blobHandle: string }): Promise<ItemImage> {
    requireRow(tx.tables, 'item', image.itemId, 'item_images_item_id_fkey');
    const row: ItemImage = { ...image, uploadedAt: new Date() };
    tx.tables.itemImage.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<ItemImage | null> {
    return copy(tx.tables.itemImage.get(id));
  }

  async listByItem(tx: MemoryTx, itemId: string): Promise<ItemImage[]> {
    return [...tx.tables.itemImage.values()]
      .filter((image) => image.itemId === itemId)
      .sort(byCreation<ItemImage>((image) => image.uploadedAt))
      .map((image) => ({ ...image }));
  }
}

export class MemoryThreadRepository implements ThreadRepository<MemoryTx> {
  async createIfAbsent(
    tx: MemoryTx,
    thread: { id: string; itemId: string; title: string | null },
  ): Promise<{ thread: Thread; created: boolean }> {
    const existing = await this.findByItem(tx, thread.itemId);
    if (existing) return { thread: existing, created: false };

    requireRow(tx.tables, 'item', thread.itemId, 'threads_item_id_fkey');
    const now = new Date();
    const row: Thread = { ...thread, createdAt: now, updatedAt: now };
    tx.tables.thread.set(row.id, row);
    return { thread: { ...row }, created: true };
  }

  async findById(tx: MemoryTx, id: string): Promise<Thread | null> {
    return copy(tx.tables.thread.get(id));
  }

  async findByItem(tx: MemoryTx, itemId: string): Promise<Thread | null> {
    for (const thread of tx.tables.thread.values()) {
      if (thread.itemId === itemId) return { ...thread };
    }
    return null;
  }

  async touch(tx: MemoryTx, id: string): Promise<void> {
    const thread = tx.tables.thread.get(id);
    if (thread) tx.tables.thread.set(id, { ...thread, updatedAt: new Date() });
  }
}

export class MemoryMessageRepository implements MessageRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    msg: { id: string; threadId: string; authorId: string; parentId: string | null; content: string },
  ): Promise<Message> {
    requireRow(tx.tables, 'thread', msg.threadId, 'messages_thread_id_fkey');
    requireRow(tx.tables, 'user', msg.authorId, 'messages_author_id_fkey');
    requireRow(tx.tables, 'message', msg.parentId, 'messages_parent_id_fkey');
    const now = new Date();
    const row: Message = { ...msg, isEdited: false, createdAt: now, updatedAt: now };
    tx.tables.message.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<Message | null> {
    return copy(tx.tables.message.get(id));
  }

  async listByThread(tx: MemoryTx, threadId: string): Promise<Message[]> {
    return [...tx.tables.message.values()]
      .filter((message) => message.threadId === threadId)
      .sort(byCreation<Message>((message) => message.createdAt))
      .map((message) => ({ ...message }));
  }

  async updateContent(tx: MemoryTx, id: string, content: string): Promise<Message | null> {
    return this.patch(tx, id, { content, isEdited: true });
  }

  async updateParent(tx: MemoryTx, id: string, parentId: string | null): Promise<Message | null> {
    requireRow(tx.tables, 'message', parentId, 'messages_parent_id_fkey');
    return this.patch(tx, id, { parentId });
  }

  async liftReplies(tx: MemoryTx, parentId: string, newParentId: string | null): Promise<number> {
    let lifted = 0;
    for (const message of [...tx.tables.message.values()]) {
      if (message.parentId !== parentId) continue;
      tx.tables.message.set(message.id, { ...message, parentId: newParentId, updatedAt: new Date() });
      lifted++;
    }
    return lifted;
  }

  private patch(tx: MemoryTx, id: string, changes: Partial<Message>): Message | null {
    const message = tx.tables.message.get(id);
    if (!message) return null;
    const updated: Message = { ...message, ...changes, updatedAt: new Date() };
    tx.tables.message.set(id, updated);
    return { ...updated };
  }
}

export class MemoryReactionRepository implements ReactionRepository<MemoryTx> {
  async add(
    tx: MemoryTx,
    reaction: { id: string; messageId: string; userId: string; type: ReactionType },
  ): Promise<MessageReaction> {
    for (const existing of tx.tables.reaction.values()) {
      if (
        existing.messageId === reaction.messageId &&
        existing.userId === reaction.userId &&
        existing.type === reaction.type
      ) {
        throw new DomainError('DUPLICATE_REACTION', 'Reaction already exists', {
          messageId: reaction.messageId,
          userId: reaction.userId,
          type: reaction.type,
        });
      }
    }
    requireRow(tx.tables, 'message', reaction.messageId, 'message_reactions_message_id_fkey');
    requireRow(tx.tables, 'user', reaction.userId, 'message_reactions_user_id_fkey');
    const row: MessageReaction = { ...reaction, createdAt: new Date() };
    tx.tables.reaction.set(row.id, row);
    return { ...row };
  }

  async remove(tx: MemoryTx, messageId: string, userId: string, type: ReactionType): Promise<boolean> {
    for (const [id, reaction] of tx.tables.reaction) {
      if (reaction.messageId === messageId && reaction.userId === userId && reaction.type === type) {
        return tx.tables.reaction.delete(id);
      }
    }
    return false;
  }

  async listByMessage(tx: MemoryTx, messageId: string): Promise<MessageReaction[]> {
    return [...tx.tables.reaction.values()]
      .filter((reaction) => reaction.messageId === messageId)
      .sort(byCreation<MessageReaction>((reaction) => reaction.createdAt))
      .map((reaction) => ({ ...reaction }));
  }
}

export class MemoryAttachmentRepository implements AttachmentRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    attachment: { id: string; messageId: string; blobHandle: string },
  ): Promise<MessageAttachment> {
    requireRow(tx.tables, 'message', attachment.messageId, 'message_attachments_message_id_fkey');
    const row: MessageAttachment = { ...attachment, uploadedAt: new Date() };
    tx.tables.attachment.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<MessageAttachment | null> {
    return copy(tx.tables.attachment.get(id));
  }

  async listByMessage(tx: MemoryTx, messageId: string): Promise<MessageAttachment[]> {
    return [...tx.tables.attachment.values()]
      .filter((attachment) => attachment.messageId === messageId)
      .sort(byCreation<MessageAttachment>((attachment) => attachment.uploadedAt))
      .map((attachment) => ({ ...attachment }));
  }
}

export function createMemoryRepositories(): Repositories<MemoryTx> {
  return {
    users: new MemoryUserRepository(),
    groups: new MemoryGroupRepository(),
    memberships: new MemoryMembershipRepository(),
    categories: new MemoryCategoryRepository(),
    referenceItems: new MemoryReferenceItemRepository(),
    listings: new MemoryMarketListingRepository(),
    items: new MemoryItemRepository(),
    itemImages: new MemoryItemImageRepository(),
    threads: new MemoryThreadRepository(),
    messages: new MemoryMessageRepository(),
    reactions: new MemoryReactionRepository(),
    attachments: new MemoryAttachmentRepository(),
    relations: new MemoryRelationStore(),
  };
}

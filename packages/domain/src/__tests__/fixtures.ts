import { vi } from 'vitest';
import { type User } from '../user';
import { type FamilyGroup, type Membership } from '../group';
import { type Category, type ReferenceItem, type MarketListing } from '../catalog';
import { type Item, type ItemImage } from '../item';
import { type Thread, type Message, type MessageReaction, type MessageAttachment } from '../discussion';
import {
  type BlobStore,
  type LoggerPort,
  type Repositories,
  type TransactionRunner,
} from '../ports';

export interface FakeTx {
  seq: number;
}

const at = new Date('2026-03-01T10:00:00Z');

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: '1', loginId: 'alice@example.com', credentialHash: 'hashed:test-secret', displayName: 'Alice',
    createdAt: at, updatedAt: at,
    ...overrides,
  };
}

export function makeGroup(overrides: Partial<FamilyGroup> = {}): FamilyGroup {
  return { id: '10', name: 'Home', createdAt: at, ...overrides };
}

export function makeMembership(overrides: Partial<Membership> = {}): Membership {
  return { userId: '1', groupId: '10', role: 'poster', joinedAt: at, ...overrides };
}

export function makeCategory(overrides: Partial<Category> = {}): Category {
  return { id: '20', name: 'Furniture', parentId: null, ...overrides };
}

export function makeReferenceItem(overrides: Partial<ReferenceItem> = {}): ReferenceItem {
  return { id: '30', categoryId: '20', name: 'Three-seat sofa', brand: null, createdAt: at, ...overrides };
}

export function makeListing(overrides: Partial<MarketListing> = {}): MarketListing {
  return {
    id: '40', refItemId: '30', price: '120.00', condition: 'B', listingDate: '2026-02-01',
    status: 'active', createdAt: at,
    ...overrides,
  };
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: '50', ownerId: '1', groupId: '10', refItemId: null, categoryId: null, name: 'Sofa',
    description: null, condition: null, status: 'active', createdAt: at, updatedAt: at,
    ...overrides,
  };
}

export function makeImage(overrides: Partial<ItemImage> = {}): ItemImage {
  return { id: '55', itemId: '50', blobHandle: 'blob-1', uploadedAt: at, ...overrides };
}

export function makeThread(overrides: Partial<Thread> = {}): Thread {
  return { id: '60', itemId: '50', title: null, createdAt: at, updatedAt: at, ...overrides };
}

export function makeMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: '70', threadId: '60', authorId: '1', parentId: null, content: 'selling?', isEdited: false,
    createdAt: at, updatedAt: at,
    ...overrides,
  };
}

export function makeReaction(overrides: Partial<MessageReaction> = {}): MessageReaction {
  return { id: '80', messageId: '70', userId: '1', type: 'like', createdAt: at, ...overrides };
}

export function makeAttachment(overrides: Partial<MessageAttachment> = {}): MessageAttachment {
  return { id: '90', messageId: '70', blobHandle: 'blob-2', uploadedAt: at, ...overrides };
}

/** Every repository method is a `vi.fn` answering with the default fixtures above. */
export function createMockRepositories(): Repositories<FakeTx> {
  type R = Repositories<FakeTx>;
  return {
    users: {
      create: vi.fn<R['users']['create']>(async (_tx, u) => makeUser(u)),
      findById: vi.fn<R['users']['findById']>(async () => makeUser()),
      findByLoginId: vi.fn<R['users']['findByLoginId']>(async () => makeUser()),
      updateDisplayName: vi.fn<R['users']['updateDisplayName']>(async (_tx, id, displayName) =>
        makeUser({ id, displayName }),
      ),
    },
    groups: {
      create: vi.fn<R['groups']['create']>(async (_tx, g) => makeGroup(g)),
      findById: vi.fn<R['groups']['findById']>(async () => makeGroup()),
      listForUser: vi.fn<R['groups']['listForUser']>(async () => [{ ...makeGroup(), role: 'poster' as const }]),
    },
    memberships: {
      add: vi.fn<R['memberships']['add']>(async (_tx, m) => makeMembership(m)),
      find: vi.fn<R['memberships']['find']>(async (_tx, groupId, userId) => makeMembership({ groupId, userId })),
      findLocked: vi.fn<R['memberships']['findLocked']>(async (_tx, groupId, userId) =>
        makeMembership({ groupId, userId }),
      ),
      updateRole: vi.fn<R['memberships']['updateRole']>(async (_tx, groupId, userId, role) =>
        makeMembership({ groupId, userId, role }),
      ),
      remove: vi.fn<R['memberships']['remove']>(async () => true),
      listByGroup: vi.fn<R['memberships']['listByGroup']>(async () => [makeMembership()]),
    },
    categories: {
      create: vi.fn<R['categories']['create']>(async (_tx, c) => makeCategory(c)),
      findById: vi.fn<R['categories']['findById']>(async (_tx, id) => makeCategory({ id })),
      listRoots: vi.fn<R['categories']['listRoots']>(async () => [makeCategory()]),
      listChildren: vi.fn<R['categories']['listChildren']>(async () => []),
      updateParent: vi.fn<R['categories']['updateParent']>(async () => {}),
      rename: vi.fn<R['categories']['rename']>(async (_tx, id, name) => makeCategory({ id, name })),
      lockTree: vi.fn<R['categories']['lockTree']>(async () => {}),
    },
    referenceItems: {
      create: vi.fn<R['referenceItems']['create']>(async (_tx, r) => makeReferenceItem(r)),
      findById: vi.fn<R['referenceItems']['findById']>(async (_tx, id) => makeReferenceItem({ id })),
      listByCategory: vi.fn<R['referenceItems']['listByCategory']>(async () => [makeReferenceItem()]),
    },
    listings: {
      create: vi.fn<R['listings']['create']>(async (_tx, l) => makeListing(l)),
      findById: vi.fn<R['listings']['findById']>(async (_tx, id) => makeListing({ id })),
      updateStatus: vi.fn<R['listings']['updateStatus']>(async (_tx, id, status) => makeListing({ id, status })),
      listPage: vi.fn<R['listings']['listPage']>(async () => []),
    },
    items: {
      create: vi.fn<R['items']['create']>(async (_tx, i) => makeItem(i)),
      findById: vi.fn<R['items']['findById']>(async (_tx, id) => makeItem({ id })),
      update: vi.fn<R['items']['update']>(async (_tx, id, patch) => makeItem({ id, ...patch })),
      listByGroup: vi.fn<R['items']['listByGroup']>(async () => [makeItem()]),
      listOwnedIds: vi.fn<R['items']['listOwnedIds']>(async () => []),
    },
    itemImages: {
      create: vi.fn<R['itemImages']['create']>(async (_tx, i) => makeImage(i)),
      findById: vi.fn<R['itemImages']['findById']>(async (_tx, id) => makeImage({ id })),
      listByItem: vi.fn<R['itemImages']['listByItem']>(async () => [makeImage()]),
    },
    threads: {
      createIfAbsent: vi.fn<R['threads']['createIfAbsent']>(async (_tx, t) => ({ thread: makeThread(t), created: true })),
      findById: vi.fn<R['threads']['findById']>(async (_tx, id) => makeThread({ id })),
      findByItem: vi.fn<R['threads']['findByItem']>(async () => null),
      touch: vi.fn<R['threads']['touch']>(async () => {}),
    },
    messages: {
      create: vi.fn<R['messages']['create']>(async (_tx, m) => makeMessage(m)),
      findById: vi.fn<R['messages']['findById']>(async (_tx, id) => makeMessage({ id })),
      listByThread: vi.fn<R['messages']['listByThread']>(async () => [makeMessage()]),
      updateContent: vi.fn<R['messages']['updateContent']>(async (_tx, id, content) =>
        makeMessage({ id, content, isEdited: true }),
      ),
      updateParent: vi.fn<R['messages']['updateParent']>(async (_tx, id, parentId) => makeMessage({ id, parentId })),
      liftReplies: vi.fn<R['messages']['liftReplies']>(async () => 0),
    },
    reactions: {
      add: vi.fn<R['reactions']['add']>(async (_tx, r) => makeReaction(r)),
      remove: vi.fn<R['reactions']['remove']>(async () => true),
      listByMessage: vi.fn<R['reactions']['listByMessage']>(async () => [makeReaction()]),
    },
    attachments: {
      create: vi.fn<R['attachments']['create']>(async (_tx, a) => makeAttachment(a)),
      findById: vi.fn<R['attachments']['findById']>(async (_tx, id) => makeAttachment({ id })),
      listByMessage: vi.fn<R['attachments']['listByMessage']>(async () => [makeAttachment()]),
    },
    relations: {
      findIds: vi.fn<R['relations']['findIds']>(async () => []),
      countWhere: vi.fn<R['relations']['countWhere']>(async () => 0),
      deleteWhere: vi.fn<R['relations']['deleteWhere']>(async (_tx, _kind, _field, values) => values.length),
      clearField: vi.fn<R['relations']['clearField']>(async () => 0),
      blobHandlesWhere: vi.fn<R['relations']['blobHandlesWhere']>(async () => []),
    },
  };
}

export function createMockLogger(): LoggerPort {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createMockBlobStore(): BlobStore {
  let counter = 0;
  return {
    storeBlob: vi.fn<BlobStore['storeBlob']>(async () => `blob-${++counter}`),
    fetchBlob: vi.fn<BlobStore['fetchBlob']>(async () => new Uint8Array([1, 2, 3])),
    deleteBlob: vi.fn<BlobStore['deleteBlob']>(async () => {}),
  };
}

/** Runs the callback directly and records how many transactions were opened. */
export function createFakeTransactions(): { withTransaction: TransactionRunner<FakeTx>; count: () => number } {
  let seq = 0;
  const withTransaction: TransactionRunner<FakeTx> = async (fn) => fn({ seq: ++seq });
  return { withTransaction, count: () => seq };
}

export function createIdGenerator(start = 1000): () => string {
  let next = start;
  return () => String(next++);
}

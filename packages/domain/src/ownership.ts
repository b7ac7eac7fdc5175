export type EntityKind =
  | 'user'
  | 'group'
  | 'membership'
  | 'category'
  | 'referenceItem'
  | 'listing'
  | 'item'
  | 'itemImage'
  | 'thread'
  | 'message'
  | 'reaction'
  | 'attachment';

/** Foreign-key fields, named as on the entities. `id` addresses a row directly. */
export type LinkField =
  | 'id'
  | 'userId'
  | 'groupId'
  | 'ownerId'
  | 'authorId'
  | 'parentId'
  | 'categoryId'
  | 'refItemId'
  | 'itemId'
  | 'threadId'
  | 'messageId';

export interface EntityRef {
  kind: EntityKind;
  id: string;
}

/** `owner` owns every `owned` row whose `via` field points at it. */
export interface OwnsEdge {
  owner: EntityKind;
  owned: EntityKind;
  via: LinkField;
}

/**
 * Non-owning link from `from.via` to `to`. `restrict` blocks deletion of the
 * target while referenced; `detach` clears the field instead.
 */
export interface ReferenceEdge {
  from: EntityKind;
  via: LinkField;
  to: EntityKind;
  onDelete: 'restrict' | 'detach';
}

export const OWNS_EDGES: readonly OwnsEdge[] = [
  { owner: 'user', owned: 'membership', via: 'userId' },
  { owner: 'user', owned: 'item', via: 'ownerId' },
  { owner: 'user', owned: 'message', via: 'authorId' },
  { owner: 'user', owned: 'reaction', via: 'userId' },
  { owner: 'group', owned: 'membership', via: 'groupId' },
  { owner: 'group', owned: 'item', via: 'groupId' },
  { owner: 'referenceItem', owned: 'listing', via: 'refItemId' },
  { owner: 'item', owned: 'itemImage', via: 'itemId' },
  { owner: 'item', owned: 'thread', via: 'itemId' },
  { owner: 'thread', owned: 'message', via: 'threadId' },
  { owner: 'message', owned: 'reaction', via: 'messageId' },
  { owner: 'message', owned: 'attachment', via: 'messageId' },
];

export const REFERENCE_EDGES: readonly ReferenceEdge[] = [
  { from: 'category', via: 'parentId', to: 'category', onDelete: 'restrict' },
  { from: 'referenceItem', via: 'categoryId', to: 'category', onDelete: 'restrict' },
  { from: 'item', via: 'categoryId', to: 'category', onDelete: 'restrict' },
  { from: 'item', via: 'refItemId', to: 'referenceItem', onDelete: 'restrict' },
  { from: 'message', via: 'parentId', to: 'message', onDelete: 'detach' },
];

/** Kinds whose rows carry an opaque blob handle that outlives the row in storage. */
export const BLOB_KINDS: ReadonlySet<EntityKind> = new Set(['itemImage', 'attachment']);

export function ownedEdgesOf(kind: EntityKind): OwnsEdge[] {
  return OWNS_EDGES.filter((edge) => edge.owner === kind);
}

export function referencesTo(kind: EntityKind): ReferenceEdge[] {
  return REFERENCE_EDGES.filter((edge) => edge.to === kind);
}

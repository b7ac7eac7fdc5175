import { type ConditionRank, type ItemStatus } from './enums';

export interface Item {
  id: string;
  ownerId: string;
  groupId: string;
  refItemId: string | null;
  categoryId: string | null;
  name: string;
  description: string | null;
  condition: ConditionRank | null;
  status: ItemStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface ItemImage {
  id: string;
  itemId: string;
  blobHandle: string;
  uploadedAt: Date;
}

export type ItemPatch = Partial<
  Pick<Item, 'name' | 'description' | 'condition' | 'refItemId' | 'categoryId' | 'status'>
>;

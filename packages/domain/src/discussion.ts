import { type ReactionType } from './enums';

export interface Thread {
  id: string;
  itemId: string;
  title: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Message {
  id: string;
  threadId: string;
  authorId: string;
  parentId: string | null;
  content: string;
  isEdited: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface MessageReaction {
  id: string;
  messageId: string;
  userId: string;
  type: ReactionType;
  createdAt: Date;
}

export interface MessageAttachment {
  id: string;
  messageId: string;
  blobHandle: string;
  uploadedAt: Date;
}

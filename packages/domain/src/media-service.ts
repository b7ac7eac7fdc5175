import { type Item, type ItemImage } from './item';
import { type Message, type MessageAttachment } from './discussion';
import {
  type AttachmentRepository,
  type ItemImageRepository,
  type ItemRepository,
  type MembershipRepository,
  type MessageRepository,
  type ThreadRepository,
} from './ports';
import { type Capability } from './enums';
import { DomainError } from './errors';
import { requireCapability } from './permissions';
import { deleteAtomically, releaseBlobs, type CascadeReport, type DeletionDeps } from './cascade';
import { isId } from './validation';

export interface MediaServiceDeps<Tx> extends DeletionDeps<Tx> {
  itemRepo: ItemRepository<Tx>;
  imageRepo: ItemImageRepository<Tx>;
  threadRepo: ThreadRepository<Tx>;
  messageRepo: MessageRepository<Tx>;
  attachmentRepo: AttachmentRepository<Tx>;
  memberRepo: MembershipRepository<Tx>;
  generateId: () => string;
}

/** Blob payloads are opaque here; only handles are persisted. */
export class MediaService<Tx> {
  constructor(private readonly deps: MediaServiceDeps<Tx>) {}

  async storeBlob(bytes: Uint8Array): Promise<string> {
    return this.deps.blobStore.storeBlob(bytes);
  }

  async fetchBlob(handle: string): Promise<Uint8Array> {
    return this.deps.blobStore.fetchBlob(handle);
  }

  async deleteBlob(handle: string): Promise<void> {
    return this.deps.blobStore.deleteBlob(handle);
  }

  async addItemImage(actorId: string, itemId: string, bytes: Uint8Array): Promise<ItemImage> {
    return this.withUploadedBlob(bytes, async (tx, blobHandle) => {
      await this.loadItem(tx, actorId, itemId, 'write');
      return this.deps.imageRepo.create(tx, { id: this.deps.generateId(), itemId, blobHandle });
    });
  }

  async listItemImages(actorId: string, itemId: string): Promise<ItemImage[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.loadItem(tx, actorId, itemId, 'read');
      return this.deps.imageRepo.listByItem(tx, itemId);
    });
  }

  async removeItemImage(actorId: string, imageId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'itemImage', id: imageId }, async (tx) => {
      const image = isId(imageId) ? await this.deps.imageRepo.findById(tx, imageId) : null;
      if (!image) {
        throw new DomainError('IMAGE_NOT_FOUND', 'Image not found', { imageId });
      }
      await this.loadItem(tx, actorId, image.itemId, 'write');
    });
  }

  /** Only the message's author may attach, and only while holding `write`. */
  async addMessageAttachment(actorId: string, messageId: string, bytes: Uint8Array): Promise<MessageAttachment> {
    return this.withUploadedBlob(bytes, async (tx, blobHandle) => {
      const message = await this.loadMessage(tx, actorId, messageId, 'write');
      if (message.authorId !== actorId) {
        throw new DomainError('NOT_AUTHORIZED', 'Only the author may attach files to a message', {
          userId: actorId,
          messageId,
          action: 'attach',
        });
      }
      return this.deps.attachmentRepo.create(tx, { id: this.deps.generateId(), messageId, blobHandle });
    });
  }

  async listMessageAttachments(actorId: string, messageId: string): Promise<MessageAttachment[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.loadMessage(tx, actorId, messageId, 'read');
      return this.deps.attachmentRepo.listByMessage(tx, messageId);
    });
  }

  /**
   * Uploads before the transaction opens so no row ever points at a missing blob.
   * If the transaction fails the freshly stored blob is released again.
   */
  private async withUploadedBlob<T>(bytes: Uint8Array, fn: (tx: Tx, blobHandle: string) => Promise<T>): Promise<T> {
    const blobHandle = await this.deps.blobStore.storeBlob(bytes);
    try {
      return await this.deps.withTransaction((tx) => fn(tx, blobHandle));
    } catch (err) {
      await releaseBlobs(this.deps, [blobHandle]);
      throw err;
    }
  }

  private async loadItem(tx: Tx, actorId: string, itemId: string, capability: Capability): Promise<Item> {
    const item = isId(itemId) ? await this.deps.itemRepo.findById(tx, itemId) : null;
    if (!item) {
      throw new DomainError('ITEM_NOT_FOUND', 'Item not found', { itemId });
    }
    await requireCapability(this.deps.memberRepo, tx, actorId, item.groupId, capability);
    return item;
  }

  private async loadMessage(tx: Tx, actorId: string, messageId: string, capability: Capability): Promise<Message> {
    const message = isId(messageId) ? await this.deps.messageRepo.findById(tx, messageId) : null;
    if (!message) {
      throw new DomainError('MESSAGE_NOT_FOUND', 'Message not found', { messageId });
    }
    const thread = await this.deps.threadRepo.findById(tx, message.threadId);
    if (!thread) {
      throw new DomainError('THREAD_NOT_FOUND', 'Thread not found', { threadId: message.threadId });
    }
    await this.loadItem(tx, actorId, thread.itemId, capability);
    return message;
  }
}

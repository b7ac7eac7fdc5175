import { type Item } from './item';
import { type Message, type MessageReaction, type Thread } from './discussion';
import {
  type ItemRepository,
  type MembershipRepository,
  type MessageRepository,
  type ReactionRepository,
  type ThreadRepository,
} from './ports';
import { ReactionTypeSchema, parseEnum, type Capability, type ReactionType } from './enums';
import { DomainError } from './errors';
import { requireCapability } from './permissions';
import { climb } from './traversal';
import { deleteAtomically, type CascadeReport, type DeletionDeps } from './cascade';
import { MessageContentSchema, ThreadTitleSchema, isId, parseInput } from './validation';

export interface DiscussionServiceDeps<Tx> extends DeletionDeps<Tx> {
  itemRepo: ItemRepository<Tx>;
  threadRepo: ThreadRepository<Tx>;
  messageRepo: MessageRepository<Tx>;
  reactionRepo: ReactionRepository<Tx>;
  memberRepo: MembershipRepository<Tx>;
  generateId: () => string;
  maxTraversalDepth: number;
}

export class DiscussionService<Tx> {
  constructor(private readonly deps: DiscussionServiceDeps<Tx>) {}

  /** Returns the item's thread, creating it on first call. */
  async openThread(actorId: string, itemId: string, title?: string | null): Promise<Thread> {
    const threadTitle = parseInput(ThreadTitleSchema, title);
    return this.deps.withTransaction(async (tx) => {
      await this.loadItem(tx, actorId, itemId, 'write');
      return this.ensureThread(tx, itemId, threadTitle || null);
    });
  }

  async getThread(actorId: string, threadId: string): Promise<Thread> {
    return this.deps.withTransaction(async (tx) => {
      const thread = await this.loadThread(tx, threadId);
      await this.loadItem(tx, actorId, thread.itemId, 'read');
      return thread;
    });
  }

  async findThreadForItem(actorId: string, itemId: string): Promise<Thread | null> {
    return this.deps.withTransaction(async (tx) => {
      await this.loadItem(tx, actorId, itemId, 'read');
      return this.deps.threadRepo.findByItem(tx, itemId);
    });
  }

  async postMessage(threadId: string, authorId: string, content: string, parentId?: string | null): Promise<Message> {
    const text = parseInput(MessageContentSchema, content);
    const parent = parentId ?? null;
    return this.deps.withTransaction(async (tx) => {
      const thread = await this.loadThread(tx, threadId);
      await this.loadItem(tx, authorId, thread.itemId, postingCapability(parent));
      return this.insertMessage(tx, thread, authorId, text, parent);
    });
  }

  /**
   * Posts into the item's thread, opening it if this is the first message.
   * A reply never opens a thread.
   */
  async postToItem(itemId: string, authorId: string, content: string, parentId?: string | null): Promise<Message> {
    const text = parseInput(MessageContentSchema, content);
    const parent = parentId ?? null;
    return this.deps.withTransaction(async (tx) => {
      await this.loadItem(tx, authorId, itemId, postingCapability(parent));
      const thread = parent === null ? await this.ensureThread(tx, itemId, null) : await this.threadOf(tx, itemId);
      return this.insertMessage(tx, thread, authorId, text, parent);
    });
  }

  async editMessage(actorId: string, messageId: string, content: string): Promise<Message> {
    const text = parseInput(MessageContentSchema, content);
    return this.deps.withTransaction(async (tx) => {
      const message = await this.loadOwnMessage(tx, actorId, messageId, 'edit');
      const updated = await this.deps.messageRepo.updateContent(tx, messageId, text);
      if (!updated) {
        throw new DomainError('MESSAGE_NOT_FOUND', 'Message not found', { messageId });
      }
      await this.deps.threadRepo.touch(tx, message.threadId);
      return updated;
    });
  }

  /**
   * Moves a message under another message of the same thread, or to the top level
   * for `null`. The new parent's chain is walked first so no message becomes its
   * own ancestor.
   */
  async reparentMessage(actorId: string, messageId: string, newParentId: string | null): Promise<Message> {
    const { messageRepo, maxTraversalDepth } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const message = await this.loadOwnMessage(tx, actorId, messageId, 'reparent');

      if (newParentId !== null) {
        if (newParentId === messageId) {
          throw new DomainError('SELF_REFERENCE_CYCLE', 'A message cannot reply to itself', {
            messageId,
            parentId: newParentId,
          });
        }
        const parent = await this.loadParent(tx, message.threadId, newParentId);
        const chain = await climb(parent, (id) => messageRepo.findById(tx, id), {
          maxDepth: maxTraversalDepth,
          cycleKind: 'SELF_REFERENCE_CYCLE',
        });
        if (chain.some((ancestor) => ancestor.id === messageId)) {
          throw new DomainError('SELF_REFERENCE_CYCLE', 'New parent is a reply to this message', {
            messageId,
            parentId: newParentId,
          });
        }
      }

      const updated = await messageRepo.updateParent(tx, messageId, newParentId);
      if (!updated) {
        throw new DomainError('MESSAGE_NOT_FOUND', 'Message not found', { messageId });
      }
      await this.deps.threadRepo.touch(tx, message.threadId);
      return updated;
    });
  }

  /**
   * Removes the message with its reactions and attachments. Direct replies move up
   * to the removed message's parent, so the rest of the tree survives.
   */
  async deleteMessage(actorId: string, messageId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'message', id: messageId }, async (tx) => {
      const message = await this.loadOwnMessage(tx, actorId, messageId, 'delete');
      await this.deps.messageRepo.liftReplies(tx, messageId, message.parentId);
      await this.deps.threadRepo.touch(tx, message.threadId);
    });
  }

  async listMessages(actorId: string, threadId: string): Promise<Message[]> {
    return this.deps.withTransaction(async (tx) => {
      const thread = await this.loadThread(tx, threadId);
      await this.loadItem(tx, actorId, thread.itemId, 'read');
      return this.deps.messageRepo.listByThread(tx, threadId);
    });
  }

  /** The message and the replies above it, top-level message first. */
  async replyChain(actorId: string, messageId: string): Promise<Message[]> {
    const { messageRepo, maxTraversalDepth } = this.deps;
    return this.deps.withTransaction(async (tx) => {
      const message = await this.loadMessage(tx, actorId, messageId, 'read');
      const ancestors = await climb(message, (id) => messageRepo.findById(tx, id), {
        maxDepth: maxTraversalDepth,
        cycleKind: 'SELF_REFERENCE_CYCLE',
      });
      return [...ancestors.reverse(), message];
    });
  }

  async deleteThread(actorId: string, threadId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'thread', id: threadId }, async (tx) => {
      const thread = await this.loadThread(tx, threadId);
      await this.loadItem(tx, actorId, thread.itemId, 'write');
    });
  }

  /** A user may hold several reactions on one message, one per type. */
  async addReaction(messageId: string, userId: string, type: ReactionType): Promise<MessageReaction> {
    const reactionType = parseEnum(ReactionTypeSchema, 'type', type);
    return this.deps.withTransaction(async (tx) => {
      await this.loadMessage(tx, userId, messageId, 'react');
      return this.deps.reactionRepo.add(tx, {
        id: this.deps.generateId(),
        messageId,
        userId,
        type: reactionType,
      });
    });
  }

  async removeReaction(messageId: string, userId: string, type: ReactionType): Promise<void> {
    const reactionType = parseEnum(ReactionTypeSchema, 'type', type);
    return this.deps.withTransaction(async (tx) => {
      await this.loadMessage(tx, userId, messageId, 'react');
      const removed = await this.deps.reactionRepo.remove(tx, messageId, userId, reactionType);
      if (!removed) {
        throw new DomainError('REACTION_NOT_FOUND', 'Reaction not found', {
          messageId,
          userId,
          type: reactionType,
        });
      }
    });
  }

  async listReactions(actorId: string, messageId: string): Promise<MessageReaction[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.loadMessage(tx, actorId, messageId, 'read');
      return this.deps.reactionRepo.listByMessage(tx, messageId);
    });
  }

  private async ensureThread(tx: Tx, itemId: string, title: string | null): Promise<Thread> {
    const existing = await this.deps.threadRepo.findByItem(tx, itemId);
    if (existing) return existing;
    const { thread } = await this.deps.threadRepo.createIfAbsent(tx, {
      id: this.deps.generateId(),
      itemId,
      title,
    });
    return thread;
  }

  private async insertMessage(
    tx: Tx,
    thread: Thread,
    authorId: string,
    content: string,
    parentId: string | null,
  ): Promise<Message> {
    if (parentId !== null) {
      await this.loadParent(tx, thread.id, parentId);
    }
    const message = await this.deps.messageRepo.create(tx, {
      id: this.deps.generateId(),
      threadId: thread.id,
      authorId,
      parentId,
      content,
    });
    await this.deps.threadRepo.touch(tx, thread.id);
    return message;
  }

  private async loadParent(tx: Tx, threadId: string, parentId: string): Promise<Message> {
    const parent = isId(parentId) ? await this.deps.messageRepo.findById(tx, parentId) : null;
    if (!parent) {
      throw new DomainError('MESSAGE_NOT_FOUND', 'Parent message not found', { messageId: parentId });
    }
    if (parent.threadId !== threadId) {
      throw new DomainError('PARENT_NOT_IN_THREAD', 'Parent message belongs to another thread', {
        parentId,
        threadId,
        parentThreadId: parent.threadId,
      });
    }
    return parent;
  }

  private async threadOf(tx: Tx, itemId: string): Promise<Thread> {
    const thread = await this.deps.threadRepo.findByItem(tx, itemId);
    if (!thread) {
      throw new DomainError('THREAD_NOT_FOUND', 'Item has no thread yet', { itemId });
    }
    return thread;
  }

  private async loadThread(tx: Tx, threadId: string): Promise<Thread> {
    const thread = isId(threadId) ? await this.deps.threadRepo.findById(tx, threadId) : null;
    if (!thread) {
      throw new DomainError('THREAD_NOT_FOUND', 'Thread not found', { threadId });
    }
    return thread;
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
    const thread = await this.loadThread(tx, message.threadId);
    await this.loadItem(tx, actorId, thread.itemId, capability);
    return message;
  }

  /** Author-only operations also need `write` in the item's group. */
  private async loadOwnMessage(tx: Tx, actorId: string, messageId: string, action: string): Promise<Message> {
    const message = await this.loadMessage(tx, actorId, messageId, 'write');
    if (message.authorId !== actorId) {
      throw new DomainError('NOT_AUTHORIZED', `Only the author may ${action} this message`, {
        userId: actorId,
        messageId,
        action,
      });
    }
    return message;
  }
}

// Viewers may answer a message but not start one.
function postingCapability(parentId: string | null): Capability {
  return parentId === null ? 'write' : 'reply';
}

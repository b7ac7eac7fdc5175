import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DiscussionService, type DiscussionServiceDeps } from '../discussion-service';
import { type Message } from '../discussion';
import { DomainError } from '../errors';
import {
  createFakeTransactions,
  createIdGenerator,
  createMockBlobStore,
  createMockLogger,
  createMockRepositories,
  makeMembership,
  makeMessage,
  makeThread,
  type FakeTx,
} from './fixtures';

function createMockDeps(messages: Message[] = []): DiscussionServiceDeps<FakeTx> {
  const repos = createMockRepositories();
  if (messages.length > 0) {
    const byId = new Map(messages.map((message) => [message.id, message]));
    vi.mocked(repos.messages.findById).mockImplementation(async (_tx, id) => byId.get(id) ?? null);
  }
  return {
    itemRepo: repos.items,
    threadRepo: repos.threads,
    messageRepo: repos.messages,
    reactionRepo: repos.reactions,
    memberRepo: repos.memberships,
    relations: repos.relations,
    blobStore: createMockBlobStore(),
    logger: createMockLogger(),
    generateId: createIdGenerator(),
    withTransaction: createFakeTransactions().withTransaction,
    maxTraversalDepth: 64,
  };
}

// 71 ── 72 ── 73 in thread 60; 79 in thread 61
const TREE: Message[] = [
  makeMessage({ id: '71', parentId: null }),
  makeMessage({ id: '72', parentId: '71', authorId: '2' }),
  makeMessage({ id: '73', parentId: '72' }),
  makeMessage({ id: '79', threadId: '61' }),
];

describe('DiscussionService', () => {
  let deps: DiscussionServiceDeps<FakeTx>;
  let service: DiscussionService<FakeTx>;

  beforeEach(() => {
    deps = createMockDeps();
    service = new DiscussionService(deps);
  });

  describe('openThread', () => {
    it('creates the thread on first call', async () => {
      const thread = await service.openThread('1', '50', 'Selling the sofa');
      expect(thread).toMatchObject({ id: '1000', itemId: '50', title: 'Selling the sofa' });
    });

    it('returns the existing thread', async () => {
      vi.mocked(deps.threadRepo.findByItem).mockResolvedValueOnce(makeThread({ id: '60' }));
      const thread = await service.openThread('1', '50');
      expect(thread.id).toBe('60');
      expect(deps.threadRepo.createIfAbsent).not.toHaveBeenCalled();
    });
  });

  describe('postMessage', () => {
    it('posts a top-level message and touches the thread', async () => {
      const message = await service.postMessage('60', '1', '  selling? ');
      expect(message).toMatchObject({ threadId: '60', authorId: '1', parentId: null, content: 'selling?' });
      expect(deps.threadRepo.touch).toHaveBeenCalledWith({ seq: 1 }, '60');
    });

    it('answers THREAD_NOT_FOUND for a malformed thread id', async () => {
      await expect(service.postMessage('sixty', '1', 'hello')).rejects.toMatchObject({
        kind: 'THREAD_NOT_FOUND',
        details: { threadId: 'sixty' },
      });
      expect(deps.threadRepo.findById).not.toHaveBeenCalled();
      expect(deps.messageRepo.create).not.toHaveBeenCalled();
    });

    it('rejects a top-level message from a viewer', async () => {
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      await expect(service.postMessage('60', '2', 'hello')).rejects.toMatchObject({
        kind: 'NOT_AUTHORIZED',
        details: { action: 'write' },
      });
      expect(deps.messageRepo.create).not.toHaveBeenCalled();
    });

    it('lets a viewer reply', async () => {
      deps = createMockDeps(TREE);
      service = new DiscussionService(deps);
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      const reply = await service.postMessage('60', '2', 'how much?', '71');
      expect(reply).toMatchObject({ threadId: '60', authorId: '2', parentId: '71' });
    });

    it('rejects a parent from another thread', async () => {
      service = new DiscussionService(createMockDeps(TREE));
      await expect(service.postMessage('60', '1', 'reply', '79')).rejects.toMatchObject({
        kind: 'PARENT_NOT_IN_THREAD',
        details: { parentId: '79', threadId: '60', parentThreadId: '61' },
      });
    });

    it('fails with THREAD_NOT_FOUND', async () => {
      vi.mocked(deps.threadRepo.findById).mockResolvedValueOnce(null);
      await expect(service.postMessage('404', '1', 'hello')).rejects.toMatchObject({ kind: 'THREAD_NOT_FOUND' });
    });
  });

  describe('postToItem', () => {
    it('opens the thread on the first message', async () => {
      const message = await service.postToItem('50', '1', 'selling?');
      expect(deps.threadRepo.createIfAbsent).toHaveBeenCalledOnce();
      expect(message.threadId).toBe('1000');
    });

    it('never opens a thread for a reply', async () => {
      vi.mocked(deps.threadRepo.findByItem).mockResolvedValueOnce(null);
      await expect(service.postToItem('50', '1', 'reply', '71')).rejects.toMatchObject({
        kind: 'THREAD_NOT_FOUND',
        details: { itemId: '50' },
      });
      expect(deps.threadRepo.createIfAbsent).not.toHaveBeenCalled();
    });
  });

  describe('editMessage', () => {
    it('marks the message edited', async () => {
      const message = await service.editMessage('1', '70', 'sold!');
      expect(message).toMatchObject({ content: 'sold!', isEdited: true });
      expect(deps.threadRepo.touch).toHaveBeenCalledWith({ seq: 1 }, '60');
    });

    it('rejects anyone but the author', async () => {
      await expect(service.editMessage('3', '70', 'mine now')).rejects.toMatchObject({
        kind: 'NOT_AUTHORIZED',
        details: { userId: '3', messageId: '70', action: 'edit' },
      });
      expect(deps.messageRepo.updateContent).not.toHaveBeenCalled();
    });
  });

  describe('reparentMessage', () => {
    beforeEach(() => {
      deps = createMockDeps(TREE);
      service = new DiscussionService(deps);
    });

    it('rejects a message replying to itself', async () => {
      await expect(service.reparentMessage('1', '71', '71')).rejects.toMatchObject({ kind: 'SELF_REFERENCE_CYCLE' });
    });

    it('rejects moving a message under its own reply', async () => {
      await expect(service.reparentMessage('1', '71', '73')).rejects.toMatchObject({
        kind: 'SELF_REFERENCE_CYCLE',
        details: { messageId: '71', parentId: '73' },
      });
      expect(deps.messageRepo.updateParent).not.toHaveBeenCalled();
    });

    it('rejects a parent from another thread', async () => {
      await expect(service.reparentMessage('1', '73', '79')).rejects.toMatchObject({ kind: 'PARENT_NOT_IN_THREAD' });
    });

    it('moves a reply to the top level', async () => {
      const moved = await service.reparentMessage('1', '73', null);
      expect(moved.parentId).toBeNull();
    });
  });

  describe('replyChain', () => {
    it('returns the chain top-level first, ending at the message', async () => {
      service = new DiscussionService(createMockDeps(TREE));
      const chain = await service.replyChain('1', '73');
      expect(chain.map((message) => message.id)).toEqual(['71', '72', '73']);
    });
  });

  describe('deleteMessage', () => {
    it('lifts direct replies to the parent before cascading', async () => {
      deps = createMockDeps(TREE);
      service = new DiscussionService(deps);

      const report = await service.deleteMessage('1', '73');

      expect(deps.messageRepo.liftReplies).toHaveBeenCalledWith({ seq: 1 }, '73', '72');
      expect(report.removed).toEqual({ reaction: 1, attachment: 1, message: 1 });
    });

    it('rejects anyone but the author', async () => {
      await expect(service.deleteMessage('2', '70')).rejects.toMatchObject({ kind: 'NOT_AUTHORIZED' });
      expect(deps.messageRepo.liftReplies).not.toHaveBeenCalled();
    });
  });

  describe('reactions', () => {
    it('lets a viewer react', async () => {
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      const reaction = await service.addReaction('70', '2', 'heart');
      expect(reaction).toMatchObject({ messageId: '70', userId: '2', type: 'heart' });
    });

    it('surfaces DUPLICATE_REACTION from the unique constraint', async () => {
      vi.mocked(deps.reactionRepo.add).mockRejectedValueOnce(
        new DomainError('DUPLICATE_REACTION', 'Reaction already exists', { messageId: '70', userId: '1', type: 'like' }),
      );
      await expect(service.addReaction('70', '1', 'like')).rejects.toMatchObject({
        kind: 'DUPLICATE_REACTION',
        category: 'AlreadyExists',
      });
    });

    it('rejects unknown reaction types', async () => {
      const type = JSON.parse('"wow"');
      await expect(service.addReaction('70', '1', type)).rejects.toMatchObject({ kind: 'INVALID_ENUM_VALUE' });
    });

    it('fails with REACTION_NOT_FOUND when removing nothing', async () => {
      vi.mocked(deps.reactionRepo.remove).mockResolvedValueOnce(false);
      await expect(service.removeReaction('70', '1', 'sad')).rejects.toMatchObject({
        kind: 'REACTION_NOT_FOUND',
        details: { messageId: '70', userId: '1', type: 'sad' },
      });
    });
  });

  describe('deleteThread', () => {
    it('cascades the messages of the thread', async () => {
      vi.mocked(deps.relations.findIds).mockResolvedValueOnce(['70']);
      const report = await service.deleteThread('1', '60');
      expect(report.removed).toEqual({ reaction: 1, attachment: 1, message: 1, thread: 1 });
      expect(deps.relations.clearField).toHaveBeenCalledWith({ seq: 1 }, 'message', 'parentId', ['70']);
    });
  });
});

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ItemService, type ItemServiceDeps } from '../item-service';
import {
  createFakeTransactions,
  createIdGenerator,
  createMockBlobStore,
  createMockLogger,
  createMockRepositories,
  makeItem,
  makeMembership,
  type FakeTx,
} from './fixtures';

function createMockDeps(): ItemServiceDeps<FakeTx> {
  const repos = createMockRepositories();
  return {
    itemRepo: repos.items,
    memberRepo: repos.memberships,
    categoryRepo: repos.categories,
    refItemRepo: repos.referenceItems,
    relations: repos.relations,
    blobStore: createMockBlobStore(),
    logger: createMockLogger(),
    generateId: createIdGenerator(),
    withTransaction: createFakeTransactions().withTransaction,
  };
}

describe('ItemService', () => {
  let deps: ItemServiceDeps<FakeTx>;
  let service: ItemService<FakeTx>;

  beforeEach(() => {
    deps = createMockDeps();
    service = new ItemService(deps);
  });

  describe('createItem', () => {
    it('creates an item owned by the poster', async () => {
      const item = await service.createItem('1', '10', { name: 'Sofa', categoryId: '20', condition: 'B' });
      expect(deps.itemRepo.create).toHaveBeenCalledWith(
        { seq: 1 },
        {
          id: '1000',
          ownerId: '1',
          groupId: '10',
          refItemId: null,
          categoryId: '20',
          name: 'Sofa',
          description: null,
          condition: 'B',
        },
      );
      expect(item.status).toBe('active');
    });

    it('holds the owner membership row for the rest of the transaction', async () => {
      await service.createItem('1', '10', { name: 'Sofa' });
      expect(deps.memberRepo.findLocked).toHaveBeenCalledWith({ seq: 1 }, '10', '1', 'share');
      expect(deps.memberRepo.find).not.toHaveBeenCalled();
    });

    it('rejects a viewer with NOT_AUTHORIZED', async () => {
      vi.mocked(deps.memberRepo.findLocked).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      await expect(service.createItem('2', '10', { name: 'Sofa' })).rejects.toMatchObject({
        kind: 'NOT_AUTHORIZED',
        details: { userId: '2', groupId: '10', action: 'write' },
      });
      expect(deps.itemRepo.create).not.toHaveBeenCalled();
    });

    it('fails with REFERENCE_NOT_FOUND naming the unresolved link', async () => {
      vi.mocked(deps.refItemRepo.findById).mockResolvedValueOnce(null);
      await expect(service.createItem('1', '10', { name: 'Sofa', refItemId: '404' })).rejects.toMatchObject({
        kind: 'REFERENCE_NOT_FOUND',
        details: { field: 'refItemId', id: '404' },
      });
    });

    it('rejects malformed input before any read', async () => {
      await expect(service.createItem('1', '10', { name: '  ' })).rejects.toMatchObject({ kind: 'INVALID_INPUT' });
      expect(deps.memberRepo.findLocked).not.toHaveBeenCalled();
    });
  });

  describe('updateItem', () => {
    it('applies only the provided fields', async () => {
      await service.updateItem('1', '50', { description: 'Slightly worn', categoryId: null });
      expect(deps.itemRepo.update).toHaveBeenCalledWith({ seq: 1 }, '50', {
        description: 'Slightly worn',
        categoryId: null,
      });
    });

    it('validates a new category link', async () => {
      vi.mocked(deps.categoryRepo.findById).mockResolvedValueOnce(null);
      await expect(service.updateItem('1', '50', { categoryId: '404' })).rejects.toMatchObject({
        kind: 'REFERENCE_NOT_FOUND',
        details: { field: 'categoryId' },
      });
      expect(deps.itemRepo.update).not.toHaveBeenCalled();
    });

    it('rejects a viewer', async () => {
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      await expect(service.updateItem('2', '50', { name: 'Couch' })).rejects.toMatchObject({ kind: 'NOT_AUTHORIZED' });
    });

    it('fails with ITEM_NOT_FOUND', async () => {
      vi.mocked(deps.itemRepo.findById).mockResolvedValueOnce(null);
      await expect(service.updateItem('1', '404', { name: 'Couch' })).rejects.toMatchObject({ kind: 'ITEM_NOT_FOUND' });
    });
  });

  describe('archiveItem', () => {
    it('moves an active item to archived', async () => {
      const item = await service.archiveItem('1', '50');
      expect(item.status).toBe('archived');
      expect(deps.itemRepo.update).toHaveBeenCalledWith({ seq: 1 }, '50', { status: 'archived' });
    });

    it('is a no-op for an archived item', async () => {
      vi.mocked(deps.itemRepo.findById).mockResolvedValueOnce(makeItem({ status: 'archived' }));
      const item = await service.archiveItem('1', '50');
      expect(item.status).toBe('archived');
      expect(deps.itemRepo.update).not.toHaveBeenCalled();
    });

    it('is reversed by restoreItem', async () => {
      vi.mocked(deps.itemRepo.findById).mockResolvedValueOnce(makeItem({ status: 'archived' }));
      const item = await service.restoreItem('1', '50');
      expect(item.status).toBe('active');
    });
  });

  describe('getItem', () => {
    it('lets a viewer read', async () => {
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      const item = await service.getItem('2', '50');
      expect(item.id).toBe('50');
    });

    it('rejects non-members', async () => {
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(null);
      await expect(service.getItem('9', '50')).rejects.toMatchObject({ kind: 'NOT_AUTHORIZED' });
    });

    it('answers ITEM_NOT_FOUND for an id that cannot name a row', async () => {
      await expect(service.getItem('1', 'abc')).rejects.toMatchObject({
        kind: 'ITEM_NOT_FOUND',
        details: { itemId: 'abc' },
      });
      expect(deps.itemRepo.findById).not.toHaveBeenCalled();
    });

    it('answers NOT_AUTHORIZED for a malformed actor id without a membership read', async () => {
      await expect(service.getItem('1x', '50')).rejects.toMatchObject({
        kind: 'NOT_AUTHORIZED',
        details: { userId: '1x', groupId: '10', role: null },
      });
      expect(deps.memberRepo.find).not.toHaveBeenCalled();
    });
  });

  describe('listItems', () => {
    it('passes the status filter through', async () => {
      await service.listItems('1', '10', { status: 'archived' });
      expect(deps.itemRepo.listByGroup).toHaveBeenCalledWith({ seq: 1 }, '10', { status: 'archived' });
    });
  });

  describe('deleteItem', () => {
    it('cascades images and the thread', async () => {
      vi.mocked(deps.relations.findIds).mockImplementation(async (_tx, kind) => (kind === 'thread' ? ['60'] : []));
      vi.mocked(deps.relations.blobHandlesWhere).mockResolvedValueOnce(['blob-1']);

      const report = await service.deleteItem('1', '50');

      expect(report.removed).toEqual({ itemImage: 1, thread: 1, item: 1 });
      expect(report.blobHandles).toEqual(['blob-1']);
      expect(deps.blobStore.deleteBlob).toHaveBeenCalledWith('blob-1');
    });

    it('rejects a viewer without touching rows', async () => {
      vi.mocked(deps.memberRepo.find).mockResolvedValueOnce(makeMembership({ userId: '2', role: 'viewer' }));
      await expect(service.deleteItem('2', '50')).rejects.toMatchObject({ kind: 'NOT_AUTHORIZED' });
      expect(deps.relations.deleteWhere).not.toHaveBeenCalled();
    });
  });
});

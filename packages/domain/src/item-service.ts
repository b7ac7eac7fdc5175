import { type Item, type ItemPatch } from './item';
import {
  type CategoryRepository,
  type ItemRepository,
  type MembershipRepository,
  type ReferenceItemRepository,
} from './ports';
import { type Capability, type ItemStatus } from './enums';
import { DomainError } from './errors';
import { requireCapability } from './permissions';
import { deleteAtomically, type CascadeReport, type DeletionDeps } from './cascade';
import {
  CreateItemInputSchema,
  ItemListQuerySchema,
  UpdateItemInputSchema,
  isId,
  parseInput,
  type CreateItemInput,
  type UpdateItemInput,
} from './validation';

export interface ItemServiceDeps<Tx> extends DeletionDeps<Tx> {
  itemRepo: ItemRepository<Tx>;
  memberRepo: MembershipRepository<Tx>;
  categoryRepo: CategoryRepository<Tx>;
  refItemRepo: ReferenceItemRepository<Tx>;
  generateId: () => string;
}

export class ItemService<Tx> {
  constructor(private readonly deps: ItemServiceDeps<Tx>) {}

  async createItem(userId: string, groupId: string, input: CreateItemInput): Promise<Item> {
    const data = parseInput(CreateItemInputSchema, input);
    const { itemRepo, memberRepo, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      // Shared lock: removeMember cannot drop the owner until this insert commits.
      await requireCapability(memberRepo, tx, userId, groupId, 'write', 'share');
      const refItemId = data.refItemId ?? null;
      const categoryId = data.categoryId ?? null;
      await this.resolveLinks(tx, { refItemId, categoryId });

      return itemRepo.create(tx, {
        id: generateId(),
        ownerId: userId,
        groupId,
        refItemId,
        categoryId,
        name: data.name,
        description: data.description ?? null,
        condition: data.condition ?? null,
      });
    });
  }

  async updateItem(actorId: string, itemId: string, input: UpdateItemInput): Promise<Item> {
    const data = parseInput(UpdateItemInputSchema, input);
    const patch: ItemPatch = {};
    if (data.name !== undefined) patch.name = data.name;
    if (data.description !== undefined) patch.description = data.description;
    if (data.condition !== undefined) patch.condition = data.condition;
    if (data.refItemId !== undefined) patch.refItemId = data.refItemId;
    if (data.categoryId !== undefined) patch.categoryId = data.categoryId;

    return this.deps.withTransaction(async (tx) => {
      await this.loadAuthorized(tx, actorId, itemId, 'write');
      await this.resolveLinks(tx, patch);
      return this.applyPatch(tx, itemId, patch);
    });
  }

  /** Archived items stay readable; archiving twice is a no-op. */
  async archiveItem(actorId: string, itemId: string): Promise<Item> {
    return this.setStatus(actorId, itemId, 'archived');
  }

  async restoreItem(actorId: string, itemId: string): Promise<Item> {
    return this.setStatus(actorId, itemId, 'active');
  }

  /**
   * Removes the item with its images, thread, messages, reactions and attachments.
   * Image and attachment blobs are released once the transaction has committed.
   */
  async deleteItem(actorId: string, itemId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'item', id: itemId }, async (tx) => {
      await this.loadAuthorized(tx, actorId, itemId, 'write');
    });
  }

  async getItem(actorId: string, itemId: string): Promise<Item> {
    return this.deps.withTransaction(async (tx) => this.loadAuthorized(tx, actorId, itemId, 'read'));
  }

  async listItems(actorId: string, groupId: string, query: { status?: ItemStatus } = {}): Promise<Item[]> {
    const opts = parseInput(ItemListQuerySchema, query);
    return this.deps.withTransaction(async (tx) => {
      await requireCapability(this.deps.memberRepo, tx, actorId, groupId, 'read');
      return this.deps.itemRepo.listByGroup(tx, groupId, opts);
    });
  }

  private async setStatus(actorId: string, itemId: string, status: ItemStatus): Promise<Item> {
    return this.deps.withTransaction(async (tx) => {
      const item = await this.loadAuthorized(tx, actorId, itemId, 'write');
      if (item.status === status) return item;
      return this.applyPatch(tx, itemId, { status });
    });
  }

  private async applyPatch(tx: Tx, itemId: string, patch: ItemPatch): Promise<Item> {
    const updated = await this.deps.itemRepo.update(tx, itemId, patch);
    if (!updated) {
      throw new DomainError('ITEM_NOT_FOUND', 'Item not found', { itemId });
    }
    return updated;
  }

  private async loadAuthorized(tx: Tx, actorId: string, itemId: string, capability: Capability): Promise<Item> {
    const item = isId(itemId) ? await this.deps.itemRepo.findById(tx, itemId) : null;
    if (!item) {
      throw new DomainError('ITEM_NOT_FOUND', 'Item not found', { itemId });
    }
    await requireCapability(this.deps.memberRepo, tx, actorId, item.groupId, capability);
    return item;
  }

  private async resolveLinks(
    tx: Tx,
    links: { refItemId?: string | null; categoryId?: string | null },
  ): Promise<void> {
    if (links.refItemId) {
      const refItem = await this.deps.refItemRepo.findById(tx, links.refItemId);
      if (!refItem) {
        throw new DomainError('REFERENCE_NOT_FOUND', 'Linked reference item not found', {
          field: 'refItemId',
          id: links.refItemId,
        });
      }
    }
    if (links.categoryId) {
      const category = await this.deps.categoryRepo.findById(tx, links.categoryId);
      if (!category) {
        throw new DomainError('REFERENCE_NOT_FOUND', 'Linked category not found', {
          field: 'categoryId',
          id: links.categoryId,
        });
      }
    }
  }
}

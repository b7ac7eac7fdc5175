import { type Category } from './catalog';
import { type CategoryRepository } from './ports';
import { DomainError } from './errors';
import { climb } from './traversal';
import { deleteAtomically, type CascadeReport, type DeletionDeps } from './cascade';
import { CategoryNameSchema, isId, parseInput } from './validation';

export interface TaxonomyServiceDeps<Tx> extends DeletionDeps<Tx> {
  categoryRepo: CategoryRepository<Tx>;
  generateId: () => string;
  maxTraversalDepth: number;
}

export class TaxonomyService<Tx> {
  constructor(private readonly deps: TaxonomyServiceDeps<Tx>) {}

  async createCategory(name: string, parentId: string | null = null): Promise<Category> {
    const categoryName = parseInput(CategoryNameSchema, name);
    const { categoryRepo, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      await categoryRepo.lockTree(tx);
      if (parentId !== null) {
        const parent = isId(parentId) ? await categoryRepo.findById(tx, parentId) : null;
        if (!parent) {
          throw new DomainError('PARENT_NOT_FOUND', 'Parent category not found', { parentId });
        }
      }
      return categoryRepo.create(tx, { id: generateId(), name: categoryName, parentId });
    });
  }

  async getCategory(categoryId: string): Promise<Category> {
    return this.deps.withTransaction(async (tx) => this.loadCategory(tx, categoryId));
  }

  async renameCategory(categoryId: string, name: string): Promise<Category> {
    const categoryName = parseInput(CategoryNameSchema, name);
    return this.deps.withTransaction(async (tx) => {
      const category = isId(categoryId) ? await this.deps.categoryRepo.rename(tx, categoryId, categoryName) : null;
      if (!category) {
        throw new DomainError('CATEGORY_NOT_FOUND', 'Category not found', { categoryId });
      }
      return category;
    });
  }

  /**
   * Moves `categoryId` under `newParentId` (or to the root for `null`). Rejects any
   * move that would make the category its own ancestor.
   */
  async reparent(categoryId: string, newParentId: string | null): Promise<Category> {
    const { categoryRepo, maxTraversalDepth } = this.deps;

    return this.deps.withTransaction(
      async (tx) => {
        await categoryRepo.lockTree(tx);
        const category = await this.loadCategory(tx, categoryId);

        if (newParentId !== null) {
          if (newParentId === categoryId) {
            throw new DomainError('CYCLE_DETECTED', 'A category cannot be its own parent', {
              categoryId,
              newParentId,
            });
          }
          const parent = isId(newParentId) ? await categoryRepo.findById(tx, newParentId) : null;
          if (!parent) {
            throw new DomainError('PARENT_NOT_FOUND', 'Parent category not found', { parentId: newParentId });
          }
          const chain = await climb(parent, (id) => categoryRepo.findById(tx, id), {
            maxDepth: maxTraversalDepth,
            cycleKind: 'CYCLE_DETECTED',
          });
          if (chain.some((ancestor) => ancestor.id === categoryId)) {
            throw new DomainError('CYCLE_DETECTED', 'New parent is a descendant of the category', {
              categoryId,
              newParentId,
            });
          }
        }

        await categoryRepo.updateParent(tx, categoryId, newParentId);
        return { ...category, parentId: newParentId };
      },
      { isolation: 'serializable' },
    );
  }

  /** Rejected with `CATEGORY_IN_USE` while a child, reference item or item points here. */
  async deleteCategory(categoryId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'category', id: categoryId }, async (tx) => {
      await this.deps.categoryRepo.lockTree(tx);
      await this.loadCategory(tx, categoryId);
    });
  }

  async listRoots(): Promise<Category[]> {
    return this.deps.withTransaction(async (tx) => this.deps.categoryRepo.listRoots(tx));
  }

  async listChildren(categoryId: string): Promise<Category[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.loadCategory(tx, categoryId);
      return this.deps.categoryRepo.listChildren(tx, [categoryId]);
    });
  }

  /** Root-to-leaf, excluding the category itself. Read from one snapshot on first pull. */
  ancestors(categoryId: string): AsyncIterable<Category> {
    return { [Symbol.asyncIterator]: () => this.walkAncestors(categoryId) };
  }

  /** Breadth-first, excluding the category itself. The subtree is read from one snapshot. */
  descendants(categoryId: string): AsyncIterable<Category> {
    return { [Symbol.asyncIterator]: () => this.walkDescendants(categoryId) };
  }

  private async *walkAncestors(categoryId: string): AsyncGenerator<Category> {
    const { categoryRepo, maxTraversalDepth } = this.deps;
    const chain = await this.deps.withTransaction(async (tx) => {
      const start = await this.loadCategory(tx, categoryId);
      return climb(start, (id) => categoryRepo.findById(tx, id), {
        maxDepth: maxTraversalDepth,
        cycleKind: 'CYCLE_DETECTED',
      });
    });
    yield* chain.reverse();
  }

  private async *walkDescendants(categoryId: string): AsyncGenerator<Category> {
    const subtree = await this.deps.withTransaction((tx) => this.readSubtree(tx, categoryId), {
      isolation: 'serializable',
    });
    yield* subtree;
  }

  // A reparent committed between levels would otherwise show a node twice.
  private async readSubtree(tx: Tx, categoryId: string): Promise<Category[]> {
    const { categoryRepo, maxTraversalDepth } = this.deps;
    await this.loadCategory(tx, categoryId);

    const seen = new Set<string>([categoryId]);
    const subtree: Category[] = [];
    let frontier = [categoryId];
    let depth = 0;

    while (frontier.length > 0) {
      const children = await categoryRepo.listChildren(tx, frontier);
      if (children.length === 0) break;

      depth += 1;
      if (depth > maxTraversalDepth) {
        throw new DomainError('DEPTH_LIMIT_EXCEEDED', `Subtree below ${categoryId} is deeper than ${maxTraversalDepth}`, {
          categoryId,
          maxDepth: maxTraversalDepth,
        });
      }

      frontier = [];
      for (const child of children) {
        if (seen.has(child.id)) {
          throw new DomainError('CYCLE_DETECTED', `Stored tree loops at ${child.id}`, {
            startId: categoryId,
            repeatedId: child.id,
          });
        }
        seen.add(child.id);
        frontier.push(child.id);
        subtree.push(child);
      }
    }
    return subtree;
  }

  private async loadCategory(tx: Tx, categoryId: string): Promise<Category> {
    const category = isId(categoryId) ? await this.deps.categoryRepo.findById(tx, categoryId) : null;
    if (!category) {
      throw new DomainError('CATEGORY_NOT_FOUND', 'Category not found', { categoryId });
    }
    return category;
  }
}

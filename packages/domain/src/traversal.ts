import { DomainError } from './errors';

export interface TreeNode {
  id: string;
  parentId: string | null;
}

/**
 * Walks parent links upward from `start` and returns its ancestors nearest-first,
 * excluding `start`. Fails with `DEPTH_LIMIT_EXCEEDED` past `maxDepth` hops and
 * with `cycleKind` if a stored chain loops back on itself.
 */
export async function climb<T extends TreeNode>(
  start: T,
  load: (id: string) => Promise<T | null>,
  opts: { maxDepth: number; cycleKind: 'CYCLE_DETECTED' | 'SELF_REFERENCE_CYCLE' },
): Promise<T[]> {
  const ancestors: T[] = [];
  const seen = new Set<string>([start.id]);
  let parentId = start.parentId;

  while (parentId !== null) {
    if (seen.has(parentId)) {
      throw new DomainError(opts.cycleKind, `Stored chain loops at ${parentId}`, {
        startId: start.id,
        repeatedId: parentId,
      });
    }
    if (ancestors.length >= opts.maxDepth) {
      throw new DomainError('DEPTH_LIMIT_EXCEEDED', `Chain above ${start.id} is deeper than ${opts.maxDepth}`, {
        startId: start.id,
        maxDepth: opts.maxDepth,
      });
    }
    const parent = await load(parentId);
    if (!parent) break;
    ancestors.push(parent);
    seen.add(parent.id);
    parentId = parent.parentId;
  }

  return ancestors;
}

import { describe, it, expect } from 'vitest';
import { climb, type TreeNode } from '../traversal';

function tree(nodes: TreeNode[]): (id: string) => Promise<TreeNode | null> {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  return async (id) => byId.get(id) ?? null;
}

describe('climb', () => {
  const nodes: TreeNode[] = [
    { id: 'root', parentId: null },
    { id: 'mid', parentId: 'root' },
    { id: 'leaf', parentId: 'mid' },
  ];

  it('returns ancestors nearest-first without the start node', async () => {
    const chain = await climb(nodes[2], tree(nodes), { maxDepth: 10, cycleKind: 'CYCLE_DETECTED' });
    expect(chain.map((node) => node.id)).toEqual(['mid', 'root']);
  });

  it('returns nothing for a root', async () => {
    expect(await climb(nodes[0], tree(nodes), { maxDepth: 10, cycleKind: 'CYCLE_DETECTED' })).toEqual([]);
  });

  it('stops at a missing parent', async () => {
    const orphan = { id: 'orphan', parentId: 'gone' };
    expect(await climb(orphan, tree(nodes), { maxDepth: 10, cycleKind: 'CYCLE_DETECTED' })).toEqual([]);
  });

  it('fails with DEPTH_LIMIT_EXCEEDED past maxDepth hops', async () => {
    await expect(climb(nodes[2], tree(nodes), { maxDepth: 1, cycleKind: 'CYCLE_DETECTED' })).rejects.toMatchObject({
      kind: 'DEPTH_LIMIT_EXCEEDED',
      details: { startId: 'leaf', maxDepth: 1 },
    });
  });

  it('allows a chain exactly maxDepth long', async () => {
    const chain = await climb(nodes[2], tree(nodes), { maxDepth: 2, cycleKind: 'CYCLE_DETECTED' });
    expect(chain).toHaveLength(2);
  });

  it('reports a stored loop with the given kind', async () => {
    const looped: TreeNode[] = [
      { id: 'a', parentId: 'b' },
      { id: 'b', parentId: 'a' },
    ];
    await expect(
      climb(looped[0], tree(looped), { maxDepth: 10, cycleKind: 'SELF_REFERENCE_CYCLE' }),
    ).rejects.toMatchObject({ kind: 'SELF_REFERENCE_CYCLE', details: { startId: 'a', repeatedId: 'a' } });
  });
});

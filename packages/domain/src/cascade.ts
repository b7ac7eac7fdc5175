import { DomainError, type DomainErrorKind } from './errors';
import {
  BLOB_KINDS,
  ownedEdgesOf,
  referencesTo,
  type EntityKind,
  type EntityRef,
  type LinkField,
} from './ownership';
import {
  type BlobStore,
  type LoggerPort,
  type RelationStore,
  type TransactionRunner,
} from './ports';

export interface CascadeReport {
  root: EntityRef;
  removed: Partial<Record<EntityKind, number>>;
  /** Handles of blobs whose rows were removed; released after commit. */
  blobHandles: string[];
}

export interface DeletionDeps<Tx> {
  relations: RelationStore<Tx>;
  blobStore: BlobStore;
  logger: LoggerPort;
  withTransaction: TransactionRunner<Tx>;
}

interface Step {
  action: 'detach' | 'delete';
  kind: EntityKind;
  field: LinkField;
  values: string[];
}

const IN_USE_ERRORS: Partial<Record<EntityKind, DomainErrorKind>> = {
  category: 'CATEGORY_IN_USE',
  referenceItem: 'REFERENCE_ITEM_IN_USE',
};

function tracksIds(kind: EntityKind): boolean {
  return ownedEdgesOf(kind).length > 0 || referencesTo(kind).length > 0;
}

/**
 * Removes `root` and everything it transitively owns inside `tx`.
 * All reads and restrict checks happen before the first write; deletes run
 * leaf-first so no owned row outlives its owner.
 */
export async function cascadeDelete<Tx>(
  store: RelationStore<Tx>,
  tx: Tx,
  root: EntityRef,
): Promise<CascadeReport> {
  const steps: Step[] = [];
  await planDeletion(store, tx, root.kind, 'id', [root.id], steps);

  const removed: Partial<Record<EntityKind, number>> = {};
  const blobHandles: string[] = [];

  for (const step of steps) {
    if (step.action === 'detach') {
      await store.clearField(tx, step.kind, step.field, step.values);
      continue;
    }
    if (BLOB_KINDS.has(step.kind)) {
      blobHandles.push(...(await store.blobHandlesWhere(tx, step.kind, step.field, step.values)));
    }
    const count = await store.deleteWhere(tx, step.kind, step.field, step.values);
    removed[step.kind] = (removed[step.kind] ?? 0) + count;
  }

  return { root, removed, blobHandles };
}

async function planDeletion<Tx>(
  store: RelationStore<Tx>,
  tx: Tx,
  kind: EntityKind,
  field: LinkField,
  values: string[],
  steps: Step[],
): Promise<void> {
  if (values.length === 0) return;

  if (!tracksIds(kind)) {
    steps.push({ action: 'delete', kind, field, values });
    return;
  }

  const ids = field === 'id' ? values : await store.findIds(tx, kind, field, values);
  if (ids.length === 0) return;

  await assertUnreferenced(store, tx, kind, ids);

  for (const edge of ownedEdgesOf(kind)) {
    await planDeletion(store, tx, edge.owned, edge.via, ids, steps);
  }

  for (const edge of referencesTo(kind)) {
    if (edge.onDelete === 'detach') {
      steps.push({ action: 'detach', kind: edge.from, field: edge.via, values: ids });
    }
  }

  steps.push({ action: 'delete', kind, field: 'id', values: ids });
}

/**
 * Counts every restricting reference to `ids` and fails naming all of them.
 * `referencedBy`, `via` and `count` describe the first blocker; `blockedBy`
 * lists each as `kind.field:count`.
 */
async function assertUnreferenced<Tx>(store: RelationStore<Tx>, tx: Tx, kind: EntityKind, ids: string[]): Promise<void> {
  const blockers: Array<{ from: EntityKind; via: LinkField; count: number }> = [];
  for (const edge of referencesTo(kind)) {
    if (edge.onDelete !== 'restrict') continue;
    const count = await store.countWhere(tx, edge.from, edge.via, ids);
    if (count > 0) blockers.push({ from: edge.from, via: edge.via, count });
  }
  if (blockers.length === 0) return;

  const [first] = blockers;
  const blockedBy = blockers.map((b) => `${b.from}.${b.via}:${b.count}`);
  throw new DomainError(
    IN_USE_ERRORS[kind] ?? 'DELETE_FAILED',
    `${kind} is still referenced (${blockedBy.join(', ')})`,
    { kind, ids, referencedBy: first.from, via: first.via, count: first.count, blockedBy },
  );
}

/**
 * Runs `guard` and the cascade in one transaction. Domain errors pass through;
 * anything else rolls back and surfaces as `DELETE_FAILED`.
 */
export async function deleteAtomically<Tx>(
  deps: DeletionDeps<Tx>,
  root: EntityRef,
  guard: (tx: Tx) => Promise<void>,
): Promise<CascadeReport> {
  let report: CascadeReport;
  try {
    report = await deps.withTransaction(async (tx) => {
      await guard(tx);
      return cascadeDelete(deps.relations, tx, root);
    });
  } catch (err) {
    if (err instanceof DomainError) throw err;
    deps.logger.error(
      { kind: root.kind, id: root.id, err: err instanceof Error ? err.message : String(err) },
      'Cascade delete rolled back',
    );
    throw new DomainError(
      'DELETE_FAILED',
      `Deleting ${root.kind} ${root.id} failed`,
      { kind: root.kind, id: root.id },
      { cause: err },
    );
  }

  deps.logger.info({ kind: root.kind, id: root.id, removed: report.removed }, 'Cascade delete committed');
  await releaseBlobs(deps, report.blobHandles);
  return report;
}

export async function releaseBlobs(
  deps: { blobStore: BlobStore; logger: LoggerPort },
  handles: string[],
): Promise<void> {
  const results = await Promise.allSettled(handles.map((handle) => deps.blobStore.deleteBlob(handle)));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      deps.logger.error(
        {
          blobHandle: handles[index],
          err: result.reason instanceof Error ? result.reason.message : String(result.reason),
        },
        'Blob release failed after commit',
      );
    }
  });
}

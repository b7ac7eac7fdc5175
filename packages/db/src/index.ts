export {
  createPool,
  createTransactionRunner,
  poolConnector,
  type Queryable,
  type TxClient,
  type Connect,
} from './client';
export { runMigrations, MIGRATIONS_DIR } from './migrator';
export { translateWriteErrors, pgErrorCode } from './pg-errors';
export * from './repositories';
export { MemoryDatabase, type MemoryTx, type MemoryTables, type EntityRows } from './memory/memory-database';
export { MemoryRelationStore } from './memory/memory-relation-store';
export { createMemoryRepositories, compareIds } from './memory/memory-repositories';
export {
  createInventoryCore,
  createMemoryCore,
  type InventoryCore,
  type MemoryCore,
  type MemoryCoreOptions,
} from './core';

import { type Pool } from 'pg';
import {
  createServices,
  type BlobStore,
  type CoreServices,
  type CredentialHasher,
} from '@homestock/domain';
import {
  Argon2CredentialHasher,
  InMemoryBlobStore,
  S3BlobStore,
  createIdGenerator,
  createLogger,
  type CoreConfig,
  type SafeLogger,
} from '@homestock/shared';
import { createPool, createTransactionRunner, poolConnector, type Queryable } from './client';
import { createPgRepositories } from './repositories';
import { MemoryDatabase, type MemoryTx } from './memory/memory-database';
import { createMemoryRepositories } from './memory/memory-repositories';

export interface InventoryCore {
  services: CoreServices<Queryable>;
  pool: Pool;
  blobStore: BlobStore;
  close(): Promise<void>;
}

function createBlobStore(config: CoreConfig): BlobStore {
  if (config.BLOB_STORE === 'memory') return new InMemoryBlobStore();
  return new S3BlobStore({
    endpoint: config.S3_ENDPOINT,
    region: config.S3_REGION,
    accessKey: config.S3_ACCESS_KEY,
    secretKey: config.S3_SECRET_KEY,
    bucket: config.S3_BUCKET,
  });
}

/** Wires every service onto Postgres and the configured blob store. */
export function createInventoryCore(config: CoreConfig, logger?: SafeLogger): InventoryCore {
  const log = logger ?? createLogger({ name: 'inventory-core', level: config.LOG_LEVEL });
  const pool = createPool({ connectionString: config.DATABASE_URL, max: config.DB_POOL_MAX }, log.child({ component: 'db' }));
  const blobStore = createBlobStore(config);

  const services = createServices({
    repos: createPgRepositories(),
    withTransaction: createTransactionRunner(poolConnector(pool), {
      maxRetries: config.TX_MAX_RETRIES,
      logger: log.child({ component: 'tx' }),
    }),
    blobStore,
    hasher: new Argon2CredentialHasher(),
    logger: log,
    generateId: createIdGenerator(config.NODE_ID),
    maxTraversalDepth: config.MAX_TRAVERSAL_DEPTH,
    listingPageSize: config.LISTING_PAGE_SIZE,
  });

  return {
    services,
    pool,
    blobStore,
    async close() {
      await pool.end();
      log.info({}, 'Database pool closed');
    },
  };
}

export interface MemoryCoreOptions {
  blobStore?: BlobStore;
  hasher?: CredentialHasher;
  logger?: SafeLogger;
  nodeId?: number;
  maxTraversalDepth?: number;
  listingPageSize?: number;
}

export interface MemoryCore {
  services: CoreServices<MemoryTx>;
  db: MemoryDatabase;
  blobStore: BlobStore;
}

/** The same services over the in-process store; used by integration tests. */
export function createMemoryCore(options: MemoryCoreOptions = {}): MemoryCore {
  const db = new MemoryDatabase();
  const blobStore = options.blobStore ?? new InMemoryBlobStore();

  const services = createServices({
    repos: createMemoryRepositories(),
    withTransaction: db.withTransaction,
    blobStore,
    hasher: options.hasher ?? new Argon2CredentialHasher(),
    logger: options.logger ?? createLogger({ name: 'inventory-core', level: 'warn' }),
    generateId: createIdGenerator(options.nodeId ?? 0),
    maxTraversalDepth: options.maxTraversalDepth ?? 64,
    listingPageSize: options.listingPageSize ?? 50,
  });

  return { services, db, blobStore };
}

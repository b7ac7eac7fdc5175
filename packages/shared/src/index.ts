export { createLogger, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode, toAppError } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type CoreConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  StorageConfigSchema,
  IntegrityConfigSchema,
  CoreConfigSchema,
} from './config';
export { SnowflakeGenerator, createIdGenerator } from './id';
export { Argon2CredentialHasher } from './credential-hasher';
export { S3BlobStore, InMemoryBlobStore, type S3BlobStoreConfig } from './blob-store';

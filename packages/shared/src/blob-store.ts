import { randomUUID } from 'node:crypto';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
} from '@aws-sdk/client-s3';
import { DomainError, type BlobStore } from '@homestock/domain';

export interface S3BlobStoreConfig {
  endpoint?: string;
  region: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

function hasErrorName(err: unknown, name: string): boolean {
  return err instanceof Error && err.name === name;
}

function blobNotFound(handle: string, cause?: unknown): DomainError {
  return new DomainError('BLOB_NOT_FOUND', 'Blob not found', { blobHandle: handle }, { cause });
}

/** Blob payloads in an S3-compatible bucket; the handle is the object key. */
export class S3BlobStore implements BlobStore {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(config: S3BlobStoreConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        credentials: {
          accessKeyId: config.accessKey,
          secretAccessKey: config.secretKey,
        },
        forcePathStyle: config.endpoint !== undefined,
      });
  }

  async storeBlob(bytes: Uint8Array): Promise<string> {
    const key = `blobs/${randomUUID()}`;
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentLength: bytes.byteLength,
        ContentType: 'application/octet-stream',
      }),
    );
    return key;
  }

  async fetchBlob(handle: string): Promise<Uint8Array> {
    const response = await this.client
      .send(new GetObjectCommand({ Bucket: this.bucket, Key: handle }))
      .catch((err: unknown) => {
        throw hasErrorName(err, 'NoSuchKey') ? blobNotFound(handle, err) : err;
      });
    if (!response.Body) throw blobNotFound(handle);
    return response.Body.transformToByteArray();
  }

  async deleteBlob(handle: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: handle }));
  }

  async ensureBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (err) {
      if (!hasErrorName(err, 'NotFound')) throw err;
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
    }
  }
}

/** Process-local store for tests and single-process setups. */
export class InMemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Uint8Array>();

  async storeBlob(bytes: Uint8Array): Promise<string> {
    const handle = `mem-${randomUUID()}`;
    this.blobs.set(handle, Uint8Array.from(bytes));
    return handle;
  }

  async fetchBlob(handle: string): Promise<Uint8Array> {
    const bytes = this.blobs.get(handle);
    if (!bytes) throw blobNotFound(handle);
    return Uint8Array.from(bytes);
  }

  async deleteBlob(handle: string): Promise<void> {
    this.blobs.delete(handle);
  }

  has(handle: string): boolean {
    return this.blobs.has(handle);
  }

  get size(): number {
    return this.blobs.size;
  }
}

/**
 * Flat key/value object storage.
 *
 * `S3ObjectStore` talks to S3 or any S3-compatible service through
 * `@aws-sdk/client-s3`. `MemoryObjectStore` keeps objects in a Map and backs
 * ephemeral workspaces and tests.
 */

import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { S3Config } from '../config/workspace-config.js';
import { ConfigError, StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('object-store');

/** S3 DeleteObjects accepts at most this many keys per call. */
const DELETE_BATCH_SIZE = 1000;

export interface ObjectStore {
  /** Object body, or undefined when the key does not exist. */
  get(key: string): Promise<Buffer | undefined>;
  put(key: string, body: Buffer | string): Promise<void>;
  delete(keys: string[]): Promise<void>;
  /** Every key starting with `prefix`. */
  list(prefix: string): Promise<string[]>;
}

export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Buffer>();

  async get(key: string): Promise<Buffer | undefined> {
    const body = this.objects.get(key);
    return body ? Buffer.from(body) : undefined;
  }

  async put(key: string, body: Buffer | string): Promise<void> {
    this.objects.set(key, Buffer.from(body));
  }

  async delete(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.objects.delete(key);
    }
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  get size(): number {
    return this.objects.size;
  }
}

function isMissingKey(error: unknown): boolean {
  if (error instanceof NoSuchKey) return true;
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  /**
   * Credentials come from the AWS SDK default provider chain.
   *
   * @throws ConfigError when no bucket is configured
   */
  constructor(config: S3Config, client?: S3Client) {
    if (!config.bucket) {
      throw new ConfigError('S3 bucket is required', 'MISSING_REQUIRED');
    }
    this.bucket = config.bucket;
    this.prefix = config.prefix.replace(/\/+$/, '');
    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle,
      });
  }

  private fullKey(key: string): string {
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  private relativeKey(fullKey: string): string {
    return this.prefix ? fullKey.slice(this.prefix.length + 1) : fullKey;
  }

  async get(key: string): Promise<Buffer | undefined> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
      );
      if (!response.Body) return undefined;
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isMissingKey(error)) return undefined;
      log.error('GetObject failed', { key, error: String(error) });
      throw new StorageError(`Failed to read ${key}`, 'OBJECT_READ_FAILED', error);
    }
  }

  async put(key: string, body: Buffer | string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key), Body: body }),
      );
    } catch (error) {
      log.error('PutObject failed', { key, error: String(error) });
      throw new StorageError(`Failed to write ${key}`, 'OBJECT_WRITE_FAILED', error);
    }
  }

  async delete(keys: string[]): Promise<void> {
    for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
      const batch = keys.slice(i, i + DELETE_BATCH_SIZE);
      try {
        await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: batch.map((k) => ({ Key: this.fullKey(k) })), Quiet: true },
          }),
        );
      } catch (error) {
        log.error('DeleteObjects failed', { count: batch.length, error: String(error) });
        throw new StorageError(`Failed to delete ${batch.length} objects`, 'OBJECT_DELETE_FAILED', error);
      }
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let token: string | undefined;
    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: this.fullKey(prefix),
            ContinuationToken: token,
          }),
        );
        for (const object of response.Contents ?? []) {
          if (object.Key) keys.push(this.relativeKey(object.Key));
        }
        token = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (token);
    } catch (error) {
      log.error('ListObjectsV2 failed', { prefix, error: String(error) });
      throw new StorageError(`Failed to list ${prefix}`, 'OBJECT_READ_FAILED', error);
    }
    return keys;
  }
}

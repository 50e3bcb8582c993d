/**
 * Repository over an {@link ObjectStore} (S3 or in-memory).
 *
 * Object stores have no directories or renames, so a chunk rewrite puts every
 * new object first and only then deletes keys that are not part of the new
 * set; an index in range is never missing mid-rewrite. If any put fails,
 * every key under the chunk prefix is deleted, old and new alike.
 */

import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ObjectStore } from './object-store.js';
import { BaseRepository } from './repository.js';

const log = createLogger('object-repository');

export class ObjectStorageRepository extends BaseRepository {
  constructor(
    readonly store: ObjectStore,
    readonly kind: string = 's3',
  ) {
    super();
  }

  protected readBytes(key: string): Promise<Buffer | undefined> {
    return this.store.get(key);
  }

  protected writeBytes(key: string, data: Buffer | string): Promise<void> {
    return this.store.put(key, data);
  }

  protected async listNames(dir: string): Promise<string[] | undefined> {
    const prefix = `${dir}/`;
    const keys = await this.store.list(prefix);
    const names = keys.map((k) => k.slice(prefix.length)).filter((name) => name && !name.includes('/'));
    return names.length > 0 ? names : undefined;
  }

  protected async removeDir(dir: string): Promise<void> {
    const keys = await this.store.list(`${dir}/`);
    if (keys.length > 0) {
      await this.store.delete(keys);
    }
  }

  protected async replaceDir(dir: string, files: Map<string, string>): Promise<void> {
    const prefix = `${dir}/`;
    const existing = await this.store.list(prefix);
    const nextKeys = new Set([...files.keys()].map((name) => prefix + name));
    const stale = existing.filter((k) => !nextKeys.has(k));
    const written: string[] = [];

    try {
      for (const [name, text] of files) {
        const key = prefix + name;
        await this.store.put(key, text);
        written.push(key);
      }
      if (stale.length > 0) {
        await this.store.delete(stale);
      }
    } catch (error) {
      log.error('Chunk rewrite failed, removing chunk keys', {
        dir,
        written: written.length,
        existing: existing.length,
        error: errorMessage(error),
      });
      try {
        await this.store.delete([...new Set([...existing, ...written])]);
      } catch (cleanupError) {
        log.error('Chunk cleanup failed', { dir, error: errorMessage(cleanupError) });
      }
      throw new StorageError(`Failed to write chunks under ${dir}`, 'CHUNK_WRITE_FAILED', error);
    }
  }
}

/**
 * Repository on the local filesystem.
 *
 * Keys map to files under `root`. Chunk directories are replaced by staging
 * the new files beside the live directory and swapping with renames:
 *
 * ```
 * chunks.staging-{gen}/   ← new files written here
 * chunks/          → chunks.retired-{gen}/
 * chunks.staging-{gen}/ → chunks/
 * chunks.retired-{gen}/   removed
 * ```
 *
 * A failure before the swap leaves the live directory untouched and removes
 * the staging directory.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { BaseRepository } from './repository.js';

const log = createLogger('local-repository');

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export class LocalRepository extends BaseRepository {
  readonly kind = 'local';

  constructor(readonly root: string) {
    super();
  }

  private resolve(key: string): string {
    return join(this.root, ...key.split('/'));
  }

  protected async readBytes(key: string): Promise<Buffer | undefined> {
    try {
      return await readFile(this.resolve(key));
    } catch (error) {
      if (isNotFound(error) || errorCode(error) === 'EISDIR') return undefined;
      log.error('Read failed', { key, error: String(error) });
      throw new StorageError(`Failed to read ${key}`, 'OBJECT_READ_FAILED', error);
    }
  }

  protected async writeBytes(key: string, data: Buffer | string): Promise<void> {
    const path = this.resolve(key);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, data);
    } catch (error) {
      log.error('Write failed', { key, error: String(error) });
      throw new StorageError(`Failed to write ${key}`, 'OBJECT_WRITE_FAILED', error);
    }
  }

  protected async listNames(dir: string): Promise<string[] | undefined> {
    try {
      const entries = await readdir(this.resolve(dir), { withFileTypes: true });
      return entries.filter((e) => e.isFile()).map((e) => e.name);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new StorageError(`Failed to list ${dir}`, 'OBJECT_READ_FAILED', error);
    }
  }

  protected async removeDir(dir: string): Promise<void> {
    try {
      await rm(this.resolve(dir), { recursive: true, force: true });
    } catch (error) {
      throw new StorageError(`Failed to remove ${dir}`, 'OBJECT_DELETE_FAILED', error);
    }
  }

  protected async replaceDir(dir: string, files: Map<string, string>): Promise<void> {
    const live = this.resolve(dir);
    const generation = `${Date.now()}-${randomUUID().slice(0, 8)}`;
    const staging = `${live}.staging-${generation}`;
    const retired = `${live}.retired-${generation}`;

    try {
      await mkdir(staging, { recursive: true });
      for (const [name, text] of files) {
        await writeFile(join(staging, name), text);
      }

      let hadLive = true;
      try {
        await rename(live, retired);
      } catch (error) {
        if (!isNotFound(error)) throw error;
        hadLive = false;
      }

      try {
        await rename(staging, live);
      } catch (error) {
        if (hadLive) await rename(retired, live);
        throw error;
      }

      if (hadLive) await rm(retired, { recursive: true, force: true });
    } catch (error) {
      log.error('Chunk directory rewrite failed', { dir, error: errorMessage(error) });
      try {
        await rm(staging, { recursive: true, force: true });
      } catch (cleanupError) {
        log.error('Staging cleanup failed', { staging, error: errorMessage(cleanupError) });
      }
      throw new StorageError(`Failed to write chunks under ${dir}`, 'CHUNK_WRITE_FAILED', error);
    }
  }
}

/**
 * Repository contract and the backend-independent half of its implementation.
 *
 * A repository persists one workspace: the workspace index, artifact
 * descriptors, sub-artifact content, attachments and chunk files, laid out as
 * described in `paths.ts`. Backends only supply primitive key operations;
 * everything that interprets those keys lives in {@link BaseRepository} so the
 * layout is identical across backends.
 *
 * Not-found reads return `undefined`. Backend failures surface as
 * {@link StorageError}.
 */

import { readFile } from 'node:fs/promises';
import { contentExtension, type Artifact } from '../artifacts/artifact.js';
import {
  chunkFromRecord,
  chunkToRecord,
  isArtifactType,
  isRecord,
  type ArtifactRecord,
  type Chunk,
} from '../artifacts/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  INDEX_FILE,
  artifactDir,
  artifactIndexPath,
  attachmentPath,
  chunkDir,
  chunkPath,
  subartifactContentPath,
  versionedIndexPath,
} from './paths.js';
import type { ChunkWindow, StoreArtifactOptions, WorkspaceIndex, WorkspaceIndexData } from './types.js';

const log = createLogger('repository');

export interface Repository {
  /** Backend identifier, e.g. 'local'. */
  readonly kind: string;

  getIndexData(): Promise<WorkspaceIndex | undefined>;
  /** Replace the index, keeping the previous one under `versions/`. Last writer wins. */
  storeIndex(data: WorkspaceIndexData): Promise<void>;

  storeArtifact(artifact: Artifact, options?: StoreArtifactOptions): Promise<void>;
  retrieveArtifact(artifactId: string): Promise<ArtifactRecord | undefined>;
  getSubartifactContent(artifactId: string, parentId: string): Promise<string | undefined>;
  getAttachmentFile(artifactId: string, fileName: string): Promise<Buffer | undefined>;

  /** Replace the artifact's whole chunk directory with `chunks`. */
  storeArtifactChunks(artifact: Artifact, chunks: Chunk[]): Promise<void>;
  getChunkWindow(
    artifactId: string,
    parentId: string,
    chunkIndex: number,
    preN: number,
    nextN: number,
  ): Promise<ChunkWindow>;
  getChunks(artifactId: string, parentId: string): Promise<Chunk[] | undefined>;

  /** Remove every stored file of a root artifact. */
  deleteArtifact(artifactId: string): Promise<void>;
}

/**
 * Type guard for a stored artifact descriptor.
 */
export function isArtifactRecord(value: unknown): value is ArtifactRecord {
  return (
    isRecord(value) &&
    typeof value.artifact_id === 'string' &&
    isArtifactType(value.artifact_type) &&
    Array.isArray(value.sublist)
  );
}

function isWorkspaceIndex(value: unknown): value is WorkspaceIndex {
  return isRecord(value) && isRecord(value.workspace);
}

export abstract class BaseRepository implements Repository {
  abstract readonly kind: string;

  // ─── Backend primitives ─────────────────────────────────────────────────────

  /** Read a key; undefined when absent. */
  protected abstract readBytes(key: string): Promise<Buffer | undefined>;
  protected abstract writeBytes(key: string, data: Buffer | string): Promise<void>;
  /** Names directly under `dir`; undefined when the directory is absent. */
  protected abstract listNames(dir: string): Promise<string[] | undefined>;
  /** Remove `dir` and everything beneath it. */
  protected abstract removeDir(dir: string): Promise<void>;
  /**
   * Replace the contents of `dir` with `files` (name → text). On failure the
   * directory holds no file written by this call.
   */
  protected abstract replaceDir(dir: string, files: Map<string, string>): Promise<void>;

  // ─── JSON helpers ───────────────────────────────────────────────────────────

  protected async readText(key: string): Promise<string | undefined> {
    const data = await this.readBytes(key);
    return data?.toString('utf-8');
  }

  /**
   * Read and parse a JSON key. Unparsable content is logged and treated as absent.
   */
  protected async readJson(key: string): Promise<unknown> {
    const text = await this.readText(key);
    if (text === undefined) return undefined;
    try {
      return JSON.parse(text);
    } catch (error) {
      log.warn('Skipping unparsable JSON', { key, error: errorMessage(error) });
      return undefined;
    }
  }

  protected async writeJson(key: string, value: unknown): Promise<void> {
    await this.writeBytes(key, JSON.stringify(value, null, 2));
  }

  // ─── Index ──────────────────────────────────────────────────────────────────

  async getIndexData(): Promise<WorkspaceIndex | undefined> {
    const data = await this.readJson(INDEX_FILE);
    return isWorkspaceIndex(data) ? data : undefined;
  }

  async storeIndex(data: WorkspaceIndexData): Promise<void> {
    const previous = await this.readText(INDEX_FILE);
    if (previous !== undefined) {
      await this.writeBytes(versionedIndexPath(Math.floor(Date.now() / 1000)), previous);
    }
    await this.writeJson(INDEX_FILE, { workspace: data });
  }

  // ─── Artifacts ──────────────────────────────────────────────────────────────

  async storeArtifact(artifact: Artifact, options: StoreArtifactOptions = {}): Promise<void> {
    const { saveSubListContent = true, saveAttachmentFiles = true } = options;
    const record = artifact.toDict({ includeHistory: true });

    if (saveSubListContent) {
      for (const [i, sub] of artifact.sublist.entries()) {
        await this.writeBytes(
          subartifactContentPath(artifact.artifactId, sub.artifactId, contentExtension(sub.artifactType)),
          sub.content,
        );
        const subRecord = record.sublist[i];
        if (subRecord) subRecord.content = '';
      }
    }

    if (saveAttachmentFiles) {
      await this.copyAttachments(artifact);
    }

    await this.writeJson(artifactIndexPath(artifact.artifactId), record);
    log.debug('Stored artifact', { artifactId: artifact.artifactId, subs: artifact.sublist.length });
  }

  private async copyAttachments(artifact: Artifact): Promise<void> {
    for (const file of artifact.attachmentFiles) {
      let data: Buffer;
      try {
        data = await readFile(file.filePath);
      } catch (error) {
        log.warn('Attachment source not readable, skipping', {
          artifactId: artifact.artifactId,
          filePath: file.filePath,
          error: errorMessage(error),
        });
        continue;
      }
      await this.writeBytes(attachmentPath(artifact.artifactId, file.fileName), data);
    }
  }

  async retrieveArtifact(artifactId: string): Promise<ArtifactRecord | undefined> {
    const data = await this.readJson(artifactIndexPath(artifactId));
    return isArtifactRecord(data) ? data : undefined;
  }

  async getSubartifactContent(artifactId: string, parentId: string): Promise<string | undefined> {
    const parent = await this.retrieveArtifact(parentId);
    const entry = parent?.sublist.find((s) => s.artifact_id === artifactId);
    const ext = entry ? contentExtension(entry.artifact_type) : 'txt';

    const content = await this.readText(subartifactContentPath(parentId, artifactId, ext));
    if (content !== undefined || ext === 'txt') return content;
    return this.readText(subartifactContentPath(parentId, artifactId, 'txt'));
  }

  async getAttachmentFile(artifactId: string, fileName: string): Promise<Buffer | undefined> {
    return this.readBytes(attachmentPath(artifactId, fileName));
  }

  async deleteArtifact(artifactId: string): Promise<void> {
    await this.removeDir(artifactDir(artifactId));
    log.debug('Deleted artifact files', { artifactId });
  }

  // ─── Chunks ─────────────────────────────────────────────────────────────────

  async storeArtifactChunks(artifact: Artifact, chunks: Chunk[]): Promise<void> {
    const dir = chunkDir(artifact.artifactId, artifact.parentId);
    if (chunks.length === 0) {
      await this.removeDir(dir);
      log.debug('Cleared chunks', { artifactId: artifact.artifactId });
      return;
    }
    const files = new Map<string, string>();
    for (const chunk of chunks) {
      const key = chunkPath(artifact.artifactId, artifact.parentId, chunk.chunkMetadata.chunkIndex);
      files.set(key.slice(dir.length + 1), JSON.stringify(chunkToRecord(chunk), null, 2));
    }

    const start = performance.now();
    await this.replaceDir(dir, files);
    log.debug('Stored chunks', {
      artifactId: artifact.artifactId,
      count: chunks.length,
      durationMs: Math.round(performance.now() - start),
    });
  }

  private async readChunk(artifactId: string, parentId: string, chunkIndex: number): Promise<Chunk | undefined> {
    if (chunkIndex < 0) return undefined;
    const key = chunkPath(artifactId, parentId, chunkIndex);
    const data = await this.readJson(key);
    if (data === undefined) return undefined;
    const chunk = chunkFromRecord(data);
    if (!chunk) {
      log.warn('Skipping malformed chunk file', { key });
    }
    return chunk;
  }

  /**
   * Read `count` neighbours stepping by `direction`, nearest first, stopping
   * at the first missing index.
   */
  private async readNeighbours(
    artifactId: string,
    parentId: string,
    chunkIndex: number,
    count: number,
    direction: 1 | -1,
  ): Promise<Chunk[]> {
    const indexes: number[] = [];
    for (let step = 1; step <= count; step++) {
      const index = chunkIndex + direction * step;
      if (index < 0) break;
      indexes.push(index);
    }
    const found = await Promise.all(indexes.map((i) => this.readChunk(artifactId, parentId, i)));

    const result: Chunk[] = [];
    for (const chunk of found) {
      if (!chunk) break;
      result.push(chunk);
    }
    return result;
  }

  async getChunkWindow(
    artifactId: string,
    parentId: string,
    chunkIndex: number,
    preN: number,
    nextN: number,
  ): Promise<ChunkWindow> {
    const chunk = await this.readChunk(artifactId, parentId, chunkIndex);
    if (!chunk) {
      return { preNChunks: [], chunk: undefined, nextNChunks: [] };
    }

    const [preNChunks, nextNChunks] = await Promise.all([
      this.readNeighbours(artifactId, parentId, chunkIndex, preN, -1),
      this.readNeighbours(artifactId, parentId, chunkIndex, nextN, 1),
    ]);
    return { preNChunks, chunk, nextNChunks };
  }

  async getChunks(artifactId: string, parentId: string): Promise<Chunk[] | undefined> {
    const dir = chunkDir(artifactId, parentId);
    const names = await this.listNames(dir);
    if (!names) return undefined;

    const chunks: Chunk[] = [];
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      const data = await this.readJson(`${dir}/${name}`);
      const chunk = data === undefined ? undefined : chunkFromRecord(data);
      if (chunk) {
        chunks.push(chunk);
      } else {
        log.warn('Skipping unreadable chunk file', { dir, name });
      }
    }
    return chunks;
  }
}


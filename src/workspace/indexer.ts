/**
 * Indexing: chunk, embed and write an artifact into the vector and lexical
 * stores.
 *
 * An artifact and its sub-artifacts are indexed concurrently, bounded by
 * `maxConcurrent`. Each item's failure is collected rather than thrown so siblings
 * still complete; the caller gets an {@link IndexingSummary}. Chunk rewrites
 * for one artifact id never overlap.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import type { Artifact } from '../artifacts/artifact.js';
import type { Chunk } from '../artifacts/types.js';
import type { Chunker } from '../chunking/chunker.js';
import type { EmbeddingProvider } from '../models/embedding-provider.js';
import type { KeywordStore } from '../storage/keyword-store.js';
import type { Repository } from '../storage/repository.js';
import type { VectorMetadata, VectorRecord } from '../storage/types.js';
import type { VectorStore } from '../storage/vector-store.js';
import { EmbeddingError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('indexer');

export interface IndexingFailure {
  artifactId: string;
  error: string;
}

export interface IndexingSummary {
  /** Artifacts (root and sub) that produced vector records. */
  indexed: number;
  /** Artifacts skipped for having no content. */
  skipped: number;
  /** Chunk records written across all artifacts. */
  chunks: number;
  failures: IndexingFailure[];
}

export interface IndexerDeps {
  workspaceId: string;
  repository: Repository;
  vectorStore: VectorStore;
  keywordStore?: KeywordStore;
  embedder?: EmbeddingProvider;
  /** Undefined when chunking is disabled. */
  chunker?: Chunker;
  maxConcurrent: number;
}

type ItemOutcome = { kind: 'indexed'; chunks: number } | { kind: 'skipped' };

export function emptySummary(): IndexingSummary {
  return { indexed: 0, skipped: 0, chunks: 0, failures: [] };
}

export function mergeSummaries(a: IndexingSummary, b: IndexingSummary): IndexingSummary {
  return {
    indexed: a.indexed + b.indexed,
    skipped: a.skipped + b.skipped,
    chunks: a.chunks + b.chunks,
    failures: [...a.failures, ...b.failures],
  };
}

export class ArtifactIndexer {
  private readonly limit: LimitFunction;
  /** One single-slot limiter per artifact id with a chunk rewrite in flight. */
  private readonly chunkLocks = new Map<string, LimitFunction>();

  constructor(private readonly deps: IndexerDeps) {
    this.limit = pLimit(deps.maxConcurrent);
  }

  get enabled(): boolean {
    return this.deps.embedder !== undefined;
  }

  /**
   * Index `artifact` and every sub-artifact. Never throws for a per-item failure.
   */
  async index(artifact: Artifact): Promise<IndexingSummary> {
    const summary = emptySummary();
    if (!this.deps.embedder) return summary;

    const items = [artifact, ...artifact.sublist];
    const start = performance.now();
    const settled = await Promise.allSettled(items.map((item) => this.limit(() => this.indexOne(item))));

    for (const [i, result] of settled.entries()) {
      const item = items[i];
      if (!item) continue;
      if (result.status === 'fulfilled') {
        if (result.value.kind === 'indexed') {
          summary.indexed++;
          summary.chunks += result.value.chunks;
        } else {
          summary.skipped++;
        }
      } else {
        const error = errorMessage(result.reason);
        log.error('Indexing failed', { artifactId: item.artifactId, error });
        summary.failures.push({ artifactId: item.artifactId, error });
      }
    }

    log.info('Indexed artifact', {
      artifactId: artifact.artifactId,
      indexed: summary.indexed,
      skipped: summary.skipped,
      chunks: summary.chunks,
      failures: summary.failures.length,
      durationMs: Math.round(performance.now() - start),
    });
    return summary;
  }

  /**
   * Remove every vector and lexical record of `artifact` and its sub-artifacts.
   */
  async remove(artifact: Artifact): Promise<void> {
    const { workspaceId, vectorStore, keywordStore } = this.deps;
    for (const item of [artifact, ...artifact.sublist]) {
      await vectorStore.delete(workspaceId, { filter: { artifactId: item.artifactId } });
      keywordStore?.deleteByArtifact(workspaceId, item.artifactId);
    }
  }

  private async indexOne(item: Artifact): Promise<ItemOutcome> {
    const text = item.getEmbeddingText();
    if (!text) {
      log.debug('No embedding text, skipping', { artifactId: item.artifactId });
      return { kind: 'skipped' };
    }

    const { chunker } = this.deps;
    if (!chunker) {
      await this.replaceRecords(item, [this.artifactRecordInput(item, text)]);
      return { kind: 'indexed', chunks: 0 };
    }

    return this.exclusive(item.artifactId, async (): Promise<ItemOutcome> => {
      const chunks = await chunker.chunk(item);
      if (chunks.length === 0) {
        log.debug('Chunker produced no chunks', { artifactId: item.artifactId });
        return { kind: 'skipped' };
      }
      await this.deps.repository.storeArtifactChunks(item, chunks);
      item.chunkList = chunks;
      await this.replaceRecords(item, chunks.map((chunk) => this.chunkRecordInput(item, chunk)));
      return { kind: 'indexed', chunks: chunks.length };
    });
  }

  private async exclusive<T>(artifactId: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.chunkLocks.get(artifactId);
    if (!lock) {
      lock = pLimit(1);
      this.chunkLocks.set(artifactId, lock);
    }
    try {
      return await lock(fn);
    } finally {
      if (lock.activeCount === 0 && lock.pendingCount === 0 && this.chunkLocks.get(artifactId) === lock) {
        this.chunkLocks.delete(artifactId);
      }
    }
  }

  private chunkRecordInput(item: Artifact, chunk: Chunk): RecordInput {
    return {
      id: chunk.chunkId,
      content: chunk.content,
      chunkId: chunk.chunkId,
      chunkIndex: chunk.chunkMetadata.chunkIndex,
      artifact: item,
    };
  }

  private artifactRecordInput(item: Artifact, text: string): RecordInput {
    return { id: item.artifactId, content: text, artifact: item };
  }

  /**
   * Embed `inputs` and make them the only records of the artifact.
   */
  private async replaceRecords(item: Artifact, inputs: RecordInput[]): Promise<void> {
    const { workspaceId, vectorStore, keywordStore } = this.deps;
    const embedder = this.deps.embedder;
    if (!embedder) return;

    const embeddings = await embedder.embedDocuments(inputs.map((i) => i.content));
    if (embeddings.length !== inputs.length) {
      throw new EmbeddingError(
        `Expected ${inputs.length} embeddings, got ${embeddings.length}`,
        'EMBED_RESPONSE_INVALID',
      );
    }

    const now = new Date().toISOString();
    const records: VectorRecord[] = inputs.map((input, i) => ({
      id: input.id,
      embedding: embeddings[i] ?? [],
      content: input.content,
      metadata: buildMetadata(input, embedder.modelName, now),
    }));

    // Drop records left by the previous chunking
    await vectorStore.delete(workspaceId, { filter: { artifactId: item.artifactId } });
    await vectorStore.upsert(workspaceId, records);

    if (keywordStore) {
      keywordStore.deleteByArtifact(workspaceId, item.artifactId);
      keywordStore.upsert(
        workspaceId,
        inputs.map((input) => ({
          id: input.id,
          artifactId: item.artifactId,
          parentId: item.parentId,
          content: input.content,
        })),
      );
    }
  }
}

interface RecordInput {
  id: string;
  content: string;
  chunkId?: string;
  chunkIndex?: number;
  artifact: Artifact;
}

function buildMetadata(input: RecordInput, embeddingModel: string, now: string): VectorMetadata {
  const metadata: VectorMetadata = {
    artifactId: input.artifact.artifactId,
    parentId: input.artifact.parentId,
    artifactType: input.artifact.artifactType,
    embeddingModel,
    createdAt: now,
    updatedAt: now,
  };
  if (input.chunkId !== undefined) metadata.chunkId = input.chunkId;
  if (input.chunkIndex !== undefined) metadata.chunkIndex = input.chunkIndex;
  return metadata;
}

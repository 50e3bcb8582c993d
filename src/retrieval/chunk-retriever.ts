/**
 * Hybrid chunk retrieval.
 *
 * Pipeline: validate → embed query → vector search → chunk windows → [rerank]
 *
 * Vector hits identify a chunk by its metadata (`artifactId`, `parentId`,
 * `chunkIndex`); the repository supplies the chunk itself and its
 * neighbours. A hit that cannot be resolved is logged and skipped so one
 * stale record never fails the whole search.
 */

import type { HybridSearchConfig, RerankerConfig } from '../config/workspace-config.js';
import type { EmbeddingProvider } from '../models/embedding-provider.js';
import type { Reranker } from '../rerank/reranker.js';
import type { Repository } from '../storage/repository.js';
import type { VectorSearchHit } from '../storage/types.js';
import type { VectorStore } from '../storage/vector-store.js';
import { RetrievalError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { parseChunkSearchQuery, type ChunkSearchQuery, type ChunkSearchResult } from './query.js';

const log = createLogger('chunk-retriever');

export type ChunkSearchInput = Partial<ChunkSearchQuery> & { query: string };

export interface RetrieverDeps {
  /** Vector collection name. */
  workspaceId: string;
  repository: Repository;
  vectorStore: VectorStore;
  embedder?: EmbeddingProvider;
  reranker?: Reranker;
  hybridSearch: HybridSearchConfig;
  rerankerConfig?: Pick<RerankerConfig, 'threshold' | 'topN'>;
}

/**
 * Embed `query` with the configured provider.
 */
export async function embedQuery(embedder: EmbeddingProvider | undefined, query: string): Promise<number[]> {
  if (!embedder) {
    throw new RetrievalError('No embedding provider configured', 'NO_EMBEDDER');
  }
  return embedder.embedQuery(query);
}

/**
 * Vector search that treats a missing collection as no hits.
 */
export async function searchVectors(
  deps: RetrieverDeps,
  embedding: number[],
  filters: ChunkSearchQuery['filters'],
  limit: number,
  threshold: number,
): Promise<VectorSearchHit[]> {
  const hits = await deps.vectorStore.search(deps.workspaceId, [embedding], filters, limit, threshold);
  if (!hits) {
    log.debug('Collection not found', { collection: deps.workspaceId });
    return [];
  }
  return hits;
}

export class ChunkRetriever {
  constructor(private readonly deps: RetrieverDeps) {}

  /**
   * Search chunks by meaning and return each hit with its surrounding window.
   *
   * @throws ValidationError for a malformed query
   * @throws RetrievalError when no embedder is configured
   */
  async search(input: ChunkSearchInput): Promise<ChunkSearchResult[]> {
    const { hybridSearch } = this.deps;
    const query = parseChunkSearchQuery(input, { threshold: hybridSearch.threshold, limit: hybridSearch.topK });

    if (!hybridSearch.enabled) {
      log.info('Hybrid search disabled, returning no results');
      return [];
    }

    const start = performance.now();
    const embedding = await embedQuery(this.deps.embedder, query.query);
    const hits = await searchVectors(this.deps, embedding, query.filters, query.limit, query.threshold);

    const results = await this.resolveHits(hits, query);
    const ranked = await this.rerank(query, results);

    log.debug('Chunk search complete', {
      hits: hits.length,
      returned: ranked.length,
      durationMs: Math.round(performance.now() - start),
    });
    return ranked;
  }

  private async resolveHits(hits: VectorSearchHit[], query: ChunkSearchQuery): Promise<ChunkSearchResult[]> {
    const seen = new Set<string>();
    const results: ChunkSearchResult[] = [];

    for (const hit of hits) {
      const { artifactId, parentId, chunkIndex } = hit.metadata;
      const chunkId = hit.metadata.chunkId ?? hit.id;
      if (seen.has(chunkId)) continue;
      seen.add(chunkId);

      if (!artifactId || typeof chunkIndex !== 'number') {
        log.warn('Skipping hit without chunk metadata', { id: hit.id });
        continue;
      }

      try {
        const window = await this.deps.repository.getChunkWindow(
          artifactId,
          parentId,
          chunkIndex,
          query.preN,
          query.nextN,
        );
        if (!window.chunk) {
          log.warn('Skipping hit with no stored chunk', { id: hit.id, artifactId, chunkIndex });
          continue;
        }
        results.push({
          chunk: window.chunk,
          preNChunks: window.preNChunks,
          nextNChunks: window.nextNChunks,
          score: hit.similarity,
        });
      } catch (error) {
        log.warn('Skipping hit after repository error', { id: hit.id, error: errorMessage(error) });
      }
    }

    return results;
  }

  /**
   * Reorder `results` by reranker score. The reranker's own threshold and topN
   * win over the query's.
   */
  private async rerank(query: ChunkSearchQuery, results: ChunkSearchResult[]): Promise<ChunkSearchResult[]> {
    const { reranker, rerankerConfig } = this.deps;
    if (!reranker || results.length === 0) return results;

    const reranked = await reranker.rerank(
      query.query,
      results.map((r) => ({ id: r.chunk.chunkId, text: r.chunk.content })),
      { threshold: rerankerConfig?.threshold ?? query.threshold, topN: rerankerConfig?.topN ?? query.limit },
    );

    const out: ChunkSearchResult[] = [];
    for (const { index, score } of reranked) {
      const result = results[index];
      if (result) out.push({ ...result, score });
    }
    return out;
  }
}

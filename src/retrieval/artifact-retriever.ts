/**
 * Artifact-level retrieval: vector hits collapsed to the artifacts they
 * belong to, best hit per artifact.
 */

import type { Artifact } from '../artifacts/artifact.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { embedQuery, searchVectors, type RetrieverDeps } from './chunk-retriever.js';
import { parseArtifactSearchQuery, type ArtifactSearchQuery, type ArtifactSearchResult } from './query.js';

const log = createLogger('artifact-retriever');

/** Resolves an artifact (or sub-artifact, when `parentId` is set) by id. */
export type ArtifactResolver = (artifactId: string, parentId: string) => Promise<Artifact | undefined>;

export type ArtifactSearchInput = Partial<ArtifactSearchQuery> & { query: string };

export class ArtifactRetriever {
  constructor(
    private readonly deps: RetrieverDeps,
    private readonly resolve: ArtifactResolver,
  ) {}

  /**
   * @throws ValidationError for a malformed query
   * @throws RetrievalError when no embedder is configured
   */
  async search(input: ArtifactSearchInput): Promise<ArtifactSearchResult[]> {
    const { hybridSearch } = this.deps;
    const query = parseArtifactSearchQuery(input, { threshold: hybridSearch.threshold, limit: hybridSearch.topK });

    if (!hybridSearch.enabled) {
      log.info('Hybrid search disabled, returning no results');
      return [];
    }

    const embedding = await embedQuery(this.deps.embedder, query.query);
    // Several chunks may map to one artifact; over-fetch so the limit still fills
    const hits = await searchVectors(this.deps, embedding, undefined, query.limit * 4, query.threshold);

    const typeFilter = query.filterTypes ? new Set(query.filterTypes) : undefined;
    const seen = new Set<string>();
    const results: ArtifactSearchResult[] = [];

    for (const hit of hits) {
      if (results.length >= query.limit) break;
      const { artifactId, parentId } = hit.metadata;
      if (!artifactId || seen.has(artifactId)) continue;
      seen.add(artifactId);

      try {
        const artifact = await this.resolve(artifactId, parentId);
        if (!artifact) {
          log.warn('Skipping hit for unknown artifact', { id: hit.id, artifactId });
          continue;
        }
        if (typeFilter && !typeFilter.has(artifact.artifactType)) continue;
        results.push({ artifact, score: hit.similarity });
      } catch (error) {
        log.warn('Skipping hit after resolve error', { id: hit.id, error: errorMessage(error) });
      }
    }

    return results;
  }
}

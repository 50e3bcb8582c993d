/**
 * Retrieval exports.
 */

export { ChunkRetriever, embedQuery, searchVectors } from './chunk-retriever.js';
export type { ChunkSearchInput, RetrieverDeps } from './chunk-retriever.js';
export { ArtifactRetriever } from './artifact-retriever.js';
export type { ArtifactResolver, ArtifactSearchInput } from './artifact-retriever.js';
export { DEFAULT_CHUNK_QUERY, parseArtifactSearchQuery, parseChunkSearchQuery } from './query.js';
export type {
  ArtifactSearchQuery,
  ArtifactSearchResult,
  ChunkSearchQuery,
  ChunkSearchResult,
  QueryDefaults,
} from './query.js';
export { artifactResultToRecord, chunkResultToRecord, keywordHitToRecord } from './wire.js';
export type { ArtifactSearchResultRecord, ChunkSearchResultRecord, KeywordHitRecord } from './wire.js';

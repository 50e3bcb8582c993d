/**
 * Storage layer exports.
 */

// Database
export { openDatabase, applySchema, getSchemaVersion, SCHEMA_VERSION } from './db.js';
export type { Db } from './db.js';

// Types
export type {
  ChunkWindow,
  IndexedArtifact,
  KeywordSearchResult,
  StoreArtifactOptions,
  VectorFilter,
  VectorMetadata,
  VectorRecord,
  VectorSearchHit,
  WorkspaceIndex,
  WorkspaceIndexData,
} from './types.js';

// Repositories
export { BaseRepository, isArtifactRecord } from './repository.js';
export type { Repository } from './repository.js';
export { LocalRepository } from './local-repository.js';
export { ObjectStorageRepository } from './object-repository.js';
export { MemoryObjectStore, S3ObjectStore } from './object-store.js';
export type { ObjectStore } from './object-store.js';
export { createRepository, repositoryRegistry } from './repository-registry.js';
export * as paths from './paths.js';

// Vector store
export { SqliteVectorStore, matchesFilter, parseVectorMetadata, vectorStoreRegistry } from './vector-store.js';
export type { VectorDeleteOptions, VectorStore } from './vector-store.js';

// Keyword store
export { KeywordStore, sanitizeQuery } from './keyword-store.js';
export type { KeywordEntry, KeywordHit } from './keyword-store.js';

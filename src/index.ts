/**
 * chunkvault
 *
 * Hierarchical artifacts split into overlapping chunks, persisted on
 * interchangeable storage backends and retrieved by hybrid vector and BM25 search.
 *
 * @packageDocumentation
 */

// Artifacts
export * from './artifacts/types.js';
export { Artifact, contentExtension } from './artifacts/artifact.js';
export type { ArtifactInit, ToDictOptions } from './artifacts/artifact.js';

// Chunking
export * from './chunking/index.js';

// Configuration
export * from './config/workspace-config.js';
export * from './config/loader.js';

// Storage
export * from './storage/index.js';

// Embeddings and reranking
export * from './models/index.js';
export * from './rerank/index.js';

// Retrieval
export * from './retrieval/index.js';

// Workspace
export * from './workspace/index.js';

// HTTP API
export * from './server/index.js';

// Utilities
export * from './utils/errors.js';
export { createLogger, setLogLevel, setJsonMode, getLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LogFields } from './utils/logger.js';
export { ProviderRegistry } from './utils/provider-registry.js';
export type { ProviderFactory } from './utils/provider-registry.js';

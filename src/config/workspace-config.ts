/**
 * Runtime configuration for a workspace.
 */

import type { ChunkConfig } from '../chunking/chunker.js';

export type StorageProvider = 'local' | 's3' | 'memory';
export type VectorStoreProvider = 'sqlite';
export type EmbeddingProviderId = 'ollama' | 'openai';
export type RerankerProviderId = 'none' | 'bm25' | 'http';

export interface S3Config {
  bucket: string;
  /** Key prefix every object is stored under (no trailing slash). */
  prefix: string;
  region: string;
  /** Custom endpoint for S3-compatible stores. */
  endpoint?: string;
  forcePathStyle: boolean;
}

export interface StorageConfig {
  provider: StorageProvider;
  /** Root directory for the local provider. */
  path: string;
  s3: S3Config;
}

export interface VectorStoreConfig {
  provider: VectorStoreProvider;
  /** SQLite file, or ':memory:'. */
  dbPath: string;
}

export interface ChunkingConfig extends ChunkConfig {
  enabled: boolean;
}

export interface EmbeddingConfig {
  enabled: boolean;
  provider: EmbeddingProviderId;
  /** Model name as the remote provider knows it. */
  model: string;
  baseUrl: string;
  apiKey: string;
  /** Per-call timeout for remote providers. */
  timeoutMs: number;
  /** Maximum embedding calls in flight while indexing. */
  maxConcurrent: number;
}

export interface HybridSearchConfig {
  enabled: boolean;
  /** Default result limit when a query leaves it out. */
  topK: number;
  /** Default similarity threshold when a query leaves it out. */
  threshold: number;
}

export interface RerankerConfig {
  provider: RerankerProviderId;
  baseUrl: string;
  apiKey: string;
  model: string;
  /** BM25 term-frequency saturation. */
  k1: number;
  /** BM25 length normalisation. */
  b: number;
  /** Keep at most this many reranked results. */
  topN?: number;
  /** Drop reranked results scoring below this. */
  threshold?: number;
  timeoutMs: number;
}

export interface WorkspaceConfig {
  storage: StorageConfig;
  vectorStore: VectorStoreConfig;
  chunking: ChunkingConfig;
  embedding: EmbeddingConfig;
  hybridSearch: HybridSearchConfig;
  reranker: RerankerConfig;
}

export const DEFAULT_CONFIG: WorkspaceConfig = {
  storage: {
    provider: 'local',
    path: '~/.chunkvault/workspaces',
    s3: {
      bucket: '',
      prefix: 'chunkvault',
      region: 'us-east-1',
      forcePathStyle: false,
    },
  },
  vectorStore: {
    provider: 'sqlite',
    dbPath: '~/.chunkvault/vectors.db',
  },
  chunking: {
    enabled: true,
    provider: 'character',
    chunkSize: 1000,
    chunkOverlap: 100,
    separator: '\n',
    tokensPerChunk: 256,
  },
  embedding: {
    enabled: true,
    provider: 'ollama',
    model: 'nomic-embed-text',
    baseUrl: 'http://localhost:11434',
    apiKey: '',
    timeoutMs: 30_000,
    maxConcurrent: 10,
  },
  hybridSearch: {
    enabled: true,
    topK: 10,
    threshold: 0.8,
  },
  reranker: {
    provider: 'none',
    baseUrl: '',
    apiKey: '',
    model: '',
    k1: 1.2,
    b: 0.75,
    timeoutMs: 30_000,
  },
};

/**
 * Get configuration with section overrides applied.
 */
export function getConfig(overrides: Partial<WorkspaceConfig> = {}): WorkspaceConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate configuration values.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const errors: string[] = [];

  if (config.storage.provider === 'local' && !config.storage.path) {
    errors.push('storage.path is required for the local provider');
  }
  if (config.storage.provider === 's3' && !config.storage.s3.bucket) {
    errors.push('storage.s3.bucket is required for the s3 provider');
  }
  if (config.embedding.enabled && !config.embedding.baseUrl) {
    errors.push(`embedding.baseUrl is required for the ${config.embedding.provider} provider`);
  }
  if (config.embedding.timeoutMs <= 0) {
    errors.push('embedding.timeoutMs must be positive');
  }
  if (!Number.isInteger(config.embedding.maxConcurrent) || config.embedding.maxConcurrent < 1) {
    errors.push('embedding.maxConcurrent must be a positive integer');
  }
  if (config.chunking.chunkSize <= 0) {
    errors.push('chunking.chunkSize must be positive');
  }
  if (config.chunking.chunkOverlap < 0 || config.chunking.chunkOverlap >= config.chunking.chunkSize) {
    errors.push('chunking.chunkOverlap must be >= 0 and smaller than chunking.chunkSize');
  }
  if (config.hybridSearch.threshold < 0 || config.hybridSearch.threshold > 1) {
    errors.push('hybridSearch.threshold must be between 0 and 1 (inclusive)');
  }
  if (config.hybridSearch.topK < 1) {
    errors.push('hybridSearch.topK must be at least 1');
  }
  if (config.reranker.provider === 'http' && !config.reranker.baseUrl) {
    errors.push('reranker.baseUrl is required for the http provider');
  }
  if (config.reranker.k1 < 0) {
    errors.push('reranker.k1 must be >= 0');
  }
  if (config.reranker.b < 0 || config.reranker.b > 1) {
    errors.push('reranker.b must be between 0 and 1 (inclusive)');
  }

  return errors;
}

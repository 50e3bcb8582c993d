/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (CHUNKVAULT_*)
 * 3. Project config file (./chunkvault.config.json)
 * 4. User config file (~/.chunkvault/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  resolvePath,
  DEFAULT_CONFIG,
  type EmbeddingProviderId,
  type RerankerProviderId,
  type StorageProvider,
  type VectorStoreProvider,
  type WorkspaceConfig,
} from './workspace-config.js';
import type { ChunkerProvider } from '../chunking/chunker.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

const STORAGE_PROVIDERS: readonly StorageProvider[] = ['local', 's3', 'memory'];
const VECTOR_STORE_PROVIDERS: readonly VectorStoreProvider[] = ['sqlite'];
const CHUNKER_PROVIDERS: readonly ChunkerProvider[] = ['character', 'sentence', 'markdown', 'smart'];
const EMBEDDING_PROVIDERS: readonly EmbeddingProviderId[] = ['ollama', 'openai'];
const RERANKER_PROVIDERS: readonly RerankerProviderId[] = ['none', 'bm25', 'http'];

/** External config file structure. Provider ids stay strings until validated. */
export interface ExternalConfig {
  storage?: {
    provider?: string;
    path?: string;
    s3?: {
      bucket?: string;
      prefix?: string;
      region?: string;
      endpoint?: string;
      forcePathStyle?: boolean;
    };
  };
  vectorStore?: {
    provider?: string;
    dbPath?: string;
  };
  chunking?: {
    enabled?: boolean;
    provider?: string;
    chunkSize?: number;
    chunkOverlap?: number;
    separator?: string;
    tokensPerChunk?: number;
  };
  embedding?: {
    enabled?: boolean;
    provider?: string;
    model?: string;
    baseUrl?: string;
    apiKey?: string;
    timeoutMs?: number;
    maxConcurrent?: number;
  };
  hybridSearch?: {
    enabled?: boolean;
    topK?: number;
    threshold?: number;
  };
  reranker?: {
    provider?: string;
    baseUrl?: string;
    apiKey?: string;
    model?: string;
    k1?: number;
    b?: number;
    topN?: number;
    threshold?: number;
    timeoutMs?: number;
  };
}

/** Default external config values */
const EXTERNAL_DEFAULTS: ExternalConfig = DEFAULT_CONFIG;

/**
 * Remove keys whose value is undefined, so spreads never clobber set values.
 */
export function compact<T extends object>(obj: T): T {
  for (const key of Object.keys(obj)) {
    if (Reflect.get(obj, key) === undefined) {
      Reflect.deleteProperty(obj, key);
    }
  }
  return obj;
}

// ─── JSON parsing ─────────────────────────────────────────────────────────────

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(obj: Json | undefined, key: string): Json | undefined {
  const value = obj?.[key];
  return isObject(value) ? value : undefined;
}

function str(obj: Json | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' ? value : undefined;
}

function num(obj: Json | undefined, key: string): number | undefined {
  const value = obj?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function bool(obj: Json | undefined, key: string): boolean | undefined {
  const value = obj?.[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Pick the recognised fields out of parsed JSON. Unknown keys and values of
 * the wrong type are ignored.
 */
export function parseExternalConfig(raw: unknown): ExternalConfig {
  if (!isObject(raw)) return {};
  const config: ExternalConfig = {};

  const storage = section(raw, 'storage');
  if (storage) {
    const s3 = section(storage, 's3');
    config.storage = compact({
      provider: str(storage, 'provider'),
      path: str(storage, 'path'),
      s3: s3
        ? compact({
            bucket: str(s3, 'bucket'),
            prefix: str(s3, 'prefix'),
            region: str(s3, 'region'),
            endpoint: str(s3, 'endpoint'),
            forcePathStyle: bool(s3, 'forcePathStyle'),
          })
        : undefined,
    });
  }

  const vectorStore = section(raw, 'vectorStore');
  if (vectorStore) {
    config.vectorStore = compact({
      provider: str(vectorStore, 'provider'),
      dbPath: str(vectorStore, 'dbPath'),
    });
  }

  const chunking = section(raw, 'chunking');
  if (chunking) {
    config.chunking = compact({
      enabled: bool(chunking, 'enabled'),
      provider: str(chunking, 'provider'),
      chunkSize: num(chunking, 'chunkSize'),
      chunkOverlap: num(chunking, 'chunkOverlap'),
      separator: str(chunking, 'separator'),
      tokensPerChunk: num(chunking, 'tokensPerChunk'),
    });
  }

  const embedding = section(raw, 'embedding');
  if (embedding) {
    config.embedding = compact({
      enabled: bool(embedding, 'enabled'),
      provider: str(embedding, 'provider'),
      model: str(embedding, 'model'),
      baseUrl: str(embedding, 'baseUrl'),
      apiKey: str(embedding, 'apiKey'),
      timeoutMs: num(embedding, 'timeoutMs'),
      maxConcurrent: num(embedding, 'maxConcurrent'),
    });
  }

  const hybridSearch = section(raw, 'hybridSearch');
  if (hybridSearch) {
    config.hybridSearch = compact({
      enabled: bool(hybridSearch, 'enabled'),
      topK: num(hybridSearch, 'topK'),
      threshold: num(hybridSearch, 'threshold'),
    });
  }

  const reranker = section(raw, 'reranker');
  if (reranker) {
    config.reranker = compact({
      provider: str(reranker, 'provider'),
      baseUrl: str(reranker, 'baseUrl'),
      apiKey: str(reranker, 'apiKey'),
      model: str(reranker, 'model'),
      k1: num(reranker, 'k1'),
      b: num(reranker, 'b'),
      topN: num(reranker, 'topN'),
      threshold: num(reranker, 'threshold'),
      timeoutMs: num(reranker, 'timeoutMs'),
    });
  }

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return parseExternalConfig(JSON.parse(content));
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

// ─── Environment ──────────────────────────────────────────────────────────────

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function envFloat(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseFloat(raw);
  return Number.isNaN(value) ? undefined : value;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return raw === 'true' || raw === '1';
}

function envStr(name: string): string | undefined {
  return process.env[name] || undefined;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with CHUNKVAULT_ and use underscores for nesting.
 * Examples:
 *   CHUNKVAULT_STORAGE_PROVIDER=s3
 *   CHUNKVAULT_S3_BUCKET=my-bucket
 *   CHUNKVAULT_EMBEDDING_TIMEOUT_MS=10000
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  const s3 = compact({
    bucket: envStr('CHUNKVAULT_S3_BUCKET'),
    prefix: envStr('CHUNKVAULT_S3_PREFIX'),
    region: envStr('CHUNKVAULT_S3_REGION'),
    endpoint: envStr('CHUNKVAULT_S3_ENDPOINT'),
    forcePathStyle: envBool('CHUNKVAULT_S3_FORCE_PATH_STYLE'),
  });
  const storage = compact({
    provider: envStr('CHUNKVAULT_STORAGE_PROVIDER'),
    path: envStr('CHUNKVAULT_STORAGE_PATH'),
    s3: Object.keys(s3).length > 0 ? s3 : undefined,
  });
  if (Object.keys(storage).length > 0) config.storage = storage;

  const vectorStore = compact({
    provider: envStr('CHUNKVAULT_VECTOR_STORE_PROVIDER'),
    dbPath: envStr('CHUNKVAULT_VECTOR_STORE_DB_PATH'),
  });
  if (Object.keys(vectorStore).length > 0) config.vectorStore = vectorStore;

  const chunking = compact({
    enabled: envBool('CHUNKVAULT_CHUNKING_ENABLED'),
    provider: envStr('CHUNKVAULT_CHUNKING_PROVIDER'),
    chunkSize: envInt('CHUNKVAULT_CHUNKING_CHUNK_SIZE'),
    chunkOverlap: envInt('CHUNKVAULT_CHUNKING_CHUNK_OVERLAP'),
    tokensPerChunk: envInt('CHUNKVAULT_CHUNKING_TOKENS_PER_CHUNK'),
  });
  if (Object.keys(chunking).length > 0) config.chunking = chunking;

  const embedding = compact({
    enabled: envBool('CHUNKVAULT_EMBEDDING_ENABLED'),
    provider: envStr('CHUNKVAULT_EMBEDDING_PROVIDER'),
    model: envStr('CHUNKVAULT_EMBEDDING_MODEL'),
    baseUrl: envStr('CHUNKVAULT_EMBEDDING_BASE_URL'),
    apiKey: envStr('CHUNKVAULT_EMBEDDING_API_KEY'),
    timeoutMs: envInt('CHUNKVAULT_EMBEDDING_TIMEOUT_MS'),
    maxConcurrent: envInt('CHUNKVAULT_EMBEDDING_MAX_CONCURRENT'),
  });
  if (Object.keys(embedding).length > 0) config.embedding = embedding;

  const hybridSearch = compact({
    enabled: envBool('CHUNKVAULT_HYBRID_SEARCH_ENABLED'),
    topK: envInt('CHUNKVAULT_HYBRID_SEARCH_TOP_K'),
    threshold: envFloat('CHUNKVAULT_HYBRID_SEARCH_THRESHOLD'),
  });
  if (Object.keys(hybridSearch).length > 0) config.hybridSearch = hybridSearch;

  const reranker = compact({
    provider: envStr('CHUNKVAULT_RERANKER_PROVIDER'),
    baseUrl: envStr('CHUNKVAULT_RERANKER_BASE_URL'),
    apiKey: envStr('CHUNKVAULT_RERANKER_API_KEY'),
    model: envStr('CHUNKVAULT_RERANKER_MODEL'),
    topN: envInt('CHUNKVAULT_RERANKER_TOP_N'),
    threshold: envFloat('CHUNKVAULT_RERANKER_THRESHOLD'),
  });
  if (Object.keys(reranker).length > 0) config.reranker = reranker;

  return config;
}

/**
 * Deep merge two config objects, with source overriding target.
 */
function deepMerge(target: ExternalConfig, source: ExternalConfig): ExternalConfig {
  return {
    storage: {
      ...target.storage,
      ...source.storage,
      s3: { ...target.storage?.s3, ...source.storage?.s3 },
    },
    vectorStore: { ...target.vectorStore, ...source.vectorStore },
    chunking: { ...target.chunking, ...source.chunking },
    embedding: { ...target.embedding, ...source.embedding },
    hybridSearch: { ...target.hybridSearch, ...source.hybridSearch },
    reranker: { ...target.reranker, ...source.reranker },
  };
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function checkProvider(
  errors: string[],
  path: string,
  value: string | undefined,
  allowed: readonly string[],
): void {
  if (value !== undefined && !allowed.includes(value)) {
    errors.push(`${path} must be one of: ${allowed.join(', ')}`);
  }
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // Providers
  checkProvider(errors, 'storage.provider', config.storage?.provider, STORAGE_PROVIDERS);
  checkProvider(errors, 'vectorStore.provider', config.vectorStore?.provider, VECTOR_STORE_PROVIDERS);
  checkProvider(errors, 'chunking.provider', config.chunking?.provider, CHUNKER_PROVIDERS);
  checkProvider(errors, 'embedding.provider', config.embedding?.provider, EMBEDDING_PROVIDERS);
  checkProvider(errors, 'reranker.provider', config.reranker?.provider, RERANKER_PROVIDERS);

  // Storage validation
  if (config.storage?.provider === 's3' && !config.storage.s3?.bucket) {
    errors.push('storage.s3.bucket is required when storage.provider is s3');
  }

  // Chunking validation
  const chunking = config.chunking;
  if (chunking?.chunkSize !== undefined && chunking.chunkSize <= 0) {
    errors.push('chunking.chunkSize must be positive');
  }
  if (chunking?.chunkOverlap !== undefined) {
    if (chunking.chunkOverlap < 0) {
      errors.push('chunking.chunkOverlap must be >= 0');
    }
    if (chunking.chunkSize !== undefined && chunking.chunkOverlap >= chunking.chunkSize) {
      errors.push('chunking.chunkOverlap must be smaller than chunking.chunkSize');
    }
  }
  if (chunking?.tokensPerChunk !== undefined && chunking.tokensPerChunk <= 0) {
    errors.push('chunking.tokensPerChunk must be positive');
  }

  // Embedding validation
  const embedding = config.embedding;
  if (
    embedding?.enabled !== false &&
    (embedding?.provider === 'ollama' || embedding?.provider === 'openai') &&
    !embedding.baseUrl
  ) {
    errors.push(`embedding.baseUrl is required for the ${embedding.provider} provider`);
  }
  if (embedding?.timeoutMs !== undefined && embedding.timeoutMs <= 0) {
    errors.push('embedding.timeoutMs must be positive');
  }
  if (embedding?.maxConcurrent !== undefined && embedding.maxConcurrent < 1) {
    errors.push('embedding.maxConcurrent must be at least 1');
  }

  // Hybrid search validation
  const hybrid = config.hybridSearch;
  if (hybrid?.threshold !== undefined && (hybrid.threshold < 0 || hybrid.threshold > 1)) {
    errors.push('hybridSearch.threshold must be between 0 and 1 (inclusive)');
  }
  if (hybrid?.topK !== undefined && hybrid.topK < 1) {
    errors.push('hybridSearch.topK must be at least 1');
  }

  // Reranker validation
  const reranker = config.reranker;
  if (reranker?.provider === 'http' && !reranker.baseUrl) {
    errors.push('reranker.baseUrl is required for the http provider');
  }
  if (reranker?.b !== undefined && (reranker.b < 0 || reranker.b > 1)) {
    errors.push('reranker.b must be between 0 and 1 (inclusive)');
  }
  if (reranker?.k1 !== undefined && reranker.k1 < 0) {
    errors.push('reranker.k1 must be >= 0');
  }
  if (reranker?.topN !== undefined && reranker.topN < 1) {
    errors.push('reranker.topN must be at least 1');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (cliOverrides)
 * 2. Environment variables (CHUNKVAULT_*)
 * 3. Project config file (./chunkvault.config.json)
 * 4. User config file (~/.chunkvault/config.json)
 * 5. Built-in defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): ExternalConfig {
  let config: ExternalConfig = deepMerge(EXTERNAL_DEFAULTS, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.chunkvault/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'chunkvault.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert ExternalConfig to WorkspaceConfig (the runtime format).
 *
 * Fills gaps from DEFAULT_CONFIG and resolves `~` in paths.
 *
 * @throws ConfigError when validation fails
 */
export function toRuntimeConfig(external: ExternalConfig): WorkspaceConfig {
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const d = DEFAULT_CONFIG;
  const storage = external.storage;
  const chunking = external.chunking;
  const embedding = external.embedding;
  const hybrid = external.hybridSearch;
  const reranker = external.reranker;

  return {
    storage: {
      provider: oneOf(storage?.provider, STORAGE_PROVIDERS) ?? d.storage.provider,
      path: resolvePath(storage?.path ?? d.storage.path),
      s3: {
        bucket: storage?.s3?.bucket ?? d.storage.s3.bucket,
        prefix: storage?.s3?.prefix ?? d.storage.s3.prefix,
        region: storage?.s3?.region ?? d.storage.s3.region,
        endpoint: storage?.s3?.endpoint ?? d.storage.s3.endpoint,
        forcePathStyle: storage?.s3?.forcePathStyle ?? d.storage.s3.forcePathStyle,
      },
    },
    vectorStore: {
      provider:
        oneOf(external.vectorStore?.provider, VECTOR_STORE_PROVIDERS) ?? d.vectorStore.provider,
      dbPath: resolvePath(external.vectorStore?.dbPath ?? d.vectorStore.dbPath),
    },
    chunking: {
      enabled: chunking?.enabled ?? d.chunking.enabled,
      provider: oneOf(chunking?.provider, CHUNKER_PROVIDERS) ?? d.chunking.provider,
      chunkSize: chunking?.chunkSize ?? d.chunking.chunkSize,
      chunkOverlap: chunking?.chunkOverlap ?? d.chunking.chunkOverlap,
      separator: chunking?.separator ?? d.chunking.separator,
      tokensPerChunk: chunking?.tokensPerChunk ?? d.chunking.tokensPerChunk,
    },
    embedding: {
      enabled: embedding?.enabled ?? d.embedding.enabled,
      provider: oneOf(embedding?.provider, EMBEDDING_PROVIDERS) ?? d.embedding.provider,
      model: embedding?.model ?? d.embedding.model,
      baseUrl: embedding?.baseUrl ?? d.embedding.baseUrl,
      apiKey: embedding?.apiKey ?? d.embedding.apiKey,
      timeoutMs: embedding?.timeoutMs ?? d.embedding.timeoutMs,
      maxConcurrent: embedding?.maxConcurrent ?? d.embedding.maxConcurrent,
    },
    hybridSearch: {
      enabled: hybrid?.enabled ?? d.hybridSearch.enabled,
      topK: hybrid?.topK ?? d.hybridSearch.topK,
      threshold: hybrid?.threshold ?? d.hybridSearch.threshold,
    },
    reranker: {
      provider: oneOf(reranker?.provider, RERANKER_PROVIDERS) ?? d.reranker.provider,
      baseUrl: reranker?.baseUrl ?? d.reranker.baseUrl,
      apiKey: reranker?.apiKey ?? d.reranker.apiKey,
      model: reranker?.model ?? d.reranker.model,
      k1: reranker?.k1 ?? d.reranker.k1,
      b: reranker?.b ?? d.reranker.b,
      topN: reranker?.topN ?? d.reranker.topN,
      threshold: reranker?.threshold ?? d.reranker.threshold,
      timeoutMs: reranker?.timeoutMs ?? d.reranker.timeoutMs,
    },
  };
}

/**
 * Load, validate and convert in one step.
 */
export function loadWorkspaceConfig(options: LoadConfigOptions = {}): WorkspaceConfig {
  return toRuntimeConfig(loadConfig(options));
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };

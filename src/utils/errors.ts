/**
 * Standardized error types for chunkvault.
 *
 * All errors extend from VaultError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { StorageError, ConfigError } from './errors.js';
 *
 * throw new ConfigError('S3 bucket is required', 'MISSING_REQUIRED');
 *
 * try {
 *   await store.put(key, body);
 * } catch (err) {
 *   throw new StorageError(`Failed to write ${key}`, 'OBJECT_WRITE_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all chunkvault errors.
 *
 * - `code`: Programmatic error identifier (e.g., 'CHUNK_WRITE_FAILED')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'StorageError')
 */
export class VaultError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof VaultError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the storage layer (repositories, vector store, lexical store).
 *
 * Common codes:
 * - `ARTIFACT_WRITE_FAILED`: Artifact descriptor could not be written
 * - `CHUNK_WRITE_FAILED`: Chunk directory rewrite failed (staged files removed)
 * - `INDEX_WRITE_FAILED`: Workspace index could not be written
 * - `OBJECT_READ_FAILED` / `OBJECT_WRITE_FAILED`: Object storage call failed
 * - `VECTOR_INSERT_FAILED`: Failed to insert vector records
 * - `VECTOR_SEARCH_FAILED`: Vector similarity search failed
 * - `KEYWORD_INSERT_FAILED`: Failed to write lexical entries
 */
export class StorageError extends VaultError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors during chunk or artifact retrieval.
 *
 * Common codes:
 * - `VECTOR_SEARCH_FAILED`: Vector similarity search failed
 * - `RERANK_FAILED`: Reranker call failed
 * - `NO_EMBEDDER`: No embedding provider configured
 */
export class RetrievalError extends VaultError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Embedding Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from embedding providers.
 *
 * Common codes:
 * - `EMBED_FAILED`: Provider call failed or timed out
 * - `EMBED_RESPONSE_INVALID`: Provider returned an unexpected payload
 * - `NO_MODEL`: Local model not loaded
 */
export class EmbeddingError extends VaultError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: Failed to parse configuration
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `MISSING_REQUIRED`: Required field missing
 * - `UNKNOWN_PROVIDER`: Provider id not registered
 */
export class ConfigError extends VaultError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Rejected input: malformed queries, invalid artifact payloads,
 * illegal status transitions.
 *
 * Common codes:
 * - `INVALID_QUERY`: Search query failed validation
 * - `INVALID_ARTIFACT`: Artifact descriptor failed validation
 * - `ARTIFACT_EXISTS`: Artifact id already present in the workspace
 * - `ARTIFACT_ARCHIVED`: Mutation attempted on an archived artifact
 * - `METADATA_MISSING`: Required metadata key absent or mistyped
 */
export class ValidationError extends VaultError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a chunkvault error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof VaultError && error.code === code;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a VaultError.
 *
 * If the error is already a VaultError, returns it unchanged.
 * Otherwise wraps it in a new VaultError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): VaultError {
  if (error instanceof VaultError) {
    return error;
  }

  return new VaultError(message ?? errorMessage(error), 'UNKNOWN', error);
}

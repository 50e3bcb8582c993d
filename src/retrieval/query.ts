/**
 * Search query and result types, with boundary validation.
 *
 * Queries arrive from the CLI, the HTTP API and library callers. Window keys
 * are accepted in snake_case (`pre_n`, `next_n`) and camelCase (`preN`,
 * `nextN`); everything is checked before any backend call.
 */

import type { Artifact } from '../artifacts/artifact.js';
import { isArtifactType, type ArtifactType, type Chunk } from '../artifacts/types.js';
import type { VectorFilter } from '../storage/types.js';
import { ValidationError } from '../utils/errors.js';

export interface ChunkSearchQuery {
  query: string;
  /** Equality filter over vector metadata. */
  filters?: VectorFilter;
  /** Minimum similarity in [0, 1]. */
  threshold: number;
  limit: number;
  /** Chunks to include before each hit. */
  preN: number;
  /** Chunks to include after each hit. */
  nextN: number;
}

export interface ChunkSearchResult {
  chunk: Chunk;
  /** Nearest first. */
  preNChunks: Chunk[];
  /** Nearest first. */
  nextNChunks: Chunk[];
  score: number;
}

export interface ArtifactSearchQuery {
  query: string;
  /** Keep only artifacts of these types. */
  filterTypes?: ArtifactType[];
  threshold: number;
  limit: number;
}

export interface ArtifactSearchResult {
  artifact: Artifact;
  score: number;
}

export const DEFAULT_CHUNK_QUERY = {
  threshold: 0.8,
  limit: 10,
  preN: 3,
  nextN: 3,
} as const;

export interface QueryDefaults {
  threshold?: number;
  limit?: number;
}

function invalid(message: string): ValidationError {
  return new ValidationError(message, 'INVALID_QUERY');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstDefined(input: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (input[key] !== undefined) return input[key];
  }
  return undefined;
}

function readQueryText(input: Record<string, unknown>): string {
  const query = input.query;
  if (typeof query !== 'string' || !query.trim()) {
    throw invalid('query must be a non-empty string');
  }
  return query;
}

function readThreshold(input: Record<string, unknown>, fallback: number): number {
  const value = input.threshold ?? fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw invalid('threshold must be a number between 0 and 1');
  }
  return value;
}

function readLimit(input: Record<string, unknown>, fallback: number): number {
  const value = input.limit ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw invalid('limit must be a positive integer');
  }
  return value;
}

function readWindow(input: Record<string, unknown>, keys: string[], fallback: number): number {
  const value = firstDefined(input, keys) ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw invalid(`${keys[0]} must be a non-negative integer`);
  }
  return value;
}

function readFilters(input: Record<string, unknown>): VectorFilter | undefined {
  const raw = input.filters;
  if (raw === undefined || raw === null) return undefined;
  if (!isObject(raw)) {
    throw invalid('filters must be an object');
  }
  const filters: VectorFilter = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw invalid(`filters.${key} must be a string, number or boolean`);
    }
    filters[key] = value;
  }
  return filters;
}

function readFilterTypes(input: Record<string, unknown>): ArtifactType[] | undefined {
  const raw = firstDefined(input, ['filter_types', 'filterTypes']);
  if (raw === undefined || raw === null) return undefined;
  if (!Array.isArray(raw)) {
    throw invalid('filter_types must be an array');
  }
  return raw.map((type) => {
    if (!isArtifactType(type)) {
      throw invalid(`Unknown artifact type: ${String(type)}`);
    }
    return type;
  });
}

/**
 * Validate a chunk search request, filling defaults.
 *
 * @throws ValidationError (`INVALID_QUERY`) on any malformed field
 */
export function parseChunkSearchQuery(input: unknown, defaults: QueryDefaults = {}): ChunkSearchQuery {
  if (!isObject(input)) throw invalid('query must be an object');
  return {
    query: readQueryText(input),
    filters: readFilters(input),
    threshold: readThreshold(input, defaults.threshold ?? DEFAULT_CHUNK_QUERY.threshold),
    limit: readLimit(input, defaults.limit ?? DEFAULT_CHUNK_QUERY.limit),
    preN: readWindow(input, ['pre_n', 'preN'], DEFAULT_CHUNK_QUERY.preN),
    nextN: readWindow(input, ['next_n', 'nextN'], DEFAULT_CHUNK_QUERY.nextN),
  };
}

/**
 * Validate an artifact search request, filling defaults.
 *
 * @throws ValidationError (`INVALID_QUERY`) on any malformed field
 */
export function parseArtifactSearchQuery(input: unknown, defaults: QueryDefaults = {}): ArtifactSearchQuery {
  if (!isObject(input)) throw invalid('query must be an object');
  return {
    query: readQueryText(input),
    filterTypes: readFilterTypes(input),
    threshold: readThreshold(input, defaults.threshold ?? DEFAULT_CHUNK_QUERY.threshold),
    limit: readLimit(input, defaults.limit ?? DEFAULT_CHUNK_QUERY.limit),
  };
}

/**
 * Types for the storage layer.
 *
 * @module storage/types
 */

import type { Chunk } from '../artifacts/types.js';

/** Entry of the workspace index's artifact summary list. */
export interface IndexedArtifact {
  artifact_id: string;
  type: string;
  metadata: Record<string, unknown>;
}

/** Workspace payload stored under `workspace` in `index.json`. */
export interface WorkspaceIndexData {
  workspace_id: string;
  name: string;
  created_at: string;
  updated_at: string;
  metadata: Record<string, unknown>;
  artifact_ids: string[];
  artifacts: IndexedArtifact[];
}

export interface WorkspaceIndex {
  workspace: WorkspaceIndexData;
}

export interface StoreArtifactOptions {
  /** Write sub-artifact content to `sublist/{id}/origin.{ext}` and blank it in the descriptor. Default true. */
  saveSubListContent?: boolean;
  /** Copy attachment files into `attachment_files/`. Default true. */
  saveAttachmentFiles?: boolean;
}

/**
 * A chunk with its neighbours. Both neighbour lists are ordered nearest
 * first and stop at the first missing index.
 */
export interface ChunkWindow {
  preNChunks: Chunk[];
  chunk: Chunk | undefined;
  nextNChunks: Chunk[];
}

/** Identity metadata stored with every vector record. */
export interface VectorMetadata {
  artifactId: string;
  parentId: string;
  artifactType: string;
  chunkId?: string;
  chunkIndex?: number;
  embeddingModel: string;
  createdAt: string;
  updatedAt: string;
  [key: string]: string | number | boolean | undefined;
}

export interface VectorRecord {
  id: string;
  embedding: number[];
  content: string;
  metadata: VectorMetadata;
}

/** Equality filter over metadata keys. */
export type VectorFilter = Record<string, string | number | boolean>;

export interface VectorSearchHit {
  id: string;
  content: string;
  metadata: VectorMetadata;
  /** `1 - cosineDistance / 2`, in [0, 1]. */
  similarity: number;
}

/** A lexical-index match, scored by SQLite FTS5 BM25 (higher is better). */
export interface KeywordSearchResult {
  id: string;
  score: number;
}

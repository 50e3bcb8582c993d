/**
 * snake_case wire shapes for search results, shared by the HTTP API and
 * `chunkvault search --json`.
 */

import { chunkToRecord, type ArtifactRecord, type ChunkRecord } from '../artifacts/types.js';
import type { KeywordHit } from '../storage/keyword-store.js';
import type { ArtifactSearchResult, ChunkSearchResult } from './query.js';

export interface ChunkSearchResultRecord {
  chunk: ChunkRecord;
  pre_n_chunks: ChunkRecord[];
  next_n_chunks: ChunkRecord[];
  score: number;
}

export interface ArtifactSearchResultRecord {
  artifact: ArtifactRecord;
  score: number;
}

export interface KeywordHitRecord {
  id: string;
  artifact_id: string;
  parent_id: string;
  content: string;
  score: number;
}

export function chunkResultToRecord(result: ChunkSearchResult): ChunkSearchResultRecord {
  return {
    chunk: chunkToRecord(result.chunk),
    pre_n_chunks: result.preNChunks.map(chunkToRecord),
    next_n_chunks: result.nextNChunks.map(chunkToRecord),
    score: result.score,
  };
}

export function artifactResultToRecord(result: ArtifactSearchResult): ArtifactSearchResultRecord {
  return { artifact: result.artifact.toDict(), score: result.score };
}

export function keywordHitToRecord(hit: KeywordHit): KeywordHitRecord {
  return {
    id: hit.id,
    artifact_id: hit.artifactId,
    parent_id: hit.parentId,
    content: hit.content,
    score: hit.score,
  };
}

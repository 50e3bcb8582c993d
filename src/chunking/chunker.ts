/**
 * Chunker contract and shared helpers.
 *
 * Every strategy turns an artifact's content into an ordered list of texts and
 * hands them to {@link createChunks}, which assigns dense indexes and stamps
 * the artifact identity. Configuration is validated once, when a chunker is
 * constructed; the algorithms assume a valid config.
 */

import type { Artifact } from '../artifacts/artifact.js';
import { chunkId, type Chunk } from '../artifacts/types.js';
import { ConfigError } from '../utils/errors.js';

export type ChunkerProvider = 'character' | 'sentence' | 'markdown' | 'smart';

export interface ChunkConfig {
  provider: ChunkerProvider;
  /** Target chunk size in characters (character, smart). */
  chunkSize: number;
  /** Overlap carried between consecutive chunks (characters, or tokens for sentence). */
  chunkOverlap: number;
  /** Piece separator (character, smart). */
  separator: string;
  /** Target chunk size in approximate tokens (sentence). */
  tokensPerChunk: number;
}

export const DEFAULT_CHUNK_CONFIG: ChunkConfig = {
  provider: 'character',
  chunkSize: 1000,
  chunkOverlap: 100,
  separator: '\n',
  tokensPerChunk: 256,
};

export interface Chunker {
  readonly config: ChunkConfig;
  /** Split the artifact's content. Empty content yields no chunks. */
  chunk(artifact: Artifact): Promise<Chunk[]>;
}

/**
 * Reject configs the splitting algorithms cannot honour.
 *
 * @throws ConfigError on non-positive sizes or overlap not below the size
 */
export function validateChunkConfig(config: ChunkConfig): void {
  const errors: string[] = [];
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    errors.push('chunkSize must be a positive integer');
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    errors.push('chunkOverlap must be a non-negative integer');
  }
  if (config.chunkOverlap >= config.chunkSize) {
    errors.push('chunkOverlap must be smaller than chunkSize');
  }
  if (config.provider === 'sentence') {
    if (!Number.isInteger(config.tokensPerChunk) || config.tokensPerChunk <= 0) {
      errors.push('tokensPerChunk must be a positive integer');
    } else if (config.chunkOverlap >= config.tokensPerChunk) {
      errors.push('chunkOverlap must be smaller than tokensPerChunk');
    }
  }
  if ((config.provider === 'character' || config.provider === 'smart') && !config.separator) {
    errors.push('separator must not be empty');
  }
  if (errors.length > 0) {
    throw new ConfigError(`Invalid chunk config: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
}

/**
 * Wrap texts as chunks of `artifact`, indexed from 0.
 */
export function createChunks(texts: string[], artifact: Artifact, config: ChunkConfig): Chunk[] {
  return texts.map((text, i) => ({
    chunkId: chunkId(artifact.artifactId, i),
    content: text,
    chunkMetadata: {
      chunkIndex: i,
      chunkSize: text.length,
      chunkOverlap: config.chunkOverlap,
      artifactId: artifact.artifactId,
      artifactType: artifact.artifactType,
      parentArtifactId: artifact.parentId,
    },
  }));
}

export interface MergeOptions {
  size: number;
  overlap: number;
  length: (text: string) => number;
}

/**
 * Greedily merge pieces into chunks no larger than `size` (as measured by
 * `length`, separators included), carrying trailing pieces totalling at most
 * `overlap` into the next chunk. A single piece larger than `size` becomes its
 * own chunk.
 */
export function mergeSplits(splits: string[], separator: string, options: MergeOptions): string[] {
  const { size, overlap, length } = options;
  const separatorLength = length(separator);
  const docs: string[] = [];
  let current: string[] = [];
  let total = 0;

  const flush = (): void => {
    const doc = current.join(separator).trim();
    if (doc) docs.push(doc);
  };

  for (const piece of splits) {
    const pieceLength = length(piece);
    const joinCost = current.length > 0 ? separatorLength : 0;

    if (total + pieceLength + joinCost > size && current.length > 0) {
      flush();
      // Drop leading pieces until the remainder fits the overlap budget and leaves room
      while (
        total > overlap ||
        (total > 0 && total + pieceLength + (current.length > 0 ? separatorLength : 0) > size)
      ) {
        const head = current[0];
        if (head === undefined) break;
        total -= length(head) + (current.length > 1 ? separatorLength : 0);
        current = current.slice(1);
      }
    }

    current.push(piece);
    total += pieceLength + (current.length > 1 ? separatorLength : 0);
  }

  flush();
  return docs;
}

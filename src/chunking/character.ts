/**
 * Character chunker: split on a separator, then merge pieces up to
 * `chunkSize` characters with `chunkOverlap` characters of trailing context.
 */

import type { Artifact } from '../artifacts/artifact.js';
import type { Chunk } from '../artifacts/types.js';
import { createChunks, mergeSplits, validateChunkConfig, type ChunkConfig, type Chunker } from './chunker.js';

export class CharacterChunker implements Chunker {
  constructor(readonly config: ChunkConfig) {
    validateChunkConfig(config);
  }

  async chunk(artifact: Artifact): Promise<Chunk[]> {
    const text = artifact.content;
    if (!text) return [];
    return createChunks(this.split(text), artifact, this.config);
  }

  split(text: string): string[] {
    const { separator, chunkSize, chunkOverlap } = this.config;
    const pieces = text.split(separator).filter((p) => p !== '');
    return mergeSplits(pieces, separator, {
      size: chunkSize,
      overlap: chunkOverlap,
      length: (s) => s.length,
    });
  }
}

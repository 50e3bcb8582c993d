/**
 * Sentence chunker: packs whole sentences into chunks of roughly
 * `tokensPerChunk` tokens, overlapping by up to `chunkOverlap` tokens.
 *
 * Sentence boundaries come from `Intl.Segmenter`; sizes use the approximate
 * token counter. A sentence longer than a whole chunk is cut on character
 * boundaries.
 */

import type { Artifact } from '../artifacts/artifact.js';
import type { Chunk } from '../artifacts/types.js';
import { approximateTokens, maxCharsForTokens } from '../utils/token-counter.js';
import { createChunks, mergeSplits, validateChunkConfig, type ChunkConfig, type Chunker } from './chunker.js';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'sentence' });

/**
 * Split text into trimmed, non-empty sentences.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const { segment } of segmenter.segment(text)) {
    const trimmed = segment.trim();
    if (trimmed) sentences.push(trimmed);
  }
  return sentences;
}

export class SentenceChunker implements Chunker {
  constructor(readonly config: ChunkConfig) {
    validateChunkConfig(config);
  }

  async chunk(artifact: Artifact): Promise<Chunk[]> {
    const text = artifact.content;
    if (!text) return [];
    return createChunks(this.split(text), artifact, this.config);
  }

  split(text: string): string[] {
    const { tokensPerChunk, chunkOverlap } = this.config;
    const maxChars = maxCharsForTokens(tokensPerChunk);

    const pieces: string[] = [];
    for (const sentence of splitSentences(text)) {
      if (approximateTokens(sentence) <= tokensPerChunk) {
        pieces.push(sentence);
        continue;
      }
      for (let i = 0; i < sentence.length; i += maxChars) {
        pieces.push(sentence.slice(i, i + maxChars));
      }
    }

    return mergeSplits(pieces, ' ', {
      size: tokensPerChunk,
      overlap: chunkOverlap,
      length: approximateTokens,
    });
  }
}

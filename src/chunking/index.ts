/**
 * Chunker registry.
 */

import { ProviderRegistry } from '../utils/provider-registry.js';
import { CharacterChunker } from './character.js';
import { MarkdownChunker } from './markdown.js';
import { SentenceChunker } from './sentence.js';
import { SmartChunker } from './smart.js';
import type { ChunkConfig, Chunker } from './chunker.js';

export const chunkerRegistry = new ProviderRegistry<ChunkConfig, Chunker>('chunker')
  .register('character', (config) => new CharacterChunker(config))
  .register('sentence', (config) => new SentenceChunker(config))
  .register('markdown', (config) => new MarkdownChunker(config))
  .register('smart', (config) => new SmartChunker(config));

/**
 * Build the chunker named by `config.provider`.
 *
 * @throws ConfigError for an unknown provider or an invalid config
 */
export function createChunker(config: ChunkConfig): Chunker {
  return chunkerRegistry.create(config.provider, config);
}

export * from './chunker.js';
export { CharacterChunker } from './character.js';
export { SentenceChunker, splitSentences } from './sentence.js';
export { MarkdownChunker, splitMarkdownSections, renderSection } from './markdown.js';
export { SmartChunker, cleanText, findBestSplitPoint, isGoodSplitPoint } from './smart.js';

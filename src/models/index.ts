/**
 * Embedding providers and their registry.
 */

import type { EmbeddingConfig } from '../config/workspace-config.js';
import { ProviderRegistry } from '../utils/provider-registry.js';
import type { EmbeddingProvider } from './embedding-provider.js';
import { HttpEmbedder } from './http-embedder.js';

export type { EmbeddingProvider } from './embedding-provider.js';
export { HttpEmbedder, parseEmbeddingResponse } from './http-embedder.js';
export type { HttpEmbedderOptions, HttpEmbeddingFlavor } from './http-embedder.js';

export const embedderRegistry = new ProviderRegistry<EmbeddingConfig, EmbeddingProvider>('embedding')
  .register('ollama', (config) => new HttpEmbedder({ flavor: 'ollama', ...config }))
  .register('openai', (config) => new HttpEmbedder({ flavor: 'openai', ...config }));

/**
 * Build the configured embedding provider, or undefined when embedding is disabled.
 *
 * @throws ConfigError for an unknown provider or a missing base URL
 */
export function createEmbedder(config: EmbeddingConfig): EmbeddingProvider | undefined {
  if (!config.enabled) return undefined;
  return embedderRegistry.create(config.provider, config);
}

/**
 * Rerankers and their registry.
 */

import type { RerankerConfig } from '../config/workspace-config.js';
import { ProviderRegistry } from '../utils/provider-registry.js';
import { Bm25Reranker } from './bm25.js';
import { HttpReranker } from './http-reranker.js';
import type { Reranker } from './reranker.js';

export { Bm25Reranker, tokenize } from './bm25.js';
export type { Bm25Options } from './bm25.js';
export { HttpReranker, parseRerankResponse } from './http-reranker.js';
export type { HttpRerankerOptions } from './http-reranker.js';
export { finalizeResults } from './reranker.js';
export type { RerankCandidate, RerankOptions, RerankResult, Reranker } from './reranker.js';

export const rerankerRegistry = new ProviderRegistry<RerankerConfig, Reranker | undefined>('reranker')
  .register('none', () => undefined)
  .register('bm25', (config) => new Bm25Reranker({ k1: config.k1, b: config.b }))
  .register('http', (config) => new HttpReranker(config));

/**
 * Build the configured reranker, or undefined for provider `none`.
 *
 * @throws ConfigError for an unknown provider or missing base URL
 */
export function createReranker(config: RerankerConfig): Reranker | undefined {
  return rerankerRegistry.create(config.provider, config);
}

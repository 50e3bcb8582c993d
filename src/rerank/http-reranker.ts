/**
 * Reranker backed by a remote rerank endpoint.
 *
 * Request: `POST {baseUrl}` with `{model, query, documents, top_n?}` and
 * bearer auth. Response: `{results: [...]}` or `{docs: [...]}`, each entry
 * carrying `index` plus `score` or `relevance_score`.
 */

import { ConfigError, RetrievalError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { finalizeResults, type RerankCandidate, type RerankOptions, type RerankResult, type Reranker } from './reranker.js';

const log = createLogger('http-reranker');

export interface HttpRerankerOptions {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

interface ScoredIndex {
  index: number;
  score: number;
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function toScoredIndex(entry: unknown): ScoredIndex | undefined {
  const index = field(entry, 'index');
  const score = field(entry, 'score') ?? field(entry, 'relevance_score');
  if (typeof index !== 'number' || !Number.isInteger(index) || typeof score !== 'number') {
    return undefined;
  }
  return { index, score };
}

/**
 * Scored entries of a rerank response. Undefined when neither `results` nor
 * `docs` is an array; malformed entries are dropped.
 */
export function parseRerankResponse(body: unknown): ScoredIndex[] | undefined {
  const list = field(body, 'results') ?? field(body, 'docs');
  if (!Array.isArray(list)) return undefined;
  return list.map(toScoredIndex).filter((e): e is ScoredIndex => e !== undefined);
}

export class HttpReranker implements Reranker {
  readonly name = 'http';

  /**
   * @throws ConfigError when no base URL is configured
   */
  constructor(private readonly options: HttpRerankerOptions) {
    if (!options.baseUrl) {
      throw new ConfigError('reranker.baseUrl is required for the http provider', 'MISSING_REQUIRED');
    }
  }

  async rerank(query: string, candidates: RerankCandidate[], options: RerankOptions = {}): Promise<RerankResult[]> {
    if (candidates.length === 0) return [];

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    const payload: Record<string, unknown> = {
      model: this.options.model,
      query,
      documents: candidates.map((c) => c.text),
    };
    if (options.topN !== undefined) payload.top_n = options.topN;

    const start = performance.now();
    let body: unknown;
    try {
      const response = await fetch(this.options.baseUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      log.error('Rerank request failed', { url: this.options.baseUrl, error: errorMessage(error) });
      throw new RetrievalError('Rerank request failed', 'RERANK_FAILED', error);
    }

    const entries = parseRerankResponse(body);
    if (!entries) {
      throw new RetrievalError('Unexpected rerank response', 'RERANK_FAILED');
    }

    const results: RerankResult[] = [];
    for (const { index, score } of entries) {
      const candidate = candidates[index];
      if (!candidate) {
        log.warn('Rerank result index out of range', { index, candidates: candidates.length });
        continue;
      }
      results.push({ id: candidate.id, index, score });
    }

    log.debug('Reranked candidates', {
      candidates: candidates.length,
      returned: results.length,
      durationMs: Math.round(performance.now() - start),
    });
    return finalizeResults(results, options);
  }
}

/**
 * BM25 reranker.
 *
 * Corpus statistics are built over exactly the candidate set handed to
 * `rerank`, so scores are only comparable within one call.
 *
 * ```
 * idf(t)     = ln((N - df + 0.5) / (df + 0.5) + 1)
 * score(d,q) = Σ idf(t) · tf·(k1 + 1) / (tf + k1·(1 - b + b·|d| / avgdl))
 * ```
 */

import { createLogger } from '../utils/logger.js';
import { finalizeResults, type RerankCandidate, type RerankOptions, type RerankResult, type Reranker } from './reranker.js';

const log = createLogger('bm25');

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

export interface Bm25Options {
  /** Term-frequency saturation. */
  k1?: number;
  /** Length normalisation. */
  b?: number;
}

/**
 * Lower-cased word tokens (letters, digits, underscore).
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

interface CorpusStats {
  size: number;
  avgDocLength: number;
  docFreq: Map<string, number>;
  termFreqs: Map<string, number>[];
  docLengths: number[];
}

function buildCorpusStats(texts: string[]): CorpusStats {
  const docFreq = new Map<string, number>();
  const termFreqs: Map<string, number>[] = [];
  const docLengths: number[] = [];
  let totalLength = 0;

  for (const text of texts) {
    const terms = tokenize(text);
    docLengths.push(terms.length);
    totalLength += terms.length;

    const counts = new Map<string, number>();
    for (const term of terms) {
      counts.set(term, (counts.get(term) ?? 0) + 1);
    }
    termFreqs.push(counts);
    for (const term of counts.keys()) {
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }

  return {
    size: texts.length,
    avgDocLength: texts.length > 0 ? totalLength / texts.length : 0,
    docFreq,
    termFreqs,
    docLengths,
  };
}

export class Bm25Reranker implements Reranker {
  readonly name = 'bm25';
  readonly k1: number;
  readonly b: number;

  constructor(options: Bm25Options = {}) {
    this.k1 = options.k1 ?? 1.2;
    this.b = options.b ?? 0.75;
  }

  /**
   * BM25 score of every text against `query`, in input order.
   */
  score(query: string, texts: string[]): number[] {
    const stats = buildCorpusStats(texts);
    const queryTerms = tokenize(query);

    return texts.map((_, i) => {
      const termFreq = stats.termFreqs[i];
      const docLength = stats.docLengths[i] ?? 0;
      // Zero-length corpus: nothing to match
      if (!termFreq || stats.avgDocLength === 0) return 0;

      let score = 0;
      for (const term of queryTerms) {
        const df = stats.docFreq.get(term);
        if (df === undefined) continue;

        const idf = Math.log((stats.size - df + 0.5) / (df + 0.5) + 1);
        const tf = termFreq.get(term) ?? 0;
        const numerator = tf * (this.k1 + 1);
        const denominator = tf + this.k1 * (1 - this.b + this.b * (docLength / stats.avgDocLength));
        if (denominator > 0) {
          score += idf * (numerator / denominator);
        }
      }
      return score;
    });
  }

  async rerank(query: string, candidates: RerankCandidate[], options: RerankOptions = {}): Promise<RerankResult[]> {
    if (candidates.length === 0) return [];

    const start = performance.now();
    const scores = this.score(query, candidates.map((c) => c.text));
    const results = finalizeResults(
      candidates.map((c, index) => ({ id: c.id, index, score: scores[index] ?? 0 })),
      options,
    );
    log.debug('Reranked candidates', {
      candidates: candidates.length,
      returned: results.length,
      durationMs: Math.round(performance.now() - start),
    });
    return results;
  }
}

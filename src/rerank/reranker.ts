/**
 * Reranker contract.
 *
 * A reranker rescores a candidate set against the query. Results carry the
 * candidate's position in the input so callers can map back to their own
 * records.
 */

export interface RerankCandidate {
  id: string;
  text: string;
}

export interface RerankResult {
  id: string;
  /** Position of the candidate in the input list. */
  index: number;
  score: number;
}

export interface RerankOptions {
  /** Drop results scoring below this. */
  threshold?: number;
  /** Keep at most this many results. */
  topN?: number;
}

export interface Reranker {
  readonly name: string;
  /** Results sorted by score, best first. */
  rerank(query: string, candidates: RerankCandidate[], options?: RerankOptions): Promise<RerankResult[]>;
}

/**
 * Apply threshold, descending sort and topN truncation.
 */
export function finalizeResults(results: RerankResult[], options: RerankOptions = {}): RerankResult[] {
  const { threshold, topN } = options;
  const kept = threshold === undefined ? [...results] : results.filter((r) => r.score >= threshold);
  kept.sort((a, b) => b.score - a.score || a.index - b.index);
  return topN === undefined ? kept : kept.slice(0, Math.max(0, topN));
}

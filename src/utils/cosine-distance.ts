/**
 * Cosine distance utilities for embedding comparison.
 *
 * Cosine distance = 1 - cosine_similarity
 * Yields [0, 2] where 0 = identical direction, 2 = opposite.
 * Search results are reported as a bounded similarity in [0, 1]
 * via `distanceToSimilarity`.
 */

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: number[], b: number[]): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 * Zero vectors compare as orthogonal.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}

/**
 * Cosine distance between two vectors. Returns [0, 2].
 */
export function cosineDistance(a: number[], b: number[]): number {
  return 1 - cosineSimilarity(a, b);
}

/**
 * Map a cosine distance (0 best .. 2 worst) onto a similarity score
 * (1 best .. 0 worst): `1 - distance / 2`, clamped to [0, 1].
 */
export function distanceToSimilarity(distance: number): number {
  return Math.max(0, Math.min(1, 1 - distance / 2));
}

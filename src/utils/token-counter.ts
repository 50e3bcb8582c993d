/**
 * Approximate token counting.
 *
 * Uses a simple heuristic (~3.5 chars per token, biased toward the shorter
 * tokens of code and mixed-language text). Sizes chunks in the sentence
 * chunker; exact model tokenization is not needed for that.
 */

export const CHARS_PER_TOKEN = 3.5;

/**
 * Approximate token count for a string.
 * Biased slightly high to avoid over-stuffing chunks.
 */
export function approximateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Largest character length whose approximate token count stays within `tokens`.
 */
export function maxCharsForTokens(tokens: number): number {
  return Math.max(1, Math.floor(tokens * CHARS_PER_TOKEN));
}

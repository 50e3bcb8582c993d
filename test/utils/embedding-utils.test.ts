/**
 * Tests for embedding serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidEmbedding,
  deserializeEmbedding,
  serializeEmbedding,
} from '../../src/utils/embedding-utils.js';

describe('embedding-utils', () => {
  it('stores 4 bytes per dimension', () => {
    expect(serializeEmbedding([0.5, -0.25, 1]).length).toBe(12);
  });

  it('reads values back from a buffer view at an offset', () => {
    const payload = serializeEmbedding([0.5, -0.25]);
    const pooled = Buffer.alloc(payload.length + 8);
    payload.copy(pooled, 8);

    expect(deserializeEmbedding(pooled.subarray(8))).toEqual([0.5, -0.25]);
  });

  it('rejects empty and non-finite embeddings', () => {
    expect(() => assertValidEmbedding([], 'doc')).toThrow('Empty embedding for doc');
    expect(() => assertValidEmbedding([1, Number.NaN], 'doc')).toThrow('Non-finite value in embedding for doc');
    expect(() => assertValidEmbedding([0.1, 0.2], 'doc')).not.toThrow();
  });
});

/**
 * Embedding serialization for SQLite BLOB columns.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Float32 storage: 4 bytes per dimension, so a 384-dimension
 * embedding takes 1.5KB.
 */
export function serializeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer.
 *
 * Respects the Buffer's byte offset, since better-sqlite3 may hand back
 * a view into a larger pooled allocation.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const float32 = new Float32Array(
    buffer.buffer,
    buffer.byteOffset,
    buffer.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}

/**
 * Throw when an embedding is empty or carries non-finite values.
 */
export function assertValidEmbedding(embedding: number[], context: string): void {
  if (embedding.length === 0) {
    throw new RangeError(`Empty embedding for ${context}`);
  }
  if (!embedding.every(Number.isFinite)) {
    throw new RangeError(`Non-finite value in embedding for ${context}`);
  }
}

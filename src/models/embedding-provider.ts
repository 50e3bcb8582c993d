/**
 * Embedding provider contract shared by local and remote backends.
 */

export interface EmbeddingProvider {
  /** Model name recorded as `embeddingModel` on every vector record. */
  readonly modelName: string;
  embedQuery(text: string): Promise<number[]>;
  /** Embeddings in the same order as `texts`. */
  embedDocuments(texts: string[]): Promise<number[][]>;
}

/**
 * Embedding provider contract
 *
 * Every backend turns text into vectors of one fixed width. Callers pick a
 * backend once, at construction (see `createEmbeddingProvider`), and never
 * branch on which one they hold.
 *
 * @module embeddings/EmbeddingProvider
 */

export interface EmbeddingProvider {
  /** Backend identifier for logs and stats */
  readonly name: string;

  /** Vector width; constant for the lifetime of the instance */
  readonly dimension: number;

  /**
   * Embed texts, one vector per input, same order
   *
   * @throws {RagError} EMBEDDING_BACKEND_FAILURE when the backend cannot
   *   produce the batch (backends that degrade per item never throw)
   */
  embedBatch(texts: readonly string[]): Promise<number[][]>;

  /** `embedBatch([text])[0]` */
  embedOne(text: string): Promise<number[]>;
}

/**
 * Shared `embedOne` on top of `embedBatch`
 */
export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
  abstract readonly name: string;
  abstract readonly dimension: number;

  abstract embedBatch(texts: readonly string[]): Promise<number[][]>;

  async embedOne(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }
}

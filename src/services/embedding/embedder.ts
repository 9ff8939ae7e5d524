/**
 * Embedder contract
 *
 * ATOMIC per call: either every text gets a vector of the configured
 * dimension, or the call throws and nothing is returned.
 *
 * @module services/embedding/embedder
 */

export type EmbeddingErrorCode =
  | 'EMBEDDING_FAILED'
  | 'DIMENSION_MISMATCH'
  | 'COUNT_MISMATCH'
  | 'WORKER_ERROR'
  | 'PARSE_ERROR'
  | 'ABORTED';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

export interface EmbedOptions {
  /** Stops the backend; the call then throws ABORTED */
  signal?: AbortSignal;
}

export interface Embedder {
  readonly modelName: string;
  readonly dimension: number;

  /**
   * @returns one vector per text, in order
   * @throws EmbeddingError
   */
  embed(texts: string[], options?: EmbedOptions): Promise<Float32Array[]>;
}

/**
 * Check a backend's output before anyone stores it.
 *
 * @throws EmbeddingError COUNT_MISMATCH, DIMENSION_MISMATCH
 */
export function validateEmbeddings(
  expectedCount: number,
  vectors: ArrayLike<number>[],
  dimension: number
): void {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingError(
      `Expected ${expectedCount} embeddings, got ${vectors.length}`,
      'COUNT_MISMATCH',
      { expected: expectedCount, actual: vectors.length }
    );
  }
  for (let i = 0; i < vectors.length; i++) {
    if (vectors[i].length !== dimension) {
      throw new EmbeddingError(
        `Embedding ${i} has wrong dimensions: ${vectors[i].length}, expected ${dimension}`,
        'DIMENSION_MISMATCH',
        { index: i, actualDim: vectors[i].length, expectedDim: dimension }
      );
    }
  }
}

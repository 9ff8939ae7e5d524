/**
 * RetryingVectorStore - bounded retry for transient store faults
 *
 * Wraps any VectorStore. Only StoreErrors flagged retryable (rate limits,
 * 5xx, dropped connections, a busy database) are retried; bad vectors and
 * dimension conflicts fail on the first attempt.
 *
 * The wait doubles per retry from baseDelayMs up to maxDelayMs and is spread
 * by +/- jitter so files writing in parallel do not retry in lockstep.
 *
 * @module services/vector-store/retrying
 */

import { StoreError } from './types.js';
import type { VectorMatch, VectorPoint, VectorStore } from './types.js';

export interface RetryPolicy {
  /** Attempts per operation, including the first */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added or removed at random (0.25 = +/-25%) */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  jitter: 0.25,
};

export type Sleep = (ms: number) => Promise<void>;

const sleepFor: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait before retry number `retry` (0 = the first retry).
 */
export function retryDelay(
  retry: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  random: () => number = Math.random
): number {
  const capped = Math.min(policy.baseDelayMs * 2 ** retry, policy.maxDelayMs);
  const spread = capped * policy.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + spread));
}

export class RetryingVectorStore implements VectorStore {
  readonly kind: string;
  private readonly policy: RetryPolicy;

  constructor(
    private readonly inner: VectorStore,
    policy: Partial<RetryPolicy> = {},
    private readonly sleep: Sleep = sleepFor
  ) {
    this.kind = inner.kind;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
  }

  private async retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof StoreError) || !error.retryable || attempt >= this.policy.attempts) {
          throw error;
        }
        const delay = retryDelay(attempt - 1, this.policy);
        console.error(
          `[VectorStore] ${operation} failed (attempt ${attempt}/${this.policy.attempts}), ` +
            `retrying in ${delay}ms: ${error.message}`
        );
        await this.sleep(delay);
      }
    }
  }

  ensureCollection(collection: string, dimension: number): Promise<void> {
    return this.retry('ensureCollection', () => this.inner.ensureCollection(collection, dimension));
  }

  upsert(collection: string, points: VectorPoint[]): Promise<void> {
    return this.retry('upsert', () => this.inner.upsert(collection, points));
  }

  query(collection: string, vector: Float32Array, k: number): Promise<VectorMatch[]> {
    return this.retry('query', () => this.inner.query(collection, vector, k));
  }

  deleteByFile(collection: string, filePath: string): Promise<void> {
    return this.retry('deleteByFile', () => this.inner.deleteByFile(collection, filePath));
  }

  count(collection: string): Promise<number> {
    return this.retry('count', () => this.inner.count(collection));
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

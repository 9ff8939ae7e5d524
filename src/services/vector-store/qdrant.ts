/**
 * QdrantVectorStore - external Qdrant service
 *
 * @module services/vector-store/qdrant
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { ChunkMetadataSchema, StoreError, assertVector } from './types.js';
import type { StoreErrorCode, VectorMatch, VectorPoint, VectorStore } from './types.js';

const BATCH_SIZE = 100;

/**
 * The part of QdrantClient this store calls. QdrantClient satisfies it;
 * tests substitute an in-process implementation.
 */
export interface QdrantApi {
  getCollections(): Promise<{ collections: { name: string }[] }>;
  getCollection(collection: string): Promise<{ config: { params: { vectors?: unknown } } }>;
  createCollection(
    collection: string,
    args: { vectors: { size: number; distance: 'Cosine' } }
  ): Promise<boolean>;
  createPayloadIndex(
    collection: string,
    args: { field_name: string; field_schema: 'keyword' }
  ): Promise<unknown>;
  upsert(
    collection: string,
    args: { wait: boolean; points: { id: string; vector: number[]; payload: Record<string, unknown> }[] }
  ): Promise<unknown>;
  search(
    collection: string,
    args: { vector: number[]; limit: number; with_payload: boolean }
  ): Promise<{ id: string | number; score: number; payload?: Record<string, unknown> | null }[]>;
  delete(
    collection: string,
    args: { wait: boolean; filter: { must: { key: string; match: { value: string } }[] } }
  ): Promise<unknown>;
  count(collection: string, args: { exact: boolean }): Promise<{ count: number }>;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Network failures, 429 and 5xx are worth another try; 4xx are not.
 */
function isTransient(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) return status === 429 || status >= 500;
  return error instanceof Error && /fetch failed|ECONNREFUSED|ECONNRESET|ETIMEDOUT|socket hang up/i.test(error.message);
}

function toStoreError(error: unknown, code: StoreErrorCode, context: string): StoreError {
  if (error instanceof StoreError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(`${context}: ${message}`, code, isTransient(error), {
    status: statusOf(error) ?? null,
  });
}

function vectorSizeOf(config: unknown): number | undefined {
  if (typeof config !== 'object' || config === null || !('size' in config)) return undefined;
  return typeof config.size === 'number' ? config.size : undefined;
}

export interface QdrantStoreOptions {
  url?: string;
  apiKey?: string;
  /** Pre-built client; url/apiKey are ignored when given */
  client?: QdrantApi;
}

export class QdrantVectorStore implements VectorStore {
  readonly kind = 'qdrant';
  private readonly client: QdrantApi;
  private readonly dimensions = new Map<string, number>();

  constructor(options: QdrantStoreOptions) {
    this.client = options.client ?? new QdrantClient({ url: options.url, apiKey: options.apiKey });
  }

  private async dimensionOf(collection: string): Promise<number> {
    const known = this.dimensions.get(collection);
    if (known !== undefined) return known;

    const info = await this.client.getCollection(collection);
    const size = vectorSizeOf(info.config.params.vectors);
    if (size === undefined) {
      throw new StoreError(
        `Collection "${collection}" does not use a single unnamed vector`,
        'COLLECTION_FAILED'
      );
    }
    this.dimensions.set(collection, size);
    return size;
  }

  async ensureCollection(collection: string, dimension: number): Promise<void> {
    try {
      const collections = await this.client.getCollections();
      const exists = collections.collections.some((c) => c.name === collection);

      if (!exists) {
        await this.client.createCollection(collection, {
          vectors: { size: dimension, distance: 'Cosine' },
        });
        // Payload indexes for deleteByFile and fingerprint lookups
        await this.client.createPayloadIndex(collection, {
          field_name: 'file_path',
          field_schema: 'keyword',
        });
        await this.client.createPayloadIndex(collection, {
          field_name: 'file_fingerprint',
          field_schema: 'keyword',
        });
        this.dimensions.set(collection, dimension);
        console.error(`[VectorStore] Created Qdrant collection "${collection}" (dim ${dimension})`);
        return;
      }

      const existing = await this.dimensionOf(collection);
      if (existing !== dimension) {
        throw new StoreError(
          `Collection "${collection}" has dimension ${existing}, requested ${dimension}`,
          'COLLECTION_FAILED',
          false,
          { collection, existing, requested: dimension }
        );
      }
    } catch (error) {
      throw toStoreError(error, 'COLLECTION_FAILED', `Failed to ensure collection "${collection}"`);
    }
  }

  async upsert(collection: string, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    try {
      const dimension = await this.dimensionOf(collection);
      for (const point of points) {
        assertVector(point.vector, dimension, `point ${point.id}`);
      }

      for (let i = 0; i < points.length; i += BATCH_SIZE) {
        const batch = points.slice(i, i + BATCH_SIZE);
        await this.client.upsert(collection, {
          wait: true,
          points: batch.map((p) => ({
            id: p.id,
            vector: Array.from(p.vector),
            payload: { ...p.metadata },
          })),
        });
      }
    } catch (error) {
      throw toStoreError(error, 'UPSERT_FAILED', `Failed to upsert ${points.length} point(s) into "${collection}"`);
    }
  }

  async query(collection: string, vector: Float32Array, k: number): Promise<VectorMatch[]> {
    try {
      const dimension = await this.dimensionOf(collection);
      assertVector(vector, dimension, 'query');
      if (k <= 0) return [];

      const results = await this.client.search(collection, {
        vector: Array.from(vector),
        limit: k,
        with_payload: true,
      });

      return results.map((r) => {
        const metadata = ChunkMetadataSchema.safeParse(r.payload ?? {});
        if (!metadata.success) {
          throw new StoreError(`Point ${String(r.id)} in "${collection}" has an invalid payload`, 'QUERY_FAILED');
        }
        return { id: String(r.id), score: r.score, metadata: metadata.data };
      });
    } catch (error) {
      throw toStoreError(error, 'QUERY_FAILED', `Query on "${collection}" failed`);
    }
  }

  async deleteByFile(collection: string, filePath: string): Promise<void> {
    try {
      await this.client.delete(collection, {
        wait: true,
        filter: { must: [{ key: 'file_path', match: { value: filePath } }] },
      });
    } catch (error) {
      // Nothing to delete from a collection that was never created
      if (statusOf(error) === 404) return;
      throw toStoreError(error, 'DELETE_FAILED', `Failed to delete points of ${filePath} from "${collection}"`);
    }
  }

  async count(collection: string): Promise<number> {
    try {
      const result = await this.client.count(collection, { exact: true });
      return result.count;
    } catch (error) {
      if (statusOf(error) === 404) return 0;
      throw toStoreError(error, 'QUERY_FAILED', `Count on "${collection}" failed`);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      console.error(
        '[VectorStore] Qdrant health check failed:',
        error instanceof Error ? error.message : String(error)
      );
      return false;
    }
  }

  async close(): Promise<void> {
    // REST client holds no connection of its own
  }
}

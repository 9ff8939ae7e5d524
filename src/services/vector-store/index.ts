/**
 * Vector store factory and public API
 *
 * @module services/vector-store
 */

import type { AppConfig } from '../../config.js';
import { QdrantVectorStore } from './qdrant.js';
import { RetryingVectorStore } from './retrying.js';
import { SqliteVecStore } from './sqlite-vec.js';
import type { VectorStore } from './types.js';

export {
  StoreError,
  pointId,
  assertVector,
  ChunkMetadataSchema,
  POINT_ID_NAMESPACE,
} from './types.js';
export type { StoreErrorCode, VectorMatch, VectorPoint, VectorStore } from './types.js';
export { SqliteVecStore, isSqliteVecAvailable } from './sqlite-vec.js';
export { QdrantVectorStore } from './qdrant.js';
export type { QdrantApi, QdrantStoreOptions } from './qdrant.js';
export { RetryingVectorStore, DEFAULT_RETRY_POLICY, retryDelay } from './retrying.js';
export type { RetryPolicy, Sleep } from './retrying.js';

/**
 * Build the configured backend, wrapped in retry.
 *
 * @throws StoreError when a local store cannot be opened
 */
export function createVectorStore(config: Pick<AppConfig, 'vectorStore' | 'vectorDbPath' | 'qdrant'>): VectorStore {
  switch (config.vectorStore) {
    case 'sqlite-vec':
      return new RetryingVectorStore(SqliteVecStore.open(config.vectorDbPath));
    case 'qdrant':
      return new RetryingVectorStore(
        new QdrantVectorStore({ url: config.qdrant.url, apiKey: config.qdrant.apiKey })
      );
  }
}

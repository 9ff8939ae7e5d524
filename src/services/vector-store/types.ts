/**
 * VectorStore contract, point identity and errors
 *
 * @module services/vector-store/types
 */

import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import type { ChunkMetadata } from '../../models/chunk.js';

/** Namespace for deterministic point ids */
export const POINT_ID_NAMESPACE = '6f0c7a3e-2b1d-4e8f-9a65-3c2d1b0e4f7a';

export type StoreErrorCode =
  | 'UPSERT_FAILED'
  | 'QUERY_FAILED'
  | 'DELETE_FAILED'
  | 'INVALID_VECTOR'
  | 'COLLECTION_FAILED';

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    /** Transient failure (network, busy database); safe to try again */
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export interface VectorPoint {
  id: string;
  vector: Float32Array;
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  id: string;
  /** Cosine similarity, higher is closer */
  score: number;
  metadata: ChunkMetadata;
}

export interface VectorStore {
  /** 'sqlite-vec', 'qdrant', ... */
  readonly kind: string;

  /**
   * Create the collection if it does not exist.
   *
   * @throws StoreError COLLECTION_FAILED, including a dimension conflict with an existing collection
   */
  ensureCollection(collection: string, dimension: number): Promise<void>;

  /**
   * Insert or replace points by id. All-or-nothing where the backend allows it.
   */
  upsert(collection: string, points: VectorPoint[]): Promise<void>;

  /**
   * Up to k nearest points, best first
   */
  query(collection: string, vector: Float32Array, k: number): Promise<VectorMatch[]>;

  /**
   * Remove every point stored for a file path
   */
  deleteByFile(collection: string, filePath: string): Promise<void>;

  count(collection: string): Promise<number>;

  healthCheck(): Promise<boolean>;

  close(): Promise<void>;
}

/**
 * Deterministic id for (fingerprint, chunk index): re-ingesting an unchanged
 * file overwrites its points instead of adding new ones.
 */
export function pointId(fingerprint: string, chunkIndex: number): string {
  return uuidv5(`${fingerprint}:${chunkIndex}`, POINT_ID_NAMESPACE);
}

export const ChunkMetadataSchema = z.object({
  file_path: z.string(),
  file_fingerprint: z.string(),
  chunk_index: z.number().int(),
  total_chunks: z.number().int(),
  run_id: z.string(),
  start_offset: z.number().int(),
  end_offset: z.number().int(),
  text: z.string(),
  ingested_at: z.string(),
});

/**
 * @throws StoreError INVALID_VECTOR on a length mismatch or a non-finite component
 */
export function assertVector(vector: Float32Array, dimension: number, context: string): void {
  if (vector.length !== dimension) {
    throw new StoreError(
      `Vector for ${context} has ${vector.length} dimensions, collection expects ${dimension}`,
      'INVALID_VECTOR',
      false,
      { actualDimensions: vector.length, expectedDimensions: dimension }
    );
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new StoreError(`Vector for ${context} contains non-finite values`, 'INVALID_VECTOR');
  }
}

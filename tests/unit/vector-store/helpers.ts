/**
 * Shared point builders for vector store tests
 */

import type { ChunkMetadata } from '../../../src/models/chunk.js';
import { pointId } from '../../../src/services/vector-store/types.js';
import type { VectorPoint } from '../../../src/services/vector-store/types.js';

export const FINGERPRINT = 'sha256:' + 'ab'.repeat(32);

export function metadata(filePath: string, chunkIndex: number, totalChunks: number = 3): ChunkMetadata {
  return {
    file_path: filePath,
    file_fingerprint: FINGERPRINT,
    chunk_index: chunkIndex,
    total_chunks: totalChunks,
    run_id: 'run-test',
    start_offset: chunkIndex * 10,
    end_offset: chunkIndex * 10 + 9,
    text: `chunk ${chunkIndex} of ${filePath}`,
    ingested_at: '2024-01-01T00:00:00.000Z',
  };
}

export function point(filePath: string, chunkIndex: number, vector: number[]): VectorPoint {
  return {
    id: pointId(`${FINGERPRINT}:${filePath}`, chunkIndex),
    vector: Float32Array.from(vector),
    metadata: metadata(filePath, chunkIndex),
  };
}

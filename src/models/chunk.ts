/**
 * Chunk interfaces
 *
 * A chunk is a contiguous token window over one file's extracted text.
 */

/**
 * Default chunking configuration (tokens)
 */
export const DEFAULT_CHUNK_SIZE = 1024;
export const DEFAULT_CHUNK_OVERLAP = 20;

/**
 * Result of chunking (before embedding)
 */
export interface ChunkResult {
  /** 0-indexed chunk position */
  index: number;

  /** Source text between startOffset and endOffset, verbatim */
  text: string;

  /** Character offset of the first token */
  startOffset: number;

  /** Character offset just past the last token */
  endOffset: number;

  tokenCount: number;
}

/**
 * What a vector store keeps alongside each chunk vector
 */
export interface ChunkMetadata {
  file_path: string;
  file_fingerprint: string;
  chunk_index: number;
  total_chunks: number;
  run_id: string;
  start_offset: number;
  end_offset: number;
  text: string;
  /** ISO 8601 */
  ingested_at: string;
}

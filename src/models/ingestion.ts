/**
 * Run and ingestion record interfaces
 *
 * A Run owns many IngestionRecords (1:N on run_id). Both are persisted by
 * the ledger; the orchestrator is the only writer.
 */

import type { AnalysisResult } from './analysis.js';

/**
 * Run lifecycle: running -> completed | completed_with_errors | failed.
 * Terminal states are absorbing.
 */
export type RunStatus = 'running' | 'completed' | 'completed_with_errors' | 'failed';

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = [
  'completed',
  'completed_with_errors',
  'failed',
];

export type IngestionStatus = 'success' | 'error' | 'skipped';

/**
 * Which prior outcomes make a file with an unchanged fingerprint skippable.
 * 'success' skips only files that were ingested successfully before;
 * 'attempted' also skips files whose last attempt errored.
 */
export type SkipPolicy = 'success' | 'attempted';

/**
 * Free-form run metadata. Well-known keys are typed; anything else is kept.
 */
export interface RunMetadata {
  run_name?: string;
  collection?: string;
  embedding_model?: string;
  chunk_size?: number;
  chunk_overlap?: number;
  concurrency?: number;
  skip_policy?: SkipPolicy;
  [key: string]: string | number | boolean | null | undefined;
}

export interface Run {
  run_id: string;

  /** ISO 8601 */
  start_time: string;

  /** ISO 8601, null until finalized */
  end_time: string | null;

  status: RunStatus;
  total_files: number;
  processed_files: number;
  failed_files: number;
  skipped_files: number;

  /** Sum of per-file processing seconds */
  total_processing_time: number;

  metadata: RunMetadata;
}

export interface IngestionRecord {
  /** Auto-increment id */
  id: number;

  run_id: string;
  file_path: string;
  collection: string;
  status: IngestionStatus;
  error_message: string | null;

  /** 'sha256:' + 64 hex */
  file_fingerprint: string;

  /** ISO 8601 modification time of the file when it was fingerprinted */
  file_mtime: string | null;

  filesize: number;

  /** Seconds spent on this file */
  processing_time: number;

  /** ISO 8601 */
  ingestion_time: string;

  /** Null for files skipped before analysis */
  analysis: AnalysisResult | null;
}

/**
 * Input to recordFile - id, timestamp and run linkage are assigned by the ledger
 */
export type NewIngestionRecord = Omit<IngestionRecord, 'id' | 'run_id' | 'ingestion_time'>;

/**
 * Ledger row types, query options and errors
 */

import type { EncodingType, PdfIssueType } from '../../../models/analysis.js';
import type { IngestionStatus, RunStatus } from '../../../models/ingestion.js';

export enum LedgerErrorCode {
  DUPLICATE_RUN = 'DUPLICATE_RUN',
  RUN_CLOSED = 'RUN_CLOSED',
  RUN_NOT_FOUND = 'RUN_NOT_FOUND',
  DUPLICATE_RECORD = 'DUPLICATE_RECORD',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  OPEN_FAILED = 'OPEN_FAILED',
  CORRUPT_ROW = 'CORRUPT_ROW',
}

/**
 * Custom error class for ledger operations
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/**
 * start_run with a run id that already exists
 */
export class DuplicateRunError extends LedgerError {
  constructor(public readonly runId: string) {
    super(`Run "${runId}" already exists`, LedgerErrorCode.DUPLICATE_RUN);
    this.name = 'DuplicateRunError';
  }
}

/**
 * Any write against a run that has been finalized
 */
export class RunClosedError extends LedgerError {
  constructor(
    public readonly runId: string,
    public readonly status: RunStatus
  ) {
    super(`Run "${runId}" is closed (status: ${status}); no further writes are accepted`, LedgerErrorCode.RUN_CLOSED);
    this.name = 'RunClosedError';
  }
}

/**
 * Database row type for runs
 */
export interface RunRow {
  run_id: string;
  start_time: string;
  end_time: string | null;
  status: string;
  total_files: number;
  processed_files: number;
  failed_files: number;
  skipped_files: number;
  total_processing_time: number;
  metadata: string;
}

/**
 * Database row type for ingestion_log
 */
export interface IngestionRow {
  id: number;
  file_path: string;
  collection: string;
  status: string;
  error_message: string | null;
  issues: string;
  ingestion_time: string;
  encoding_types: string;
  is_encrypted: number;
  is_damaged: number;
  num_pages: number;
  filesize: number;
  processing_time: number;
  fonts: string;
  analysis_result: string | null;
  run_id: string;
  file_fingerprint: string;
  file_mtime: string | null;
}

/**
 * Filters for listIngestions. All set filters must match.
 */
export interface ListIngestionsOptions {
  runId?: string;
  status?: IngestionStatus;
  collection?: string;
  encodingType?: EncodingType;
  /** Substring match on font name */
  fontName?: string;
  issueType?: PdfIssueType;
  /** Default 100 */
  limit?: number;
  offset?: number;
}

/**
 * Result of checking a run's counters against its records
 */
export interface RunCountCheck {
  run_id: string;
  consistent: boolean;
  counters: { processed: number; failed: number; skipped: number; total: number };
  records: { success: number; error: number; skipped: number };
  /** Only meaningful for finalized runs: processed + failed + skipped == total */
  totals_match: boolean;
}

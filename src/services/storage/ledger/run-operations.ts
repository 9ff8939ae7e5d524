/**
 * Run operations for LedgerService
 *
 * Handles the run lifecycle: insert, counter increments, finalize, and
 * read-only queries. Callers wrap multi-statement work in a transaction.
 */

import type Database from 'better-sqlite3';
import { TERMINAL_RUN_STATUSES } from '../../../models/ingestion.js';
import type { IngestionStatus, Run, RunMetadata, RunStatus } from '../../../models/ingestion.js';
import { DuplicateRunError, LedgerError, LedgerErrorCode, RunClosedError } from './types.js';
import type { RunRow } from './types.js';
import { rowToRun } from './converters.js';

/**
 * Terminal status from final counters.
 *
 * failed: nothing succeeded although there was at least one file;
 * completed_with_errors: at least one file failed;
 * completed: otherwise (including an empty run).
 */
export function deriveRunStatus(counts: {
  total_files: number;
  processed_files: number;
  failed_files: number;
}): Exclude<RunStatus, 'running'> {
  if (counts.total_files > 0 && counts.processed_files === 0) {
    return 'failed';
  }
  if (counts.failed_files > 0) {
    return 'completed_with_errors';
  }
  return 'completed';
}

function getRunRow(db: Database.Database, runId: string): RunRow | undefined {
  return db.prepare<[string], RunRow>('SELECT * FROM runs WHERE run_id = ?').get(runId);
}

/**
 * @throws DuplicateRunError if run_id already exists
 */
export function insertRun(
  db: Database.Database,
  runId: string,
  metadata: RunMetadata,
  totalFiles: number,
  startTime: string
): Run {
  if (getRunRow(db, runId)) {
    throw new DuplicateRunError(runId);
  }

  try {
    db.prepare(
      `
      INSERT INTO runs (
        run_id, start_time, end_time, status, total_files, processed_files,
        failed_files, skipped_files, total_processing_time, metadata
      ) VALUES (?, ?, NULL, 'running', ?, 0, 0, 0, 0, ?)
    `
    ).run(runId, startTime, totalFiles, JSON.stringify(metadata));
  } catch (error) {
    // Another connection inserted the same id between the check and the insert
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
      throw new DuplicateRunError(runId);
    }
    throw error;
  }

  return requireRun(db, runId);
}

export function getRun(db: Database.Database, runId: string): Run | null {
  const row = getRunRow(db, runId);
  return row ? rowToRun(row) : null;
}

/**
 * @throws LedgerError RUN_NOT_FOUND
 */
export function requireRun(db: Database.Database, runId: string): Run {
  const run = getRun(db, runId);
  if (!run) {
    throw new LedgerError(`Run "${runId}" not found`, LedgerErrorCode.RUN_NOT_FOUND);
  }
  return run;
}

/**
 * Return the run if it still accepts writes.
 *
 * @throws LedgerError RUN_NOT_FOUND, RunClosedError
 */
export function requireOpenRun(db: Database.Database, runId: string): Run {
  const run = requireRun(db, runId);
  if (TERMINAL_RUN_STATUSES.includes(run.status)) {
    throw new RunClosedError(runId, run.status);
  }
  return run;
}

/**
 * Newest first
 */
export function listRuns(db: Database.Database, limit: number = 100): Run[] {
  return db
    .prepare<[number], RunRow>('SELECT * FROM runs ORDER BY start_time DESC, rowid DESC LIMIT ?')
    .all(limit)
    .map(rowToRun);
}

/**
 * Add one file outcome to the run's counters.
 * The status guard in the WHERE clause keeps finalized runs untouched even
 * if a caller skipped requireOpenRun.
 */
export function incrementRunCounters(
  db: Database.Database,
  runId: string,
  status: IngestionStatus,
  processingTime: number
): void {
  const column =
    status === 'success' ? 'processed_files' : status === 'error' ? 'failed_files' : 'skipped_files';
  const result = db
    .prepare(
      `UPDATE runs
       SET ${column} = ${column} + 1, total_processing_time = total_processing_time + ?
       WHERE run_id = ? AND status = 'running'`
    )
    .run(processingTime, runId);

  if (result.changes !== 1) {
    const run = requireRun(db, runId);
    throw new RunClosedError(runId, run.status);
  }
}

/**
 * Close the run. Status is derived from the counters; end_time is stamped.
 *
 * @throws RunClosedError when the run was already finalized
 */
export function finalizeRun(db: Database.Database, runId: string, endTime: string): Run {
  const run = requireOpenRun(db, runId);
  const status = deriveRunStatus(run);

  db.prepare(
    `UPDATE runs SET status = ?, end_time = ? WHERE run_id = ? AND status = 'running'`
  ).run(status, endTime, runId);

  return requireRun(db, runId);
}

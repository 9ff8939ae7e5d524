/**
 * LedgerService: durable record of ingestion runs and per-file outcomes
 *
 * One SQLite connection per service. better-sqlite3 is synchronous, so each
 * public write runs start-to-finish without interleaving; recordFile wraps
 * the record insert and the counter increment in one transaction so the two
 * can never drift apart.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type {
  IngestionRecord,
  IngestionStatus,
  NewIngestionRecord,
  Run,
  RunMetadata,
} from '../../../models/ingestion.js';
import { migrateToLatest, verifySchema } from '../migrations/index.js';
import { LedgerError, LedgerErrorCode } from './types.js';
import type { ListIngestionsOptions, RunCountCheck } from './types.js';
import { DEFAULT_LEDGER_PATH, IN_MEMORY_LEDGER } from './helpers.js';
import * as runOps from './run-operations.js';
import * as ingestOps from './ingestion-operations.js';

export class LedgerService {
  private readonly db: Database.Database;
  private readonly path: string;
  private closed = false;

  private constructor(db: Database.Database, dbPath: string) {
    this.db = db;
    this.path = dbPath;
  }

  /**
   * Open (creating if needed) a ledger file and bring its schema up to date.
   *
   * @throws LedgerError OPEN_FAILED or SCHEMA_MISMATCH
   */
  static open(dbPath: string = DEFAULT_LEDGER_PATH): LedgerService {
    let db: Database.Database;
    try {
      if (dbPath !== IN_MEMORY_LEDGER) {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      db = new Database(dbPath);
    } catch (error) {
      throw new LedgerError(
        `Failed to open ledger at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        LedgerErrorCode.OPEN_FAILED,
        error
      );
    }

    try {
      migrateToLatest(db);
      const verification = verifySchema(db);
      if (!verification.valid) {
        throw new LedgerError(
          `Ledger schema at ${dbPath} is incomplete. ` +
            `Missing tables: [${verification.missingTables.join(', ')}], ` +
            `indexes: [${verification.missingIndexes.join(', ')}], ` +
            `columns: [${verification.missingColumns.join(', ')}]`,
          LedgerErrorCode.SCHEMA_MISMATCH
        );
      }
    } catch (error) {
      db.close();
      if (error instanceof LedgerError) throw error;
      throw new LedgerError(
        `Failed to prepare ledger schema at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        LedgerErrorCode.SCHEMA_MISMATCH,
        error
      );
    }

    return new LedgerService(db, dbPath);
  }

  static inMemory(): LedgerService {
    return LedgerService.open(IN_MEMORY_LEDGER);
  }

  getPath(): string {
    return this.path;
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[LedgerService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
    this.closed = true;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== RUN OPERATIONS ====================

  /**
   * @throws DuplicateRunError
   */
  startRun(runId: string, metadata: RunMetadata = {}, totalFiles: number = 0): Run {
    return this.transaction(() =>
      runOps.insertRun(this.db, runId, metadata, totalFiles, new Date().toISOString())
    );
  }

  /**
   * Append one file outcome and bump the matching counter atomically.
   *
   * @throws RunClosedError when the run is finalized
   * @throws LedgerError RUN_NOT_FOUND, DUPLICATE_RECORD
   */
  recordFile(runId: string, record: NewIngestionRecord): IngestionRecord {
    return this.transaction(() => {
      runOps.requireOpenRun(this.db, runId);
      const id = ingestOps.insertIngestion(this.db, runId, record, new Date().toISOString());
      runOps.incrementRunCounters(this.db, runId, record.status, record.processing_time);
      const stored = ingestOps.getIngestionById(this.db, id);
      if (!stored) {
        throw new LedgerError(
          `Record ${String(id)} vanished right after insert`,
          LedgerErrorCode.CORRUPT_ROW
        );
      }
      return stored;
    });
  }

  /**
   * @throws RunClosedError when the run was already finalized
   */
  finalizeRun(runId: string): Run {
    return this.transaction(() => runOps.finalizeRun(this.db, runId, new Date().toISOString()));
  }

  getRun(runId: string): Run | null {
    return runOps.getRun(this.db, runId);
  }

  listRuns(limit?: number): Run[] {
    return runOps.listRuns(this.db, limit);
  }

  // ==================== INGESTION OPERATIONS ====================

  getIngestion(filePath: string, collection?: string): IngestionRecord | null {
    return ingestOps.getIngestionByPath(this.db, filePath, collection);
  }

  listIngestions(options?: ListIngestionsOptions): IngestionRecord[] {
    return ingestOps.listIngestions(this.db, options);
  }

  findPriorIngestion(
    fingerprint: string,
    collection: string,
    statuses: readonly IngestionStatus[]
  ): IngestionRecord | null {
    return ingestOps.findPriorIngestion(this.db, fingerprint, collection, statuses);
  }

  /**
   * Compare a run's counters with the records it holds.
   *
   * @throws LedgerError RUN_NOT_FOUND
   */
  verifyRunCounts(runId: string): RunCountCheck {
    const run = runOps.requireRun(this.db, runId);
    const records = ingestOps.countIngestionsByStatus(this.db, runId);

    const consistent =
      run.processed_files === records.success &&
      run.failed_files === records.error &&
      run.skipped_files === records.skipped;

    return {
      run_id: runId,
      consistent,
      counters: {
        processed: run.processed_files,
        failed: run.failed_files,
        skipped: run.skipped_files,
        total: run.total_files,
      },
      records,
      totals_match:
        run.processed_files + run.failed_files + run.skipped_files === run.total_files,
    };
  }
}

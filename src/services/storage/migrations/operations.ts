/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, and getCurrentSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION, CREATE_RUNS_TABLE, CREATE_INGESTION_LOG_TABLE } from './schema-definitions.js';
import {
  configurePragmas,
  createTables,
  createIndexes,
  initializeSchemaVersion,
} from './schema-helpers.js';
import { convertLegacyAnalysis } from './legacy-analysis.js';

/**
 * Run id that collects version-1 ingestion rows which were logged without a run.
 */
export const LEGACY_ORPHAN_RUN_ID = 'legacy-unassigned';

/** Legacy run reference, with missing or dangling ids folded into the orphan run (binds one parameter) */
const LEGACY_RUN_REF = 'CASE WHEN run_id IS NULL OR run_id NOT IN (SELECT run_id FROM runs_new) THEN ? ELSE run_id END';

/**
 * Rewrite copied analysis_result values into the current shape and
 * rebuild the issues and encoding_types filter columns from them.
 * Unreadable values are cleared; their legacy filter columns stay.
 */
function upgradeLegacyAnalyses(db: Database.Database): void {
  const rows = db
    .prepare<[], { id: number; analysis_result: string }>(
      'SELECT id, analysis_result FROM ingestion_log_new WHERE analysis_result IS NOT NULL'
    )
    .all();
  const update = db.prepare<[string, string, string, number]>(
    'UPDATE ingestion_log_new SET analysis_result = ?, issues = ?, encoding_types = ? WHERE id = ?'
  );
  const clear = db.prepare<[number]>('UPDATE ingestion_log_new SET analysis_result = NULL WHERE id = ?');

  let cleared = 0;
  for (const row of rows) {
    const analysis = convertLegacyAnalysis(row.analysis_result);
    if (analysis) {
      update.run(
        JSON.stringify(analysis),
        JSON.stringify(analysis.issues),
        JSON.stringify(analysis.encoding_types),
        row.id
      );
    } else {
      clear.run(row.id);
      cleared++;
    }
  }

  if (rows.length > 0) {
    console.error(
      `[Migration] Converted ${rows.length - cleared} legacy analysis result(s), cleared ${cleared} unreadable`
    );
  }
}

/**
 * Check the current schema version of the database
 *
 * @returns Current schema version, 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration
 *
 * Idempotent - safe to call multiple times.
 * Schema version is stamped LAST inside the transaction so a crash before
 * completion leaves version=0 and a clean re-init on restart.
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Migrate from schema version 1 to version 2
 *
 * Changes in v2:
 * - runs: run_name, collection, embedding_model, chunk_size, chunk_overlap and
 *   already_processed_files columns folded into the metadata JSON column
 * - runs: status CHECK constraint; unknown legacy statuses become 'failed'
 *   (finalized rows) or 'running' (rows without end_time)
 * - ingestion_log: file_mtime, fonts and processing_time columns; run_id NOT NULL
 *   (rows without a run, or naming a run that no longer exists, are attached
 *   to a synthetic finalized run)
 * - ingestion_log: analysis_result converted to the current AnalysisResult shape
 * - ingestion_log: unique (run_id, file_path); only the newest legacy row per
 *   pair survives
 */
function migrateV1ToV2(db: Database.Database): void {
  try {
    db.exec('PRAGMA foreign_keys = OFF');
    db.exec('BEGIN TRANSACTION');

    db.exec(CREATE_RUNS_TABLE.replace('IF NOT EXISTS runs', 'runs_new'));
    db.exec(`
      INSERT INTO runs_new (
        run_id, start_time, end_time, status, total_files, processed_files,
        failed_files, skipped_files, total_processing_time, metadata
      )
      SELECT
        run_id,
        COALESCE(start_time, datetime('now')),
        end_time,
        CASE
          WHEN status IN ('running', 'completed', 'completed_with_errors', 'failed') THEN status
          WHEN end_time IS NULL THEN 'running'
          ELSE 'failed'
        END,
        COALESCE(total_files, 0),
        COALESCE(processed_files, 0),
        COALESCE(failed_files, 0),
        COALESCE(skipped_files, 0),
        COALESCE(total_processing_time, 0),
        json_object(
          'run_name', run_name,
          'collection', collection,
          'embedding_model', embedding_model,
          'chunk_size', chunk_size,
          'chunk_overlap', chunk_overlap,
          'already_processed_files', COALESCE(already_processed_files, 0)
        )
      FROM runs
    `);

    const orphans = db
      .prepare<[], { cnt: number }>(
        'SELECT COUNT(*) AS cnt FROM ingestion_log WHERE run_id IS NULL OR run_id NOT IN (SELECT run_id FROM runs_new)'
      )
      .get();
    if (orphans && orphans.cnt > 0) {
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO runs_new (run_id, start_time, end_time, status, total_files, metadata)
         VALUES (?, ?, ?, 'completed', 0, ?)`
      ).run(LEGACY_ORPHAN_RUN_ID, now, now, JSON.stringify({ run_name: 'Legacy ingestions without a run' }));
    }

    db.exec(CREATE_INGESTION_LOG_TABLE.replace('IF NOT EXISTS ingestion_log', 'ingestion_log_new'));
    db.prepare(
      `
      INSERT INTO ingestion_log_new (
        id, file_path, collection, status, error_message, issues, ingestion_time,
        encoding_types, is_encrypted, is_damaged, num_pages, filesize,
        processing_time, fonts, analysis_result, run_id, file_fingerprint, file_mtime
      )
      SELECT
        id,
        COALESCE(file_path, ''),
        COALESCE(collection, ''),
        CASE WHEN status IN ('success', 'error', 'skipped') THEN status ELSE 'error' END,
        NULLIF(error_message, ''),
        '[]',
        COALESCE(ingestion_time, datetime('now')),
        CASE WHEN json_valid(encoding_types) THEN encoding_types ELSE '[]' END,
        COALESCE(is_encrypted, 0),
        COALESCE(is_damaged, 0),
        COALESCE(num_pages, 0),
        COALESCE(filesize, 0),
        0,
        '[]',
        analysis_result,
        ${LEGACY_RUN_REF},
        COALESCE(file_fingerprint, ''),
        NULL
      FROM ingestion_log
      WHERE id IN (
        SELECT MAX(id) FROM ingestion_log GROUP BY ${LEGACY_RUN_REF}, file_path
      )
    `
    ).run(LEGACY_ORPHAN_RUN_ID, LEGACY_ORPHAN_RUN_ID);

    upgradeLegacyAnalyses(db);

    // The synthetic run's counters follow the records attached to it
    db.prepare(
      `UPDATE runs_new SET
         total_files = (SELECT COUNT(*) FROM ingestion_log_new WHERE run_id = runs_new.run_id),
         processed_files = (SELECT COUNT(*) FROM ingestion_log_new WHERE run_id = runs_new.run_id AND status = 'success'),
         failed_files = (SELECT COUNT(*) FROM ingestion_log_new WHERE run_id = runs_new.run_id AND status = 'error'),
         skipped_files = (SELECT COUNT(*) FROM ingestion_log_new WHERE run_id = runs_new.run_id AND status = 'skipped')
       WHERE run_id = ?`
    ).run(LEGACY_ORPHAN_RUN_ID);

    db.exec('DROP TABLE ingestion_log');
    db.exec('DROP TABLE runs');
    db.exec('ALTER TABLE runs_new RENAME TO runs');
    db.exec('ALTER TABLE ingestion_log_new RENAME TO ingestion_log');

    // Legacy indexes were dropped with their table
    createIndexes(db);

    const fkViolations = db.pragma('foreign_key_check');
    if (Array.isArray(fkViolations) && fkViolations.length > 0) {
      throw new Error(
        `Foreign key integrity check failed after v1->v2 migration: ${fkViolations.length} violation(s). ` +
          `First: ${JSON.stringify(fkViolations[0])}`
      );
    }

    db.exec('COMMIT');
    db.exec('PRAGMA foreign_keys = ON');
  } catch (error) {
    try {
      db.exec('ROLLBACK');
      db.exec('PRAGMA foreign_keys = ON');
    } catch (rollbackErr) {
      console.error(
        '[Migration] Rollback failed:',
        rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)
      );
    }
    const cause = error instanceof Error ? error.message : String(error);
    throw new MigrationError(
      `Failed to migrate ledger from v1 to v2: ${cause}`,
      'migrate',
      'runs',
      error
    );
  }
}

/**
 * Bring the database to SCHEMA_VERSION.
 *
 * A database without schema_version but with a legacy `runs` table is a
 * version-1 ledger (that layout predates version tracking).
 *
 * @throws MigrationError if the database is newer than this build or a step fails
 */
export function migrateToLatest(db: Database.Database): void {
  let currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    const legacyRuns = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'runs'`)
      .get();
    if (!legacyRuns) {
      initializeDatabase(db);
      return;
    }
    console.error('[Migration] Found unversioned ledger, treating as schema version 1');
    configurePragmas(db);
    currentVersion = 1;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check'
    );
  }

  // Bump right after each step so a crash between steps only re-runs what is left
  const bumpVersion = (targetVersion: number): void => {
    try {
      db.exec(
        `CREATE TABLE IF NOT EXISTS schema_version (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          version INTEGER NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        )`
      );
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
      ).run(targetVersion, now, now);
    } catch (error) {
      throw new MigrationError(
        `Failed to update schema version to ${String(targetVersion)} after migration`,
        'update',
        'schema_version',
        error
      );
    }
  };

  if (currentVersion < 2) {
    console.error('[Migration] Upgrading ledger schema v1 -> v2');
    migrateV1ToV2(db);
    bumpVersion(2);
  }
}

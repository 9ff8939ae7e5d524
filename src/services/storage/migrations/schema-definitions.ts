/**
 * SQL Schema Definitions for the Run Ledger
 *
 * Contains all table creation SQL, indexes, and database configuration
 * constants.
 *
 * @module migrations/schema-definitions
 */

export const SCHEMA_VERSION = 2;

/**
 * Database configuration pragmas for optimal performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version tracking table
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * One row per orchestrator invocation.
 * Counters only ever increase while status = 'running'; a finalized row is
 * never written again.
 */
export const CREATE_RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS runs (
  run_id TEXT PRIMARY KEY NOT NULL,
  start_time TEXT NOT NULL,
  end_time TEXT,
  status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'completed_with_errors', 'failed')),
  total_files INTEGER NOT NULL DEFAULT 0 CHECK (total_files >= 0),
  processed_files INTEGER NOT NULL DEFAULT 0 CHECK (processed_files >= 0),
  failed_files INTEGER NOT NULL DEFAULT 0 CHECK (failed_files >= 0),
  skipped_files INTEGER NOT NULL DEFAULT 0 CHECK (skipped_files >= 0),
  total_processing_time REAL NOT NULL DEFAULT 0,
  metadata TEXT NOT NULL DEFAULT '{}'
)
`;

/**
 * One row per (run, file) terminal outcome.
 * analysis_result is the full AnalysisResult JSON; issues, encoding_types and
 * fonts are denormalized copies kept queryable.
 */
export const CREATE_INGESTION_LOG_TABLE = `
CREATE TABLE IF NOT EXISTS ingestion_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_path TEXT NOT NULL,
  collection TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('success', 'error', 'skipped')),
  error_message TEXT,
  issues TEXT NOT NULL DEFAULT '[]',
  ingestion_time TEXT NOT NULL,
  encoding_types TEXT NOT NULL DEFAULT '[]',
  is_encrypted INTEGER NOT NULL DEFAULT 0,
  is_damaged INTEGER NOT NULL DEFAULT 0,
  num_pages INTEGER NOT NULL DEFAULT 0,
  filesize INTEGER NOT NULL DEFAULT 0,
  processing_time REAL NOT NULL DEFAULT 0,
  fonts TEXT NOT NULL DEFAULT '[]',
  analysis_result TEXT,
  run_id TEXT NOT NULL REFERENCES runs(run_id),
  file_fingerprint TEXT NOT NULL,
  file_mtime TEXT
)
`;

/**
 * Index definitions for query performance
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_ingestion_fingerprint ON ingestion_log(file_fingerprint, collection)',
  'CREATE INDEX IF NOT EXISTS idx_ingestion_file_path ON ingestion_log(file_path)',
  'CREATE INDEX IF NOT EXISTS idx_ingestion_run_id ON ingestion_log(run_id)',
  'CREATE INDEX IF NOT EXISTS idx_ingestion_status ON ingestion_log(status)',
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_ingestion_run_file ON ingestion_log(run_id, file_path)',
  'CREATE INDEX IF NOT EXISTS idx_runs_start_time ON runs(start_time)',
] as const;

/**
 * Table definitions in dependency order (runs before ingestion_log)
 */
export const TABLE_DEFINITIONS = [
  { name: 'runs', sql: CREATE_RUNS_TABLE },
  { name: 'ingestion_log', sql: CREATE_INGESTION_LOG_TABLE },
] as const;

export const REQUIRED_TABLES = ['schema_version', 'runs', 'ingestion_log'] as const;

export const REQUIRED_INDEXES = [
  'idx_ingestion_fingerprint',
  'idx_ingestion_file_path',
  'idx_ingestion_run_id',
  'idx_ingestion_status',
  'idx_ingestion_run_file',
  'idx_runs_start_time',
] as const;

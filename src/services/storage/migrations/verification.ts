/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

export interface SchemaVerification {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
}

// Columns most likely to be missing after a partial upgrade
const REQUIRED_COLUMNS: Record<string, string[]> = {
  runs: ['run_id', 'status', 'total_files', 'processed_files', 'failed_files', 'skipped_files', 'metadata'],
  ingestion_log: ['id', 'file_path', 'collection', 'status', 'run_id', 'file_fingerprint', 'file_mtime', 'fonts'],
};

/**
 * Verify all required tables, indexes, and columns exist
 */
export function verifySchema(db: Database.Database): SchemaVerification {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  const tableStmt = db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`);
  for (const tableName of REQUIRED_TABLES) {
    if (!tableStmt.get(tableName)) {
      missingTables.push(tableName);
    }
  }

  const indexStmt = db.prepare(`SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?`);
  for (const indexName of REQUIRED_INDEXES) {
    if (!indexStmt.get(indexName)) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!tableStmt.get(table)) {
      continue; // already reported as a missing table
    }
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}

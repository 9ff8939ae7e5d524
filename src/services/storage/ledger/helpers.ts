/**
 * Helper functions for LedgerService
 *
 * Path resolution and constraint error mapping.
 */

import type Database from 'better-sqlite3';
import path from 'path';
import { LedgerError, LedgerErrorCode } from './types.js';

/**
 * Path used when none is configured and the caller did not pass one
 */
export const DEFAULT_LEDGER_PATH = path.resolve('data', 'ingestion.db');

export const IN_MEMORY_LEDGER = ':memory:';

/**
 * Run a statement, converting SQLite constraint failures into LedgerError.
 *
 * @param context - Appended to the error message (e.g. 'recording "/a.pdf" for run "r1"')
 */
export function runWithConstraintCheck(
  stmt: Database.Statement<unknown[]>,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new LedgerError(
        `Foreign key violation ${context}`,
        LedgerErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
      throw new LedgerError(
        `Duplicate record ${context}`,
        LedgerErrorCode.DUPLICATE_RECORD,
        error
      );
    }
    throw error;
  }
}

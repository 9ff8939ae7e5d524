/**
 * Ledger Schema Migrations
 *
 * Handles SQLite schema initialization and in-place upgrades of older
 * ledger files. Uses better-sqlite3; all SQL runs through db.exec() for
 * DDL and db.prepare() for anything parameterized.
 *
 * @module migrations
 */

export { MigrationError } from './types.js';
export type { MigrationOperation } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema } from './verification.js';
export type { SchemaVerification } from './verification.js';

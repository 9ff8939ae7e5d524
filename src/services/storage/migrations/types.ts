/**
 * Type definitions and error classes for ledger schema migrations
 *
 * @module migrations/types
 */

export type MigrationOperation =
  | 'pragma'
  | 'create_table'
  | 'create_index'
  | 'query'
  | 'update'
  | 'migrate'
  | 'version_check';

/**
 * Error class for database migration failures
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: MigrationOperation,
    public readonly tableName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

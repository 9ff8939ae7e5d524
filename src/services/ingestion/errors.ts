/**
 * Orchestrator error handling
 *
 * Setup faults (bad path, bad collection, unreachable ledger or store) are
 * IngestionErrors thrown to the caller. Per-file faults never escape a run:
 * they are rendered with describeError() into the file's ledger record.
 *
 * @module services/ingestion/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type IngestionErrorCategory =
  // Input
  | 'PATH_NOT_FOUND'
  | 'INVALID_COLLECTION'
  | 'NO_INPUT_FILES'

  // Collaborators
  | 'LEDGER_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'

  // Settings
  | 'CONFIGURATION_ERROR'

  | 'INTERNAL_ERROR';

/**
 * Error class names whose category is known regardless of where they surface
 */
const ERROR_NAME_TO_CATEGORY: Record<string, IngestionErrorCategory> = {
  ConfigError: 'CONFIGURATION_ERROR',
  LedgerError: 'LEDGER_UNAVAILABLE',
  DuplicateRunError: 'LEDGER_UNAVAILABLE',
  RunClosedError: 'LEDGER_UNAVAILABLE',
  MigrationError: 'LEDGER_UNAVAILABLE',
  StoreError: 'STORE_UNAVAILABLE',
};

function stringProp(error: Error, key: 'code' | 'kind'): string | undefined {
  if (!(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class IngestionError extends Error {
  public readonly category: IngestionErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: IngestionErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'IngestionError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IngestionError);
    }
  }

  /**
   * Normalize any thrown value into an IngestionError.
   * Known error classes keep their category; the original code survives in details.
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: IngestionErrorCategory = 'INTERNAL_ERROR'
  ): IngestionError {
    if (error instanceof IngestionError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = stringProp(error, 'code');
      return new IngestionError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new IngestionError(defaultCategory, String(error), { originalValue: error });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * One-line rendering for ledger error_message: `<ErrorName>[<code>]: <message>`.
 * Errors without a code render as `<ErrorName>: <message>`.
 */
export function describeError(error: unknown): string {
  if (error instanceof IngestionError) {
    return `${error.name}[${error.category}]: ${error.message}`;
  }
  if (error instanceof Error) {
    const code = stringProp(error, 'code');
    return code ? `${error.name}[${code}]: ${error.message}` : `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

export function pathNotFoundError(inputPath: string): IngestionError {
  return new IngestionError('PATH_NOT_FOUND', `Path not found: ${inputPath}`, { path: inputPath });
}

export function invalidCollectionError(collection: string, reason: string): IngestionError {
  return new IngestionError('INVALID_COLLECTION', `Invalid collection "${collection}": ${reason}`, {
    collection,
  });
}

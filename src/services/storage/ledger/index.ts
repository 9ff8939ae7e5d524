/**
 * Run Ledger - Public API
 */

export type { ListIngestionsOptions, RunCountCheck } from './types.js';
export { LedgerErrorCode, LedgerError, DuplicateRunError, RunClosedError } from './types.js';

export { LedgerService } from './service.js';

export { DEFAULT_LEDGER_PATH, IN_MEMORY_LEDGER } from './helpers.js';
export { deriveRunStatus } from './run-operations.js';
export { AnalysisResultSchema } from './converters.js';

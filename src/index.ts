/**
 * PDF ingestion orchestrator - library entry point
 *
 * CRITICAL: NEVER use console.log() in library code - stdout belongs to the
 * CLI's JSON summary. Use console.error() for all logging.
 *
 * @module index
 */

export * from './models/index.js';

export {
  ConfigError,
  parseConfig,
  loadEnvFile,
  validateIngestionConfig,
  DEFAULT_INGESTION_CONFIG,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_DIMENSION,
} from './config.js';
export type { AppConfig, IngestionConfig, VectorStoreKind } from './config.js';

export * from './services/extraction/index.js';
export * from './services/analysis/index.js';
export { chunkText, validateChunkParams, wordTokenizer } from './services/chunking/chunker.js';
export type { Token, Tokenizer } from './services/chunking/chunker.js';
export * from './services/embedding/index.js';
export * from './services/vector-store/index.js';
export * from './services/storage/ledger/index.js';
export { MigrationError } from './services/storage/migrations/index.js';
export * from './services/ingestion/index.js';

export { computeHash, hashFile, isValidHashFormat } from './utils/hash.js';

/**
 * Ingestion configuration
 *
 * Environment variables are read once (after dotenv has populated
 * process.env) and validated with zod. Invalid values fail before a run
 * starts.
 *
 * @module config
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './models/chunk.js';
import type { SkipPolicy } from './models/ingestion.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_EMBEDDING_MODEL = 'BAAI/bge-large-en-v1.5';
export const DEFAULT_EMBEDDING_DIMENSION = 1024;

/**
 * Per-run settings the orchestrator needs
 */
export interface IngestionConfig {
  chunkSize: number;
  chunkOverlap: number;
  /** Worker pool size; 1 = strictly sequential */
  concurrency: number;
  skipPolicy: SkipPolicy;
  /** How long dispatched workers may keep running after cancellation */
  cancelGraceMs: number;
  embeddingModel: string;
}

export const DEFAULT_INGESTION_CONFIG: IngestionConfig = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
  concurrency: 4,
  skipPolicy: 'success',
  cancelGraceMs: 10_000,
  embeddingModel: DEFAULT_EMBEDDING_MODEL,
};

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().default(fallback);

const EnvSchema = z.object({
  PDF_INGEST_DB_PATH: z.string().min(1).default('./data/ingestion.db'),
  PDF_INGEST_CHUNK_SIZE: intFromEnv(DEFAULT_CHUNK_SIZE),
  PDF_INGEST_CHUNK_OVERLAP: intFromEnv(DEFAULT_CHUNK_OVERLAP),
  PDF_INGEST_CONCURRENCY: intFromEnv(4),
  PDF_INGEST_EXTRACTION_TIMEOUT_MS: intFromEnv(120_000),
  PDF_INGEST_CANCEL_GRACE_MS: intFromEnv(10_000),
  PDF_INGEST_SKIP_POLICY: z.enum(['success', 'attempted']).default('success'),
  PDF_INGEST_PYTHON_PATH: z.string().min(1).optional(),
  PDF_INGEST_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  PDF_INGEST_EMBEDDING_DIMENSION: intFromEnv(DEFAULT_EMBEDDING_DIMENSION),
  PDF_INGEST_VECTOR_STORE: z.enum(['sqlite-vec', 'qdrant']).default('sqlite-vec'),
  PDF_INGEST_VECTOR_DB_PATH: z.string().min(1).default('./data/vectors.db'),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: z.string().min(1).optional(),
});

export type VectorStoreKind = 'sqlite-vec' | 'qdrant';

export interface AppConfig {
  dbPath: string;
  ingestion: IngestionConfig;
  extractionTimeoutMs: number;
  pythonPath: string | undefined;
  embeddingDimension: number;
  vectorStore: VectorStoreKind;
  vectorDbPath: string;
  qdrant: { url: string; apiKey: string | undefined };
}

/**
 * Load .env from the first candidate that exists: PDF_INGEST_ENV_FILE,
 * then CWD/.env. Values already in the environment are not overridden.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): string | null {
  const candidates = [env.PDF_INGEST_ENV_FILE, path.resolve(process.cwd(), '.env')].filter(
    (p): p is string => typeof p === 'string' && p.length > 0
  );

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, processEnv: env, quiet: true });
      return envPath;
    }
  }
  return null;
}

/**
 * Parse configuration from an environment map.
 * Empty strings count as unset so `.env` files can leave keys blank.
 *
 * @throws ConfigError naming the first offending variable
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(
      `Invalid configuration ${field}: ${issue?.message ?? 'unknown error'}`,
      field,
      parsed.error
    );
  }
  const e = parsed.data;

  const config: AppConfig = {
    dbPath: e.PDF_INGEST_DB_PATH,
    ingestion: {
      chunkSize: e.PDF_INGEST_CHUNK_SIZE,
      chunkOverlap: e.PDF_INGEST_CHUNK_OVERLAP,
      concurrency: e.PDF_INGEST_CONCURRENCY,
      skipPolicy: e.PDF_INGEST_SKIP_POLICY,
      cancelGraceMs: e.PDF_INGEST_CANCEL_GRACE_MS,
      embeddingModel: e.PDF_INGEST_EMBEDDING_MODEL,
    },
    extractionTimeoutMs: e.PDF_INGEST_EXTRACTION_TIMEOUT_MS,
    pythonPath: e.PDF_INGEST_PYTHON_PATH,
    embeddingDimension: e.PDF_INGEST_EMBEDDING_DIMENSION,
    vectorStore: e.PDF_INGEST_VECTOR_STORE,
    vectorDbPath: e.PDF_INGEST_VECTOR_DB_PATH,
    qdrant: { url: e.QDRANT_URL, apiKey: e.QDRANT_API_KEY },
  };

  validateIngestionConfig(config.ingestion);
  if (config.extractionTimeoutMs <= 0) {
    throw new ConfigError('Extraction timeout must be positive', 'PDF_INGEST_EXTRACTION_TIMEOUT_MS');
  }
  if (config.embeddingDimension <= 0) {
    throw new ConfigError('Embedding dimension must be positive', 'PDF_INGEST_EMBEDDING_DIMENSION');
  }
  return config;
}

/**
 * FAIL FAST on settings that would make every file fail the same way.
 *
 * @throws ConfigError
 */
export function validateIngestionConfig(config: IngestionConfig): void {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    throw new ConfigError(`Chunk size must be a positive integer, got ${config.chunkSize}`, 'chunkSize');
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    throw new ConfigError(
      `Chunk overlap must be a non-negative integer, got ${config.chunkOverlap}`,
      'chunkOverlap'
    );
  }
  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigError(
      `Chunk overlap (${config.chunkOverlap}) must be smaller than chunk size (${config.chunkSize})`,
      'chunkOverlap'
    );
  }
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigError(`Concurrency must be at least 1, got ${config.concurrency}`, 'concurrency');
  }
  if (config.cancelGraceMs < 0) {
    throw new ConfigError('Cancel grace period cannot be negative', 'cancelGraceMs');
  }
  if (config.embeddingModel.trim().length === 0) {
    throw new ConfigError('Embedding model name is required', 'embeddingModel');
  }
}

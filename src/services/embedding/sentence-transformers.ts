/**
 * SentenceTransformerEmbedder - bridge to python/embedding_worker.py
 *
 * Texts go to the worker as one JSON request on stdin; vectors come back as
 * one JSON line on stdout. Large inputs are split across several worker
 * calls, and the result is only returned once every call succeeded.
 *
 * @module services/embedding/sentence-transformers
 */

import { z } from 'zod';
import { DEFAULT_EMBEDDING_DIMENSION, DEFAULT_EMBEDDING_MODEL } from '../../config.js';
import { resolveWorkerScript, runJsonWorker, WorkerProcessError } from '../python-worker.js';
import { EmbeddingError, validateEmbeddings } from './embedder.js';
import type { Embedder, EmbedOptions } from './embedder.js';

export const DEFAULT_BATCH_SIZE = 32;

/** Model load dominates; five minutes covers a cold download cache */
const WORKER_TIMEOUT_MS = 300_000;

const EmbeddingResponseSchema = z.object({
  success: z.boolean(),
  embeddings: z.array(z.array(z.number())).default([]),
  device: z.string().default('unknown'),
  error: z.string().nullable().default(null),
});

export interface SentenceTransformerOptions {
  modelName?: string;
  dimension?: number;
  batchSize?: number;
  workerPath?: string;
  pythonPath?: string;
  pythonOptions?: string[];
  timeoutMs?: number;
}

export class SentenceTransformerEmbedder implements Embedder {
  readonly modelName: string;
  readonly dimension: number;
  private readonly batchSize: number;
  private readonly workerPath: string;
  private readonly pythonPath: string | undefined;
  private readonly pythonOptions: string[] | undefined;
  private readonly timeoutMs: number;
  private lastDevice = 'unknown';

  /**
   * Maximum texts per worker call; bounds worker memory on very long documents.
   */
  private static readonly MAX_TEXTS_PER_CALL = 256;

  constructor(options: SentenceTransformerOptions = {}) {
    this.modelName = options.modelName ?? DEFAULT_EMBEDDING_MODEL;
    this.dimension = options.dimension ?? DEFAULT_EMBEDDING_DIMENSION;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.workerPath =
      options.workerPath ?? resolveWorkerScript('embedding_worker.py');
    this.pythonPath = options.pythonPath;
    this.pythonOptions = options.pythonOptions;
    this.timeoutMs = options.timeoutMs ?? WORKER_TIMEOUT_MS;
  }

  /**
   * Device reported by the last successful call (e.g. 'cuda:0', 'cpu')
   */
  getLastDevice(): string {
    return this.lastDevice;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }

    const maxPerCall = SentenceTransformerEmbedder.MAX_TEXTS_PER_CALL;
    const vectors: Float32Array[] = [];
    const totalCalls = Math.ceil(texts.length / maxPerCall);

    for (let i = 0; i < texts.length; i += maxPerCall) {
      const batch = texts.slice(i, i + maxPerCall);
      if (totalCalls > 1) {
        console.error(
          `[Embedding] Batch ${Math.floor(i / maxPerCall) + 1}/${totalCalls} (${batch.length} texts)`
        );
      }
      vectors.push(...(await this.embedBatch(batch, options.signal)));
    }

    validateEmbeddings(texts.length, vectors, this.dimension);
    return vectors;
  }

  private async embedBatch(texts: string[], signal: AbortSignal | undefined): Promise<Float32Array[]> {
    const request = JSON.stringify({
      texts,
      model: this.modelName,
      batch_size: this.batchSize,
    });

    let payload: unknown;
    try {
      ({ payload } = await runJsonWorker({
        scriptPath: this.workerPath,
        pythonPath: this.pythonPath,
        pythonOptions: this.pythonOptions,
        request,
        timeoutMs: this.timeoutMs,
        label: 'Embedding',
        signal,
      }));
    } catch (error) {
      if (error instanceof WorkerProcessError) {
        throw new EmbeddingError(error.message, error.kind === 'ABORTED' ? 'ABORTED' : 'WORKER_ERROR', {
          kind: error.kind,
          stderr: error.stderrTail.substring(0, 1000),
        });
      }
      throw error;
    }

    const parsed = EmbeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Embedding worker returned a malformed response: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'PARSE_ERROR',
        { output: JSON.stringify(payload).substring(0, 1000) }
      );
    }

    const result = parsed.data;
    if (!result.success) {
      throw new EmbeddingError(
        result.error ?? 'Embedding generation failed with no error message',
        'EMBEDDING_FAILED',
        { count: texts.length, device: result.device, model: this.modelName }
      );
    }

    validateEmbeddings(texts.length, result.embeddings, this.dimension);
    this.lastDevice = result.device;
    return result.embeddings.map((vector) => new Float32Array(vector));
  }
}

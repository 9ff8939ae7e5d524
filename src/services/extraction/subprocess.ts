/**
 * SubprocessExtractor - process-isolated text extraction
 *
 * Each call spawns python/extract_worker.py, sends one request, and waits
 * for one response. The extraction library never loads into this process:
 * a document that crashes or hangs it takes down only its own worker.
 *
 * No retries here; the orchestrator owns retry policy.
 *
 * @module services/extraction/subprocess
 */

import { resolveWorkerScript, runJsonWorker, WorkerProcessError } from '../python-worker.js';
import { ExtractionError } from './errors.js';
import {
  buildExtractionRequest,
  ExtractionResponseSchema,
} from './extractor.js';
import type {
  ExtractionOptions,
  ExtractionOutput,
  PdfSource,
  TextExtractor,
} from './extractor.js';

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 120_000;

export interface SubprocessExtractorOptions {
  workerPath?: string;
  pythonPath?: string;
  /** Interpreter flags (default ['-u']) */
  pythonOptions?: string[];
  timeoutMs?: number;
}

export class SubprocessExtractor implements TextExtractor {
  private readonly workerPath: string;
  private readonly pythonPath: string | undefined;
  private readonly pythonOptions: string[] | undefined;
  readonly timeoutMs: number;

  constructor(options: SubprocessExtractorOptions = {}) {
    this.workerPath =
      options.workerPath ?? resolveWorkerScript('extract_worker.py');
    this.pythonPath = options.pythonPath;
    this.pythonOptions = options.pythonOptions;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
  }

  async extract(source: PdfSource, options?: ExtractionOptions): Promise<ExtractionOutput> {
    const request = buildExtractionRequest(source, options);
    const target = 'path' in source ? source.path : `<${source.bytes.length} bytes>`;

    let payload: unknown;
    try {
      ({ payload } = await runJsonWorker({
        scriptPath: this.workerPath,
        pythonPath: this.pythonPath,
        pythonOptions: this.pythonOptions,
        request: JSON.stringify(request),
        timeoutMs: this.timeoutMs,
        label: 'Extraction',
        signal: options?.signal,
      }));
    } catch (error) {
      if (error instanceof WorkerProcessError) {
        throw new ExtractionError(
          `Extraction of ${target} failed: ${error.message}`,
          error.kind,
          error.stderrTail
        );
      }
      throw error;
    }

    const parsed = ExtractionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExtractionError(
        `Extraction of ${target} returned a malformed response: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'WORKER_FAILURE',
        JSON.stringify(payload).substring(0, 1000)
      );
    }

    if (parsed.data.error !== null) {
      throw new ExtractionError(
        `Extraction of ${target} failed: ${parsed.data.error}`,
        'WORKER_FAILURE',
        parsed.data.error
      );
    }

    return { text: parsed.data.text, warnings: parsed.data.warnings };
  }
}

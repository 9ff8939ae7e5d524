/**
 * IngestionOrchestrator - one run over a batch of PDFs
 *
 * Setup faults (bad collection, missing path, closed ledger, unhealthy
 * store, invalid settings) throw IngestionError before a run exists.
 * Once the run is started every input file ends with exactly one ledger
 * record, and the run is always finalized, including after cancellation.
 *
 * Ledger writes are synchronous better-sqlite3 transactions, so workers
 * sharing the pool never interleave inside a recordFile call.
 *
 * @module services/ingestion/orchestrator
 */

import pLimit from 'p-limit';
import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import type { AnalysisResult } from '../../models/analysis.js';
import type { IngestionStatus, Run, RunMetadata, SkipPolicy } from '../../models/ingestion.js';
import { validateIngestionConfig } from '../../config.js';
import type { IngestionConfig } from '../../config.js';
import type { Embedder } from '../embedding/embedder.js';
import type { TextExtractor } from '../extraction/extractor.js';
import type { LedgerService } from '../storage/ledger/service.js';
import { DuplicateRunError, LedgerError, LedgerErrorCode } from '../storage/ledger/types.js';
import type { VectorStore } from '../vector-store/types.js';
import { describeFile, listInputFiles } from './discovery.js';
import type { DiscoveredFile } from './discovery.js';
import { IngestionError, describeError, invalidCollectionError } from './errors.js';
import { processFile } from './pipeline.js';
import type { PipelineDeps } from './pipeline.js';

export const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export const CANCELLED_BEFORE_PROCESSING = 'Run cancelled before file was processed';
export const CANCELLED_WHILE_PROCESSING = 'Cancelled while processing';

export interface OrchestratorDeps {
  ledger: LedgerService;
  extractor: TextExtractor;
  embedder: Embedder;
  store: VectorStore;
  config: IngestionConfig;
}

export interface RunOptions {
  /** Generated when omitted */
  runId?: string;
  runName?: string;
  /** Stops dispatch; in-flight files get the configured grace period */
  signal?: AbortSignal;
}

/**
 * `<UTC timestamp>-<8 hex>`, e.g. 20261018T101500Z-3f9a0c12
 */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  return `${stamp}-${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

export function skipStatusesFor(policy: SkipPolicy): IngestionStatus[] {
  return policy === 'attempted' ? ['success', 'error'] : ['success'];
}

/**
 * @throws IngestionError INVALID_COLLECTION
 */
export function validateCollectionName(collection: string): void {
  if (!COLLECTION_NAME_PATTERN.test(collection)) {
    throw invalidCollectionError(
      collection,
      'must start with a letter or digit and contain only letters, digits, "_" or "-" (max 64 characters)'
    );
  }
}

/**
 * Resolve once `settled` does, or once the grace period after an abort runs out.
 *
 * @returns true when all work finished, false when the grace period expired
 */
async function settleWithin(
  settled: Promise<unknown>,
  signal: AbortSignal | undefined,
  graceMs: number,
  inFlight: () => number
): Promise<boolean> {
  if (!signal) {
    await settled;
    return true;
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<'aborted'>((resolve) => {
    if (signal.aborted) {
      resolve('aborted');
      return;
    }
    onAbort = () => resolve('aborted');
    signal.addEventListener('abort', onAbort, { once: true });
  });

  const done = settled.then(() => 'done' as const);
  const first = await Promise.race([done, aborted]);
  if (onAbort) signal.removeEventListener('abort', onAbort);
  if (first === 'done') return true;

  console.error(
    `[Orchestrator] Cancellation requested; waiting up to ${graceMs}ms for ${inFlight()} in-flight file(s)`
  );

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'expired'>((resolve) => {
    timer = setTimeout(() => resolve('expired'), graceMs);
  });
  const second = await Promise.race([done, expired]);
  clearTimeout(timer);
  return second === 'done';
}

export class IngestionOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  /**
   * Ingest every PDF under `paths` into `collection`.
   *
   * @throws IngestionError on setup faults
   * @throws DuplicateRunError when options.runId already exists
   */
  async run(paths: readonly string[], collection: string, options: RunOptions = {}): Promise<Run> {
    const { ledger, store, embedder, config } = this.deps;

    validateCollectionName(collection);
    try {
      validateIngestionConfig(config);
    } catch (error) {
      throw IngestionError.fromUnknown(error, 'CONFIGURATION_ERROR');
    }
    if (ledger.isClosed()) {
      throw new IngestionError('LEDGER_UNAVAILABLE', `Ledger at ${ledger.getPath()} is closed`);
    }

    const inputs = listInputFiles(paths);

    if (!(await store.healthCheck())) {
      throw new IngestionError('STORE_UNAVAILABLE', `Vector store (${store.kind}) failed its health check`);
    }
    try {
      await store.ensureCollection(collection, embedder.dimension);
    } catch (error) {
      throw IngestionError.fromUnknown(error, 'STORE_UNAVAILABLE');
    }

    const runId = options.runId ?? generateRunId();
    const metadata: RunMetadata = {
      collection,
      embedding_model: embedder.modelName,
      chunk_size: config.chunkSize,
      chunk_overlap: config.chunkOverlap,
      concurrency: config.concurrency,
      skip_policy: config.skipPolicy,
    };
    if (options.runName !== undefined) metadata.run_name = options.runName;

    try {
      ledger.startRun(runId, metadata, inputs.length);
    } catch (error) {
      if (error instanceof DuplicateRunError) throw error;
      throw IngestionError.fromUnknown(error, 'LEDGER_UNAVAILABLE');
    }
    console.error(
      `[Orchestrator] Run ${runId} started: ${inputs.length} file(s) into "${collection}" ` +
        `(concurrency ${config.concurrency}, skip policy ${config.skipPolicy})`
    );

    try {
      await this.execute(runId, collection, inputs, options.signal);
    } catch (error) {
      // Never leave a started run in 'running'
      console.error(`[Orchestrator] Run ${runId} aborted: ${describeError(error)}`);
      this.finalizeQuietly(runId);
      throw IngestionError.fromUnknown(error, 'LEDGER_UNAVAILABLE');
    }

    let run: Run;
    try {
      run = ledger.finalizeRun(runId);
    } catch (error) {
      throw IngestionError.fromUnknown(error, 'LEDGER_UNAVAILABLE');
    }
    console.error(
      `[Orchestrator] Run ${runId} ${run.status}: ${run.processed_files} processed, ` +
        `${run.failed_files} failed, ${run.skipped_files} skipped of ${run.total_files}`
    );
    return run;
  }

  private async execute(
    runId: string,
    collection: string,
    inputs: string[],
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { ledger, config } = this.deps;
    const recorded = new Set<string>();

    const record = (
      file: DiscoveredFile,
      status: IngestionStatus,
      message: string | null,
      analysis: AnalysisResult | null = null,
      seconds = 0
    ): void => {
      if (recorded.has(file.file_path)) {
        console.error(`[Orchestrator] Late ${status} for ${file.file_path} discarded; already recorded`);
        return;
      }
      try {
        ledger.recordFile(runId, {
          file_path: file.file_path,
          collection,
          status,
          error_message: message,
          file_fingerprint: file.file_fingerprint,
          file_mtime: file.file_mtime,
          filesize: file.filesize,
          processing_time: seconds,
          analysis,
        });
      } catch (error) {
        if (error instanceof LedgerError && (error.code === LedgerErrorCode.RUN_CLOSED || error.code === LedgerErrorCode.DUPLICATE_RECORD)) {
          console.error(`[Orchestrator] Dropped record for ${file.file_path}: ${error.message}`);
          return;
        }
        throw error;
      }
      recorded.add(file.file_path);

      const detail = message ? `: ${message}` : '';
      console.error(`[Orchestrator] ${status} ${file.file_path}${detail}`);
    };

    // Plan: fingerprint every input and settle skips before any work is dispatched
    const pending: DiscoveredFile[] = [];
    const seenFingerprints = new Map<string, string>();
    const skipStatuses = skipStatusesFor(config.skipPolicy);

    for (const filePath of inputs) {
      if (signal?.aborted) {
        record(unfingerprinted(filePath), 'skipped', CANCELLED_BEFORE_PROCESSING);
        continue;
      }

      let file: DiscoveredFile;
      try {
        file = await describeFile(filePath);
      } catch (error) {
        record(unfingerprinted(filePath), 'error', describeError(error));
        continue;
      }

      const firstSeen = seenFingerprints.get(file.file_fingerprint);
      if (firstSeen !== undefined) {
        record(file, 'skipped', `Duplicate of ${firstSeen} in this run`);
        continue;
      }
      seenFingerprints.set(file.file_fingerprint, file.file_path);

      const prior = ledger.findPriorIngestion(file.file_fingerprint, collection, skipStatuses);
      if (prior) {
        record(
          file,
          'skipped',
          `Already ingested, content unchanged (${prior.status} in run ${prior.run_id})`
        );
        continue;
      }

      pending.push(file);
    }

    const pipelineDeps: PipelineDeps = {
      extractor: this.deps.extractor,
      embedder: this.deps.embedder,
      store: this.deps.store,
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
    };
    const hardStop = new AbortController();
    const inFlight = new Map<string, DiscoveredFile>();
    const storing = new Set<string>();
    const limit = pLimit(config.concurrency);

    const tasks = pending.map((file) =>
      limit(async () => {
        if (signal?.aborted) {
          record(file, 'skipped', CANCELLED_BEFORE_PROCESSING);
          return;
        }

        inFlight.set(file.file_path, file);
        const started = performance.now();
        try {
          const result = await processFile(
            file,
            {
              runId,
              collection,
              hardStop: hardStop.signal,
              onStoring: () => storing.add(file.file_path),
            },
            pipelineDeps
          );
          const seconds = (performance.now() - started) / 1000;
          const stored = result.status === 'success' ? ` (${result.chunks_stored} chunk(s))` : '';
          if (stored) console.error(`[Orchestrator] Stored ${file.file_path}${stored}`);
          record(file, result.status, result.error_message, result.analysis, seconds);
        } finally {
          inFlight.delete(file.file_path);
          storing.delete(file.file_path);
        }
      })
    );

    const settled = Promise.allSettled(tasks);
    const finished = await settleWithin(settled, signal, config.cancelGraceMs, () => inFlight.size);

    if (!finished) {
      hardStop.abort();
      for (const file of inFlight.values()) {
        if (!storing.has(file.file_path)) {
          record(file, 'error', CANCELLED_WHILE_PROCESSING);
        }
      }

      // Files already writing vectors finish and record what actually happened
      const committing = pending.flatMap((file, i) => (storing.has(file.file_path) ? [tasks[i]] : []));
      if (committing.length > 0) {
        console.error(`[Orchestrator] Waiting for ${committing.length} file(s) already writing to the store`);
        await Promise.allSettled(committing);
      }

      for (const file of pending) {
        if (!recorded.has(file.file_path)) {
          record(file, 'skipped', CANCELLED_BEFORE_PROCESSING);
        }
      }
      return;
    }

    const failures = (await settled).filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    if (failures.length > 0) {
      throw failures[0].reason;
    }
  }

  private finalizeQuietly(runId: string): void {
    try {
      this.deps.ledger.finalizeRun(runId);
    } catch (error) {
      console.error(`[Orchestrator] Could not finalize run ${runId}: ${describeError(error)}`);
    }
  }
}

/**
 * Placeholder identity for a file that could not be fingerprinted
 */
function unfingerprinted(filePath: string): DiscoveredFile {
  return { file_path: filePath, file_fingerprint: '', file_mtime: null, filesize: 0 };
}

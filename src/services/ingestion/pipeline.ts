/**
 * Per-file pipeline: extract -> analyze -> accept -> chunk -> embed -> store
 *
 * processFile never throws. Every fault becomes an outcome the orchestrator
 * writes to the ledger as it is.
 *
 * @module services/ingestion/pipeline
 */

import type { AnalysisResult } from '../../models/analysis.js';
import type { ChunkMetadata } from '../../models/chunk.js';
import type { IngestionStatus } from '../../models/ingestion.js';
import { analyzePdf, readPdfBytes } from '../analysis/analyzer.js';
import { assessAcceptance } from '../analysis/acceptance.js';
import { chunkText } from '../chunking/chunker.js';
import type { Embedder } from '../embedding/embedder.js';
import { validateEmbeddings } from '../embedding/embedder.js';
import type { TextExtractor } from '../extraction/extractor.js';
import type { VectorPoint, VectorStore } from '../vector-store/types.js';
import { pointId } from '../vector-store/types.js';
import type { DiscoveredFile } from './discovery.js';
import { describeError } from './errors.js';

export const NO_TEXT_REASON = 'No text extracted';
export const NO_CHUNKS_REASON = 'Text produced no chunks';

/**
 * An analyzed file the acceptance check turned away
 */
export class FileRejectedError extends Error {
  readonly code = 'REJECTED';

  constructor(reason: string) {
    super(reason);
    this.name = 'FileRejectedError';
  }
}

/**
 * The run's grace period ran out while this file was still in flight
 */
export class FileCancelledError extends Error {
  readonly code = 'CANCELLED';

  constructor(filePath: string) {
    super(`Run cancelled before ${filePath} was stored`);
    this.name = 'FileCancelledError';
  }
}

export interface PipelineDeps {
  extractor: TextExtractor;
  embedder: Embedder;
  store: VectorStore;
  chunkSize: number;
  chunkOverlap: number;
}

export interface PipelineContext {
  runId: string;
  collection: string;
  /**
   * Aborted once in-flight work is no longer waited for. Kills the file's
   * workers, and a file that has not reached the store by then never does.
   */
  hardStop?: AbortSignal;
  /**
   * Called synchronously as the file commits to writing vectors. From here
   * on the file is not cancelled: its delete and upsert run to completion.
   */
  onStoring?: () => void;
}

export interface FileOutcome {
  status: IngestionStatus;
  error_message: string | null;
  analysis: AnalysisResult | null;
  chunks_stored: number;
}

function outcome(
  status: IngestionStatus,
  analysis: AnalysisResult | null,
  message: string | null = null,
  chunksStored = 0
): FileOutcome {
  return { status, error_message: message, analysis, chunks_stored: chunksStored };
}

export async function processFile(
  file: DiscoveredFile,
  ctx: PipelineContext,
  deps: PipelineDeps
): Promise<FileOutcome> {
  let bytes: Uint8Array;
  try {
    bytes = await readPdfBytes(file.file_path);
  } catch (error) {
    return outcome('error', null, describeError(error));
  }

  // Analysis runs on the raw bytes even when extraction fails
  let text: string | null = null;
  let extractionError: unknown = null;
  try {
    const extracted = await deps.extractor.extract({ path: file.file_path }, { signal: ctx.hardStop });
    text = extracted.text;
    for (const warning of extracted.warnings) {
      console.error(`[Pipeline] ${file.file_path}: ${warning}`);
    }
  } catch (error) {
    extractionError = error;
  }

  let analysis: AnalysisResult;
  try {
    analysis = await analyzePdf(bytes, text, { fileSize: file.filesize });
  } catch (error) {
    return outcome('error', null, describeError(error));
  }

  try {
    const decision = assessAcceptance(analysis);
    if (!decision.accepted) {
      throw new FileRejectedError(decision.reason);
    }
    if (decision.warnings.length > 0) {
      console.error(`[Pipeline] ${file.file_path}: ${decision.reason}`);
    }
    if (extractionError !== null) {
      throw extractionError;
    }
    if (text === null || text.trim().length === 0) {
      return outcome('skipped', analysis, NO_TEXT_REASON);
    }

    const chunks = chunkText(text, deps.chunkSize, deps.chunkOverlap);
    if (chunks.length === 0) {
      return outcome('skipped', analysis, NO_CHUNKS_REASON);
    }

    // All-or-nothing: nothing is stored unless every chunk embedded
    const vectors = await deps.embedder.embed(
      chunks.map((c) => c.text),
      { signal: ctx.hardStop }
    );
    validateEmbeddings(chunks.length, vectors, deps.embedder.dimension);

    if (ctx.hardStop?.aborted) {
      throw new FileCancelledError(file.file_path);
    }
    ctx.onStoring?.();

    const ingestedAt = new Date().toISOString();
    const points: VectorPoint[] = chunks.map((chunk, i) => {
      const metadata: ChunkMetadata = {
        file_path: file.file_path,
        file_fingerprint: file.file_fingerprint,
        chunk_index: chunk.index,
        total_chunks: chunks.length,
        run_id: ctx.runId,
        start_offset: chunk.startOffset,
        end_offset: chunk.endOffset,
        text: chunk.text,
        ingested_at: ingestedAt,
      };
      return { id: pointId(file.file_fingerprint, chunk.index), vector: vectors[i], metadata };
    });

    // A changed file must not leave chunks of its previous version behind
    await deps.store.deleteByFile(ctx.collection, file.file_path);
    await deps.store.upsert(ctx.collection, points);

    return outcome('success', analysis, null, points.length);
  } catch (error) {
    return outcome('error', analysis, describeError(error));
  }
}

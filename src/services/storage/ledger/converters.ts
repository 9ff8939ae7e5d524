/**
 * Row <-> model converters for the ledger
 *
 * JSON columns are validated on the way out so a hand-edited or truncated
 * row surfaces as a LedgerError instead of a half-typed object.
 */

import { z } from 'zod';
import { EncodingType, PdfIssueType } from '../../../models/analysis.js';
import type { AnalysisResult } from '../../../models/analysis.js';
import type {
  IngestionRecord,
  IngestionStatus,
  Run,
  RunMetadata,
  RunStatus,
} from '../../../models/ingestion.js';
import { LedgerError, LedgerErrorCode } from './types.js';
import type { IngestionRow, RunRow } from './types.js';

const RunStatusSchema = z.enum(['running', 'completed', 'completed_with_errors', 'failed']);
const IngestionStatusSchema = z.enum(['success', 'error', 'skipped']);

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const AnalysisResultSchema = z.object({
  encoding_attempts: z.array(
    z.object({
      encoding: z.string(),
      confidence: z.number().nullable(),
      success: z.boolean(),
    })
  ),
  encoding_types: z.array(z.nativeEnum(EncodingType)),
  fonts: z.array(
    z.object({
      name: z.string(),
      type: z.string(),
      encoding: z.nativeEnum(EncodingType),
      embedded: z.boolean(),
      subset: z.boolean(),
    })
  ),
  issues: z.array(
    z.object({
      type: z.nativeEnum(PdfIssueType),
      description: z.string(),
      severity: z.enum(['low', 'medium', 'high']),
      page_numbers: z.array(z.number().int()),
      details: z.record(z.union([z.string(), z.number(), z.boolean()])),
    })
  ),
  metadata: z.record(z.string()),
  page_count: z.number().int(),
  is_encrypted: z.boolean(),
  is_damaged: z.boolean(),
});

function parseJsonColumn<T>(raw: string, schema: z.ZodType<T>, column: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new LedgerError(`Column ${column} does not hold valid JSON`, LedgerErrorCode.CORRUPT_ROW, error);
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new LedgerError(
      `Column ${column} failed validation: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      LedgerErrorCode.CORRUPT_ROW,
      parsed.error
    );
  }
  return parsed.data;
}

function parseRunStatus(raw: string): RunStatus {
  const parsed = RunStatusSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError(`Unknown run status "${raw}"`, LedgerErrorCode.CORRUPT_ROW);
  }
  return parsed.data;
}

function parseIngestionStatus(raw: string): IngestionStatus {
  const parsed = IngestionStatusSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError(`Unknown ingestion status "${raw}"`, LedgerErrorCode.CORRUPT_ROW);
  }
  return parsed.data;
}

/**
 * Null metadata values (legacy rows) are dropped rather than surfaced.
 */
export function parseRunMetadata(raw: string): RunMetadata {
  const values = parseJsonColumn(raw, MetadataSchema, 'runs.metadata');
  const metadata: RunMetadata = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== null) metadata[key] = value;
  }
  return metadata;
}

export function rowToRun(row: RunRow): Run {
  return {
    run_id: row.run_id,
    start_time: row.start_time,
    end_time: row.end_time,
    status: parseRunStatus(row.status),
    total_files: row.total_files,
    processed_files: row.processed_files,
    failed_files: row.failed_files,
    skipped_files: row.skipped_files,
    total_processing_time: row.total_processing_time,
    metadata: parseRunMetadata(row.metadata),
  };
}

export function rowToIngestion(row: IngestionRow): IngestionRecord {
  return {
    id: row.id,
    run_id: row.run_id,
    file_path: row.file_path,
    collection: row.collection,
    status: parseIngestionStatus(row.status),
    error_message: row.error_message,
    file_fingerprint: row.file_fingerprint,
    file_mtime: row.file_mtime,
    filesize: row.filesize,
    processing_time: row.processing_time,
    ingestion_time: row.ingestion_time,
    analysis:
      row.analysis_result === null
        ? null
        : parseJsonColumn<AnalysisResult>(
            row.analysis_result,
            AnalysisResultSchema,
            'ingestion_log.analysis_result'
          ),
  };
}

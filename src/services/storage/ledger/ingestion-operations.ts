/**
 * Ingestion log operations for LedgerService
 *
 * Insert and query per-file outcomes. The insert never touches run
 * counters; LedgerService.recordFile pairs it with incrementRunCounters in
 * one transaction.
 */

import type Database from 'better-sqlite3';
import type { IngestionRecord, IngestionStatus, NewIngestionRecord } from '../../../models/ingestion.js';
import type { IngestionRow, ListIngestionsOptions } from './types.js';
import { runWithConstraintCheck } from './helpers.js';
import { rowToIngestion } from './converters.js';

const DEFAULT_LIST_LIMIT = 100;

/**
 * @returns the new row id
 * @throws LedgerError DUPLICATE_RECORD when the run already has a record for this path
 */
export function insertIngestion(
  db: Database.Database,
  runId: string,
  record: NewIngestionRecord,
  ingestionTime: string
): number {
  const analysis = record.analysis;
  const stmt = db.prepare(`
    INSERT INTO ingestion_log (
      file_path, collection, status, error_message, issues, ingestion_time,
      encoding_types, is_encrypted, is_damaged, num_pages, filesize,
      processing_time, fonts, analysis_result, run_id, file_fingerprint, file_mtime
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const result = runWithConstraintCheck(
    stmt,
    [
      record.file_path,
      record.collection,
      record.status,
      record.error_message,
      JSON.stringify(analysis?.issues ?? []),
      ingestionTime,
      JSON.stringify(analysis?.encoding_types ?? []),
      analysis?.is_encrypted ? 1 : 0,
      analysis?.is_damaged ? 1 : 0,
      analysis?.page_count ?? 0,
      record.filesize,
      record.processing_time,
      JSON.stringify(analysis?.fonts ?? []),
      analysis ? JSON.stringify(analysis) : null,
      runId,
      record.file_fingerprint,
      record.file_mtime,
    ],
    `recording "${record.file_path}" for run "${runId}"`
  );

  return Number(result.lastInsertRowid);
}

export function getIngestionById(db: Database.Database, id: number): IngestionRecord | null {
  const row = db.prepare<[number], IngestionRow>('SELECT * FROM ingestion_log WHERE id = ?').get(id);
  return row ? rowToIngestion(row) : null;
}

/**
 * Newest record for a path, optionally within one collection
 */
export function getIngestionByPath(
  db: Database.Database,
  filePath: string,
  collection?: string
): IngestionRecord | null {
  const row =
    collection === undefined
      ? db
          .prepare<[string], IngestionRow>(
            'SELECT * FROM ingestion_log WHERE file_path = ? ORDER BY id DESC LIMIT 1'
          )
          .get(filePath)
      : db
          .prepare<[string, string], IngestionRow>(
            'SELECT * FROM ingestion_log WHERE file_path = ? AND collection = ? ORDER BY id DESC LIMIT 1'
          )
          .get(filePath, collection);
  return row ? rowToIngestion(row) : null;
}

/**
 * Newest record with this fingerprint in this collection whose status is one of `statuses`
 */
export function findPriorIngestion(
  db: Database.Database,
  fingerprint: string,
  collection: string,
  statuses: readonly IngestionStatus[]
): IngestionRecord | null {
  if (statuses.length === 0) return null;

  const placeholders = statuses.map(() => '?').join(', ');
  const row = db
    .prepare<unknown[], IngestionRow>(
      `SELECT * FROM ingestion_log
       WHERE file_fingerprint = ? AND collection = ? AND status IN (${placeholders})
       ORDER BY id DESC LIMIT 1`
    )
    .get(fingerprint, collection, ...statuses);
  return row ? rowToIngestion(row) : null;
}

export function listIngestions(
  db: Database.Database,
  options: ListIngestionsOptions = {}
): IngestionRecord[] {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (options.runId !== undefined) {
    conditions.push('run_id = ?');
    params.push(options.runId);
  }
  if (options.status !== undefined) {
    conditions.push('status = ?');
    params.push(options.status);
  }
  if (options.collection !== undefined) {
    conditions.push('collection = ?');
    params.push(options.collection);
  }
  if (options.encodingType !== undefined) {
    conditions.push('EXISTS (SELECT 1 FROM json_each(ingestion_log.encoding_types) WHERE value = ?)');
    params.push(options.encodingType);
  }
  if (options.fontName !== undefined) {
    conditions.push(
      `EXISTS (SELECT 1 FROM json_each(ingestion_log.fonts) WHERE json_extract(value, '$.name') LIKE ?)`
    );
    params.push(`%${options.fontName}%`);
  }
  if (options.issueType !== undefined) {
    conditions.push(
      `EXISTS (SELECT 1 FROM json_each(ingestion_log.issues) WHERE json_extract(value, '$.type') = ?)`
    );
    params.push(options.issueType);
  }

  let query = 'SELECT * FROM ingestion_log';
  if (conditions.length > 0) {
    query += ' WHERE ' + conditions.join(' AND ');
  }
  query += ' ORDER BY id DESC LIMIT ?';
  params.push(options.limit ?? DEFAULT_LIST_LIMIT);

  if (options.offset !== undefined) {
    query += ' OFFSET ?';
    params.push(options.offset);
  }

  return db.prepare<unknown[], IngestionRow>(query).all(...params).map(rowToIngestion);
}

export function countIngestionsByStatus(
  db: Database.Database,
  runId: string
): Record<IngestionStatus, number> {
  const counts: Record<IngestionStatus, number> = { success: 0, error: 0, skipped: 0 };
  const rows = db
    .prepare<[string], { status: string; cnt: number }>(
      'SELECT status, COUNT(*) AS cnt FROM ingestion_log WHERE run_id = ? GROUP BY status'
    )
    .all(runId);
  for (const row of rows) {
    if (row.status === 'success' || row.status === 'error' || row.status === 'skipped') {
      counts[row.status] = row.cnt;
    }
  }
  return counts;
}

/**
 * Tests for LedgerService: run lifecycle, per-file records and queries
 *
 * @module tests/unit/ledger/service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  DuplicateRunError,
  LedgerError,
  LedgerErrorCode,
  LedgerService,
  RunClosedError,
  deriveRunStatus,
} from '../../../src/services/storage/ledger/index.js';
import { EncodingType, PdfIssueType } from '../../../src/models/analysis.js';
import { cleanupTestDir, createTestDir } from '../../helpers/temp.js';
import { FINGERPRINT_A, FINGERPRINT_B, encryptedAnalysis, newRecord, sampleAnalysis } from './helpers.js';

function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
  try {
    fn();
    expect.unreachable('should have thrown');
  } catch (error) {
    expect(error).toBeInstanceOf(LedgerError);
    if (error instanceof LedgerError) expect(error.code).toBe(code);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

describe('LedgerService', () => {
  let ledger: LedgerService;

  beforeEach(() => {
    ledger = LedgerService.inMemory();
  });

  afterEach(() => {
    ledger.close();
  });

  describe('startRun', () => {
    it('should create a running run with zero counters', () => {
      const run = ledger.startRun('run-1', { run_name: 'nightly', collection: 'docs' }, 3);

      expect(run).toMatchObject({
        run_id: 'run-1',
        end_time: null,
        status: 'running',
        total_files: 3,
        processed_files: 0,
        failed_files: 0,
        skipped_files: 0,
        total_processing_time: 0,
        metadata: { run_name: 'nightly', collection: 'docs' },
      });
      expect(Number.isNaN(Date.parse(run.start_time))).toBe(false);
    });

    it('should refuse a run id that already exists', () => {
      ledger.startRun('run-1');

      expect(() => ledger.startRun('run-1')).toThrow(DuplicateRunError);
      expect(ledger.listRuns()).toHaveLength(1);
    });
  });

  describe('recordFile', () => {
    it('should store the record and bump the matching counter', () => {
      ledger.startRun('run-1', {}, 3);

      const stored = ledger.recordFile('run-1', newRecord());
      ledger.recordFile('run-1', newRecord({ file_path: '/data/in/b.pdf', status: 'error', error_message: 'boom', processing_time: 0.25 }));
      ledger.recordFile('run-1', newRecord({ file_path: '/data/in/c.pdf', status: 'skipped', analysis: null, processing_time: 0 }));

      expect(stored.id).toBeGreaterThan(0);
      expect(stored.run_id).toBe('run-1');
      expect(stored.analysis).toEqual(sampleAnalysis());

      const run = ledger.getRun('run-1');
      expect(run).toMatchObject({
        processed_files: 1,
        failed_files: 1,
        skipped_files: 1,
        total_processing_time: 0.75,
      });
    });

    it('should reject a second record for the same path in one run without touching counters', () => {
      ledger.startRun('run-1', {}, 1);
      ledger.recordFile('run-1', newRecord());

      expectLedgerError(() => ledger.recordFile('run-1', newRecord({ status: 'error' })), LedgerErrorCode.DUPLICATE_RECORD);
      expect(ledger.getRun('run-1')).toMatchObject({ processed_files: 1, failed_files: 0 });
    });

    it('should fail for an unknown run', () => {
      expectLedgerError(() => ledger.recordFile('missing', newRecord()), LedgerErrorCode.RUN_NOT_FOUND);
    });

    it('should refuse writes to a finalized run', () => {
      ledger.startRun('run-1', {}, 2);
      ledger.recordFile('run-1', newRecord());
      ledger.finalizeRun('run-1');

      expect(() => ledger.recordFile('run-1', newRecord({ file_path: '/data/in/late.pdf' }))).toThrow(RunClosedError);
      expect(ledger.listIngestions({ runId: 'run-1' })).toHaveLength(1);
    });
  });

  describe('finalizeRun', () => {
    it('should derive completed_with_errors when some files failed', () => {
      ledger.startRun('run-1', {}, 3);
      ledger.recordFile('run-1', newRecord({ file_path: '/a.pdf' }));
      ledger.recordFile('run-1', newRecord({ file_path: '/b.pdf', status: 'error' }));
      ledger.recordFile('run-1', newRecord({ file_path: '/c.pdf', status: 'error' }));

      const run = ledger.finalizeRun('run-1');

      expect(run.status).toBe('completed_with_errors');
      expect(run.end_time).not.toBeNull();
      expect(run.processed_files + run.failed_files + run.skipped_files).toBe(run.total_files);
    });

    it('should derive failed when nothing succeeded', () => {
      ledger.startRun('run-1', {}, 1);
      ledger.recordFile('run-1', newRecord({ status: 'error' }));

      expect(ledger.finalizeRun('run-1').status).toBe('failed');
    });

    it('should derive completed for an empty run', () => {
      ledger.startRun('run-1', {}, 0);

      expect(ledger.finalizeRun('run-1').status).toBe('completed');
    });

    it('should reject a second finalize and leave the run unchanged', () => {
      ledger.startRun('run-1', {}, 1);
      ledger.recordFile('run-1', newRecord());
      const first = ledger.finalizeRun('run-1');

      expect(() => ledger.finalizeRun('run-1')).toThrow(RunClosedError);
      expect(ledger.getRun('run-1')).toEqual(first);
    });
  });

  describe('verifyRunCounts', () => {
    it('should report counters matching records', () => {
      ledger.startRun('run-1', {}, 2);
      ledger.recordFile('run-1', newRecord({ file_path: '/a.pdf' }));
      ledger.recordFile('run-1', newRecord({ file_path: '/b.pdf', status: 'skipped' }));
      ledger.finalizeRun('run-1');

      expect(ledger.verifyRunCounts('run-1')).toEqual({
        run_id: 'run-1',
        consistent: true,
        counters: { processed: 1, failed: 0, skipped: 1, total: 2 },
        records: { success: 1, error: 0, skipped: 1 },
        totals_match: true,
      });
    });

    it('should detect counters that drifted from the records', () => {
      ledger.startRun('run-1', {}, 1);
      ledger.recordFile('run-1', newRecord());
      ledger.getConnection().prepare(`UPDATE runs SET processed_files = 5 WHERE run_id = 'run-1'`).run();

      const check = ledger.verifyRunCounts('run-1');
      expect(check.consistent).toBe(false);
      expect(check.records.success).toBe(1);
    });

    it('should fail for an unknown run', () => {
      expectLedgerError(() => ledger.verifyRunCounts('missing'), LedgerErrorCode.RUN_NOT_FOUND);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('queries', () => {
    beforeEach(() => {
      ledger.startRun('run-1', {}, 3);
      ledger.recordFile('run-1', newRecord({ file_path: '/a.pdf', file_fingerprint: FINGERPRINT_A }));
      ledger.recordFile(
        'run-1',
        newRecord({
          file_path: '/b.pdf',
          file_fingerprint: FINGERPRINT_B,
          status: 'error',
          error_message: 'FileRejectedError[REJECTED]: PDF is encrypted',
          analysis: encryptedAnalysis(),
        })
      );
      ledger.recordFile('run-1', newRecord({ file_path: '/c.pdf', collection: 'other', file_fingerprint: FINGERPRINT_A }));
      ledger.finalizeRun('run-1');
    });

    it('should list newest first with a limit', () => {
      const all = ledger.listIngestions();
      expect(all.map((r) => r.file_path)).toEqual(['/c.pdf', '/b.pdf', '/a.pdf']);
      expect(ledger.listIngestions({ limit: 1 }).map((r) => r.file_path)).toEqual(['/c.pdf']);
      expect(ledger.listIngestions({ limit: 1, offset: 1 }).map((r) => r.file_path)).toEqual(['/b.pdf']);
    });

    it('should filter by status and collection', () => {
      expect(ledger.listIngestions({ status: 'error' }).map((r) => r.file_path)).toEqual(['/b.pdf']);
      expect(ledger.listIngestions({ collection: 'other' }).map((r) => r.file_path)).toEqual(['/c.pdf']);
    });

    it('should filter by encoding type, font name and issue type', () => {
      expect(ledger.listIngestions({ encodingType: EncodingType.CUSTOM }).map((r) => r.file_path)).toEqual(['/b.pdf']);
      expect(ledger.listIngestions({ fontName: 'Garamond' }).map((r) => r.file_path)).toEqual(['/b.pdf']);
      expect(ledger.listIngestions({ issueType: PdfIssueType.ENCRYPTED }).map((r) => r.file_path)).toEqual(['/b.pdf']);
    });

    it('should return the newest record for a path', () => {
      ledger.startRun('run-2', {}, 1);
      ledger.recordFile('run-2', newRecord({ file_path: '/a.pdf', status: 'skipped' }));

      expect(ledger.getIngestion('/a.pdf')?.run_id).toBe('run-2');
      expect(ledger.getIngestion('/a.pdf', 'other')).toBeNull();
      expect(ledger.getIngestion('/missing.pdf')).toBeNull();
    });

    it('should find prior ingestions by fingerprint, collection and status', () => {
      expect(ledger.findPriorIngestion(FINGERPRINT_A, 'docs', ['success'])?.file_path).toBe('/a.pdf');
      expect(ledger.findPriorIngestion(FINGERPRINT_B, 'docs', ['success'])).toBeNull();
      expect(ledger.findPriorIngestion(FINGERPRINT_B, 'docs', ['success', 'error'])?.file_path).toBe('/b.pdf');
      expect(ledger.findPriorIngestion(FINGERPRINT_A, 'nowhere', ['success'])).toBeNull();
      expect(ledger.findPriorIngestion(FINGERPRINT_A, 'docs', [])).toBeNull();
    });

    it('should list runs newest first', () => {
      ledger.startRun('run-2');

      expect(ledger.listRuns().map((r) => r.run_id)).toEqual(['run-2', 'run-1']);
    });

    it('should surface a corrupted analysis column as CORRUPT_ROW', () => {
      ledger.getConnection().prepare(`UPDATE ingestion_log SET analysis_result = '{"page_count":"x"}' WHERE file_path = '/a.pdf'`).run();

      expectLedgerError(() => ledger.getIngestion('/a.pdf'), LedgerErrorCode.CORRUPT_ROW);
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FILE-BACKED LEDGER
// ═══════════════════════════════════════════════════════════════════════════════

describe('LedgerService on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestDir('ledger');
  });

  afterEach(() => {
    cleanupTestDir(dir);
  });

  it('should persist runs across reopen', () => {
    const dbPath = join(dir, 'nested', 'ledger.db');
    const first = LedgerService.open(dbPath);
    first.startRun('run-1', { run_name: 'persisted' }, 1);
    first.recordFile('run-1', newRecord());
    first.finalizeRun('run-1');
    first.close();
    expect(first.isClosed()).toBe(true);

    const second = LedgerService.open(dbPath);
    try {
      expect(second.getRun('run-1')).toMatchObject({ status: 'completed', metadata: { run_name: 'persisted' } });
      expect(second.verifyRunCounts('run-1').consistent).toBe(true);
    } finally {
      second.close();
    }
  });

  it('should wrap an unopenable path in OPEN_FAILED', () => {
    const blocker = join(dir, 'not-a-directory');
    writeFileSync(blocker, 'x');

    expectLedgerError(() => LedgerService.open(join(blocker, 'ledger.db')), LedgerErrorCode.OPEN_FAILED);
  });
});

describe('deriveRunStatus', () => {
  it('should follow the counter rules', () => {
    expect(deriveRunStatus({ total_files: 3, processed_files: 0, failed_files: 0 })).toBe('failed');
    expect(deriveRunStatus({ total_files: 3, processed_files: 1, failed_files: 2 })).toBe('completed_with_errors');
    expect(deriveRunStatus({ total_files: 3, processed_files: 3, failed_files: 0 })).toBe('completed');
    expect(deriveRunStatus({ total_files: 0, processed_files: 0, failed_files: 0 })).toBe('completed');
  });
});

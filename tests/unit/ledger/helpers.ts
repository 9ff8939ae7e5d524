/**
 * Shared fixtures for ledger tests
 */

import { EncodingType, PdfIssueType } from '../../../src/models/analysis.js';
import type { AnalysisResult } from '../../../src/models/analysis.js';
import type { NewIngestionRecord } from '../../../src/models/ingestion.js';

export const FINGERPRINT_A = 'sha256:' + 'a'.repeat(64);
export const FINGERPRINT_B = 'sha256:' + 'b'.repeat(64);

export function sampleAnalysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    encoding_attempts: [{ encoding: 'UTF-16BE', confidence: 1, success: true }],
    encoding_types: [EncodingType.UTF16BE_WITH_BOM, EncodingType.WINANSI],
    fonts: [{ name: 'Helvetica', type: 'Type1', encoding: EncodingType.WINANSI, embedded: false, subset: false }],
    issues: [],
    metadata: { page_count: '2', Producer: 'test producer' },
    page_count: 2,
    is_encrypted: false,
    is_damaged: false,
    ...overrides,
  };
}

export function encryptedAnalysis(): AnalysisResult {
  return sampleAnalysis({
    is_encrypted: true,
    fonts: [{ name: 'ABCDEF+Garamond', type: 'TrueType', encoding: EncodingType.CUSTOM, embedded: true, subset: true }],
    encoding_types: [EncodingType.CUSTOM, EncodingType.UTF8],
    issues: [
      {
        type: PdfIssueType.ENCRYPTED,
        description: 'Document is encrypted',
        severity: 'high',
        page_numbers: [],
        details: {},
      },
    ],
  });
}

export function newRecord(overrides: Partial<NewIngestionRecord> = {}): NewIngestionRecord {
  return {
    file_path: '/data/in/report.pdf',
    collection: 'docs',
    status: 'success',
    error_message: null,
    file_fingerprint: FINGERPRINT_A,
    file_mtime: '2024-01-01T00:00:00.000Z',
    filesize: 2048,
    processing_time: 0.5,
    analysis: sampleAnalysis(),
    ...overrides,
  };
}

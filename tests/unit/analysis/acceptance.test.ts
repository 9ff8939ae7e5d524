/**
 * Tests for the pre-ingestion acceptance check
 *
 * @module tests/unit/analysis/acceptance
 */

import { describe, it, expect } from 'vitest';
import { assessAcceptance, ACCEPTED_REASON } from '../../../src/services/analysis/acceptance.js';
import { EncodingType, PdfIssueType } from '../../../src/models/analysis.js';
import type { AnalysisResult, IssueSeverity, PdfIssue } from '../../../src/models/analysis.js';

function analysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    encoding_attempts: [{ encoding: 'ascii', confidence: 1, success: true }],
    encoding_types: [EncodingType.ASCII],
    fonts: [],
    issues: [],
    metadata: { page_count: '1' },
    page_count: 1,
    is_encrypted: false,
    is_damaged: false,
    ...overrides,
  };
}

function issue(type: PdfIssueType, severity: IssueSeverity, description = `${type} issue`): PdfIssue {
  return { type, description, severity, page_numbers: [], details: {} };
}

describe('assessAcceptance', () => {
  it('should accept a clean document without warnings', () => {
    expect(assessAcceptance(analysis())).toEqual({ accepted: true, reason: ACCEPTED_REASON, warnings: [] });
  });

  it('should reject encrypted documents first', () => {
    const decision = assessAcceptance(
      analysis({ is_encrypted: true, is_damaged: true, issues: [issue(PdfIssueType.ENCRYPTED, 'high')] })
    );

    expect(decision).toEqual({ accepted: false, reason: 'PDF is encrypted', warnings: [] });
  });

  it('should name the damage when a DAMAGED issue describes it', () => {
    const decision = assessAcceptance(
      analysis({ is_damaged: true, issues: [issue(PdfIssueType.DAMAGED, 'high', 'xref table is broken')] })
    );

    expect(decision.reason).toBe('PDF is damaged: xref table is broken');
  });

  it('should reject a damaged flag without details generically', () => {
    expect(assessAcceptance(analysis({ is_damaged: true })).reason).toBe('PDF is damaged');
  });

  it('should reject documents without pages', () => {
    expect(assessAcceptance(analysis({ page_count: 0 })).reason).toBe('PDF has no pages');
  });

  it('should reject on any high-severity issue and list each type once', () => {
    const decision = assessAcceptance(
      analysis({
        issues: [
          issue(PdfIssueType.PASSWORD_PROTECTED, 'high'),
          issue(PdfIssueType.PASSWORD_PROTECTED, 'high'),
          issue(PdfIssueType.JAVASCRIPT, 'medium'),
        ],
      })
    );

    expect(decision.accepted).toBe(false);
    expect(decision.reason).toBe('PDF has high-severity issues: PASSWORD_PROTECTED');
  });

  it('should accept medium issues and turn known ones into warnings', () => {
    const decision = assessAcceptance(
      analysis({
        issues: [
          issue(PdfIssueType.SCANNED_IMAGE, 'medium'),
          issue(PdfIssueType.MISSING_FONTS, 'medium'),
          issue(PdfIssueType.MISSING_FONTS, 'medium'),
          issue(PdfIssueType.JAVASCRIPT, 'medium'),
        ],
      })
    );

    expect(decision).toEqual({
      accepted: true,
      reason: 'Acceptable with warnings: PDF is likely scanned; text may be missing; 2 font(s) are not embedded',
      warnings: ['PDF is likely scanned; text may be missing', '2 font(s) are not embedded'],
    });
  });

  it('should warn about undecodable characters', () => {
    const decision = assessAcceptance(analysis({ issues: [issue(PdfIssueType.ENCODING_ISSUE, 'medium')] }));

    expect(decision.warnings).toEqual(['Extracted text contains undecodable characters']);
  });
});

/**
 * Pre-ingestion acceptance check
 *
 * @module services/analysis/acceptance
 */

import { PdfIssueType, getIssuesByType } from '../../models/analysis.js';
import type { AcceptanceDecision, AnalysisResult } from '../../models/analysis.js';

export const ACCEPTED_REASON = 'PDF is acceptable for processing';

/**
 * Decide whether an analyzed file may go on to chunking and embedding.
 * Rejections are checked in a fixed order; the first match is the reason.
 */
export function assessAcceptance(analysis: AnalysisResult): AcceptanceDecision {
  const reject = (reason: string): AcceptanceDecision => ({ accepted: false, reason, warnings: [] });

  if (analysis.is_encrypted) {
    return reject('PDF is encrypted');
  }

  if (analysis.is_damaged) {
    const damage = getIssuesByType(analysis, PdfIssueType.DAMAGED)[0];
    return reject(damage ? `PDF is damaged: ${damage.description}` : 'PDF is damaged');
  }

  if (analysis.page_count === 0) {
    return reject('PDF has no pages');
  }

  const critical = analysis.issues.filter((issue) => issue.severity === 'high');
  if (critical.length > 0) {
    const types = [...new Set(critical.map((issue) => issue.type))];
    return reject(`PDF has high-severity issues: ${types.join(', ')}`);
  }

  const warnings: string[] = [];
  if (getIssuesByType(analysis, PdfIssueType.SCANNED_IMAGE).length > 0) {
    warnings.push('PDF is likely scanned; text may be missing');
  }
  if (getIssuesByType(analysis, PdfIssueType.ENCODING_ISSUE).length > 0) {
    warnings.push('Extracted text contains undecodable characters');
  }
  const missingFonts = getIssuesByType(analysis, PdfIssueType.MISSING_FONTS);
  if (missingFonts.length > 0) {
    warnings.push(`${missingFonts.length} font(s) are not embedded`);
  }

  return {
    accepted: true,
    reason: warnings.length > 0 ? `Acceptable with warnings: ${warnings.join('; ')}` : ACCEPTED_REASON,
    warnings,
  };
}

/**
 * Version-1 ledgers stored the analysis as
 * `{filepath, filesize, num_pages, is_encrypted, is_damaged, encoding_types, issues, metadata}`
 * with free-form metadata values. This maps that shape onto AnalysisResult.
 *
 * @module migrations/legacy-analysis
 */

import { z } from 'zod';
import { EncodingType, PdfIssueType } from '../../../models/analysis.js';
import type { AnalysisResult, PdfIssue } from '../../../models/analysis.js';

const LegacyIssueSchema = z.object({
  type: z.nativeEnum(PdfIssueType),
  description: z.string().catch(''),
  severity: z.enum(['low', 'medium', 'high']).catch('low'),
  page_numbers: z.array(z.number().int()).catch([]),
  details: z.record(z.unknown()).catch({}),
});

const LegacyAnalysisSchema = z.object({
  num_pages: z.number().int().nonnegative().catch(0),
  is_encrypted: z.boolean().catch(false),
  is_damaged: z.boolean().catch(false),
  encoding_types: z.array(z.unknown()).catch([]),
  issues: z.array(z.unknown()).catch([]),
  metadata: z.record(z.unknown()).catch({}),
});

const EncodingTypeSchema = z.nativeEnum(EncodingType);

function toScalar(value: unknown): string | number | boolean {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Returns null when the column is not a JSON object. Unknown encodings and
 * issue types are dropped; nested metadata (diagnostics) is kept as JSON text.
 * Encoding attempts and fonts were never recorded and come back empty.
 */
export function convertLegacyAnalysis(raw: string): AnalysisResult | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = LegacyAnalysisSchema.safeParse(value);
  if (!parsed.success) return null;
  const legacy = parsed.data;

  const encodings = new Set<EncodingType>();
  for (const entry of legacy.encoding_types) {
    const encoding = EncodingTypeSchema.safeParse(entry);
    if (encoding.success) encodings.add(encoding.data);
  }

  const issues: PdfIssue[] = [];
  for (const entry of legacy.issues) {
    const issue = LegacyIssueSchema.safeParse(entry);
    if (!issue.success) continue;
    const details: Record<string, string | number | boolean> = {};
    for (const [key, detail] of Object.entries(issue.data.details)) {
      details[key] = toScalar(detail);
    }
    issues.push({ ...issue.data, details });
  }

  const metadata: Record<string, string> = {};
  for (const [key, entry] of Object.entries(legacy.metadata)) {
    if (entry === null || entry === undefined) continue;
    metadata[key] = typeof entry === 'string' ? entry : JSON.stringify(entry);
  }

  return {
    encoding_attempts: [],
    encoding_types: [...encodings].sort(),
    fonts: [],
    issues,
    metadata,
    page_count: legacy.num_pages,
    is_encrypted: legacy.is_encrypted,
    is_damaged: legacy.is_damaged,
  };
}

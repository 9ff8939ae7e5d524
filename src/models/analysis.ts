/**
 * PDF analysis result interfaces
 *
 * Produced once per file by the analyzer and persisted, denormalized,
 * on the file's ingestion record. Never mutated after creation.
 */

/**
 * Text encodings the analyzer can report, either from byte-level detection
 * or from font encoding declarations.
 */
export enum EncodingType {
  ASCII = 'ASCII',
  UTF8 = 'UTF8',
  UTF8_WITH_BOM = 'UTF8_WITH_BOM',
  UTF16 = 'UTF16',
  UTF16BE = 'UTF16BE',
  UTF16LE = 'UTF16LE',
  UTF16BE_WITH_BOM = 'UTF16BE_WITH_BOM',
  UTF16LE_WITH_BOM = 'UTF16LE_WITH_BOM',
  IDENTITY_H = 'IDENTITY_H',
  WINANSI = 'WINANSI',
  MACROMAN = 'MACROMAN',
  LATIN1 = 'LATIN1',
  CUSTOM = 'CUSTOM',
  UNKNOWN = 'UNKNOWN',
}

export enum PdfIssueType {
  PASSWORD_PROTECTED = 'PASSWORD_PROTECTED',
  DAMAGED = 'DAMAGED',
  ENCRYPTED = 'ENCRYPTED',
  MISSING_FONTS = 'MISSING_FONTS',
  EMBEDDED_FILES = 'EMBEDDED_FILES',
  JAVASCRIPT = 'JAVASCRIPT',
  FORM_FIELDS = 'FORM_FIELDS',
  DIGITAL_SIGNATURES = 'DIGITAL_SIGNATURES',
  LARGE_SIZE = 'LARGE_SIZE',
  HIGH_COMPRESSION = 'HIGH_COMPRESSION',
  SCANNED_IMAGE = 'SCANNED_IMAGE',
  WATERMARK = 'WATERMARK',
  CUSTOM_METADATA = 'CUSTOM_METADATA',
  UNUSUAL_STRUCTURE = 'UNUSUAL_STRUCTURE',
  ENCODING_ISSUE = 'ENCODING_ISSUE',
  UTF16_ENCODING = 'UTF16_ENCODING',
  MIXED_ENCODINGS = 'MIXED_ENCODINGS',
}

export type IssueSeverity = 'low' | 'medium' | 'high';

/**
 * One step of encoding detection. Detection produces a single attempt;
 * the fallback sequence appends one attempt per encoding tried, in order.
 */
export interface EncodingAttempt {
  /** Encoding label as tried (e.g. 'UTF-16BE', 'windows-1252') */
  encoding: string;

  /** Detection confidence 0-1, null for fallback decodes */
  confidence: number | null;

  success: boolean;
}

export interface FontInfo {
  /** BaseFont name, including any subset prefix */
  name: string;

  /** Font subtype (Type1, TrueType, Type0, ...) */
  type: string;

  encoding: EncodingType;

  embedded: boolean;

  subset: boolean;
}

export interface PdfIssue {
  type: PdfIssueType;
  description: string;
  severity: IssueSeverity;

  /** 1-based page numbers the issue was observed on (empty = document level) */
  page_numbers: number[];

  details: Record<string, string | number | boolean>;
}

export interface AnalysisResult {
  /** Ordered exactly as tried */
  encoding_attempts: EncodingAttempt[];

  /** Distinct encodings observed, sorted */
  encoding_types: EncodingType[];

  fonts: FontInfo[];
  issues: PdfIssue[];
  metadata: Record<string, string>;
  page_count: number;
  is_encrypted: boolean;
  is_damaged: boolean;
}

export function hasCriticalIssues(result: AnalysisResult): boolean {
  return result.issues.some((issue) => issue.severity === 'high');
}

export function getIssuesByType(result: AnalysisResult, type: PdfIssueType): PdfIssue[] {
  return result.issues.filter((issue) => issue.type === type);
}

/**
 * Outcome of the pre-ingestion acceptance check
 */
export interface AcceptanceDecision {
  accepted: boolean;

  /** Rejection reason, or the warning an accepted file carries */
  reason: string;

  /** Non-fatal observations for accepted files */
  warnings: string[];
}

/**
 * PDF analyzer
 *
 * Inspects raw PDF bytes with pdf-lib, independently of text extraction, and
 * reports encodings, fonts, structural issues and document metadata.
 * Parse failures never escape: they become `is_damaged` plus a DAMAGED issue,
 * so a file that cannot be read still gets a complete AnalysisResult.
 *
 * @module services/analysis/analyzer
 */

import fs from 'fs';
import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFString,
} from 'pdf-lib';
import { EncodingType, PdfIssueType } from '../../models/analysis.js';
import type { AnalysisResult, FontInfo, IssueSeverity, PdfIssue } from '../../models/analysis.js';
import { analyzeEncoding } from './encoding.js';
import { fontKey, isMissingFont, nameText, scanPageResources } from './fonts.js';

export const LARGE_FILE_BYTES = 100 * 1024 * 1024;

/** Indirect objects per page above which the structure is reported as unusual */
export const UNUSUAL_OBJECTS_PER_PAGE = 10;

const PDF_HEADER = '%PDF-';

const STANDARD_INFO_KEYS = new Set([
  'Title',
  'Author',
  'Subject',
  'Keywords',
  'Creator',
  'Producer',
  'CreationDate',
  'ModDate',
  'Trapped',
]);

const UNMARKED_UTF16 = new Set([EncodingType.UTF16, EncodingType.UTF16BE, EncodingType.UTF16LE]);

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: 'READ_FAILED',
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

export interface AnalyzeOptions {
  /** On-disk size; defaults to the byte length */
  fileSize?: number;
}

/** Mutable working state; frozen into an AnalysisResult at the end */
interface AnalysisState {
  issues: PdfIssue[];
  fonts: FontInfo[];
  fontPages: Map<string, number[]>;
  imagePages: number[];
  metadata: Record<string, string>;
  textStrings: Uint8Array[];
  pageCount: number;
  isEncrypted: boolean;
  isDamaged: boolean;
}

function addIssue(
  state: AnalysisState,
  type: PdfIssueType,
  severity: IssueSeverity,
  description: string,
  details: PdfIssue['details'] = {},
  pageNumbers: number[] = []
): void {
  state.issues.push({ type, description, severity, page_numbers: pageNumbers, details });
}

function markDamaged(state: AnalysisState, description: string, error?: unknown): void {
  state.isDamaged = true;
  const details: PdfIssue['details'] = {};
  if (error !== undefined) details.error = error instanceof Error ? error.message : String(error);
  addIssue(state, PdfIssueType.DAMAGED, 'high', description, details);
}

function hasPdfHeader(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_HEADER.length) return false;
  return Buffer.from(bytes.subarray(0, PDF_HEADER.length)).toString('latin1') === PDF_HEADER;
}

function readInfoDictionary(doc: PDFDocument, state: AnalysisState): void {
  const info = doc.context.lookup(doc.context.trailerInfo.Info);
  if (!(info instanceof PDFDict)) return;

  const customKeys: string[] = [];
  for (const [key] of info.entries()) {
    const field = nameText(key);
    const resolved = info.lookup(key);

    if (resolved instanceof PDFString || resolved instanceof PDFHexString) {
      state.metadata[field] = resolved.decodeText();
      state.textStrings.push(resolved.asBytes());
    } else if (resolved instanceof PDFName) {
      state.metadata[field] = nameText(resolved);
    } else if (resolved instanceof PDFNumber) {
      state.metadata[field] = String(resolved.asNumber());
    } else {
      continue;
    }

    if (!STANDARD_INFO_KEYS.has(field)) customKeys.push(field);
  }

  if (customKeys.length > 0) {
    addIssue(
      state,
      PdfIssueType.CUSTOM_METADATA,
      'low',
      `Document information carries non-standard keys: ${customKeys.join(', ')}`,
      { keys: customKeys.join(', ') }
    );
  }
}

function inspectCatalog(doc: PDFDocument, state: AnalysisState): void {
  const catalog = doc.catalog;

  const names = catalog.lookup(PDFName.of('Names'));
  if (names instanceof PDFDict) {
    if (names.has(PDFName.of('EmbeddedFiles'))) {
      addIssue(state, PdfIssueType.EMBEDDED_FILES, 'medium', 'Document contains embedded files');
    }
    if (names.has(PDFName.of('JavaScript'))) {
      addIssue(state, PdfIssueType.JAVASCRIPT, 'medium', 'Document contains JavaScript', {
        location: 'names',
      });
    }
  }

  const openAction = catalog.lookup(PDFName.of('OpenAction'));
  if (openAction instanceof PDFDict) {
    const action = openAction.lookup(PDFName.of('S'));
    if (action instanceof PDFName && nameText(action) === 'JavaScript') {
      addIssue(state, PdfIssueType.JAVASCRIPT, 'medium', 'Document runs JavaScript when opened', {
        location: 'open_action',
      });
    }
  }

  const acroForm = catalog.lookup(PDFName.of('AcroForm'));
  if (acroForm instanceof PDFDict) {
    const fields = acroForm.lookup(PDFName.of('Fields'));
    const fieldCount = fields instanceof PDFArray ? fields.size() : 0;
    if (fieldCount > 0) {
      addIssue(state, PdfIssueType.FORM_FIELDS, 'low', `Document has ${fieldCount} form field(s)`, {
        field_count: fieldCount,
      });
    }

    let signatures = 0;
    if (fields instanceof PDFArray) {
      for (let i = 0; i < fields.size(); i++) {
        const field = fields.lookup(i);
        if (!(field instanceof PDFDict)) continue;
        const fieldType = field.lookup(PDFName.of('FT'));
        if (fieldType instanceof PDFName && nameText(fieldType) === 'Sig') signatures++;
      }
    }
    const sigFlags = acroForm.lookup(PDFName.of('SigFlags'));
    if (signatures > 0 || (sigFlags instanceof PDFNumber && sigFlags.asNumber() > 0)) {
      addIssue(state, PdfIssueType.DIGITAL_SIGNATURES, 'low', 'Document has signature fields', {
        signature_fields: signatures,
      });
    }
  }
}

function inspectDocument(doc: PDFDocument, state: AnalysisState): void {
  state.isEncrypted = doc.isEncrypted;
  if (state.isEncrypted) {
    addIssue(state, PdfIssueType.ENCRYPTED, 'high', 'Document is encrypted');
  }

  state.pageCount = doc.getPageCount();

  const objectCount = doc.context.enumerateIndirectObjects().length;
  if (state.pageCount > 0 && objectCount > state.pageCount * UNUSUAL_OBJECTS_PER_PAGE) {
    addIssue(
      state,
      PdfIssueType.UNUSUAL_STRUCTURE,
      'medium',
      `Unusually many objects for the page count (${objectCount} objects, ${state.pageCount} pages)`,
      { object_count: objectCount, page_count: state.pageCount }
    );
  }

  inspectCatalog(doc, state);

  const scan = scanPageResources(doc);
  state.fonts = scan.fonts;
  state.fontPages = scan.pages;
  state.imagePages = scan.imagePages;

  // Strings of an encrypted document are ciphertext
  if (!state.isEncrypted) {
    readInfoDictionary(doc, state);
  }
}

function addFontIssues(state: AnalysisState, primary: EncodingType): void {
  for (const font of state.fonts) {
    if (!isMissingFont(font)) continue;
    addIssue(
      state,
      PdfIssueType.MISSING_FONTS,
      'medium',
      `Font "${font.name}" (${font.type}) is not embedded`,
      { font: font.name, font_type: font.type },
      state.fontPages.get(fontKey(font)) ?? []
    );
  }

  const knownEncodings = new Set(
    state.fonts
      .map((font) => font.encoding)
      .filter((encoding) => encoding !== EncodingType.UNKNOWN && encoding !== EncodingType.CUSTOM)
  );
  if (knownEncodings.size > 1) {
    const encodings = [...knownEncodings].sort();
    addIssue(
      state,
      PdfIssueType.MIXED_ENCODINGS,
      'low',
      `Fonts use ${encodings.length} different encodings`,
      { encodings: encodings.join(', ') }
    );
  }

  const identityFonts = state.fonts.filter((font) => font.encoding === EncodingType.IDENTITY_H);
  if (identityFonts.length > 0 || UNMARKED_UTF16.has(primary)) {
    addIssue(
      state,
      PdfIssueType.UTF16_ENCODING,
      'low',
      identityFonts.length > 0
        ? `${identityFonts.length} font(s) use Identity-H (two-byte) encoding`
        : 'Text strings are UTF-16 without a byte order mark',
      { identity_fonts: identityFonts.length, primary_encoding: primary }
    );
  }
}

function encodingSample(state: AnalysisState, extractionText: string | null): Uint8Array {
  let longest: Uint8Array | undefined;
  for (const bytes of state.textStrings) {
    if (!longest || bytes.length > longest.length) longest = bytes;
  }
  if (longest && longest.length > 0) return longest;
  return new TextEncoder().encode(extractionText ?? '');
}

/**
 * Analyze one PDF. Never throws for malformed input.
 *
 * @param extractionText - Extracted text, or null when extraction failed
 */
export async function analyzePdf(
  bytes: Uint8Array,
  extractionText: string | null,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const state: AnalysisState = {
    issues: [],
    fonts: [],
    fontPages: new Map(),
    imagePages: [],
    metadata: {},
    textStrings: [],
    pageCount: 0,
    isEncrypted: false,
    isDamaged: false,
  };

  const fileSize = options.fileSize ?? bytes.length;
  if (fileSize > LARGE_FILE_BYTES) {
    addIssue(state, PdfIssueType.LARGE_SIZE, 'low', `File is ${Math.round(fileSize / 1048576)} MiB`, {
      filesize: fileSize,
    });
  }

  if (!hasPdfHeader(bytes)) {
    markDamaged(state, 'File does not start with a %PDF- header');
  } else {
    let doc: PDFDocument | null = null;
    try {
      doc = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
    } catch (error) {
      markDamaged(state, 'PDF structure could not be parsed', error);
    }

    if (doc) {
      try {
        inspectDocument(doc, state);
      } catch (error) {
        markDamaged(state, 'PDF object graph is inconsistent', error);
      }
    }
  }

  const encoding = analyzeEncoding(encodingSample(state, extractionText));
  addFontIssues(state, encoding.primary);

  if (extractionText !== null && extractionText.includes('\uFFFD')) {
    addIssue(
      state,
      PdfIssueType.ENCODING_ISSUE,
      'medium',
      'Extracted text contains replacement characters (undecodable glyphs)'
    );
  }

  if (extractionText !== null && extractionText.trim() === '' && state.imagePages.length > 0) {
    addIssue(
      state,
      PdfIssueType.SCANNED_IMAGE,
      'medium',
      'Pages carry images but no extractable text; likely scanned without a text layer',
      {},
      state.imagePages
    );
  }

  state.metadata.page_count = String(state.pageCount);

  const encodingTypes = new Set<EncodingType>([encoding.primary]);
  for (const font of state.fonts) encodingTypes.add(font.encoding);

  return {
    encoding_attempts: encoding.attempts,
    encoding_types: [...encodingTypes].sort(),
    fonts: state.fonts,
    issues: state.issues,
    metadata: state.metadata,
    page_count: state.pageCount,
    is_encrypted: state.isEncrypted,
    is_damaged: state.isDamaged,
  };
}

/**
 * Load a file's bytes for analysis.
 *
 * @throws AnalysisError READ_FAILED when the file cannot be read
 */
export async function readPdfBytes(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (error) {
    throw new AnalysisError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'READ_FAILED',
      error
    );
  }
}

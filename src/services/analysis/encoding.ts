/**
 * Text encoding detection
 *
 * Byte-level heuristics produce one detection with a confidence. When the
 * confidence is below ENCODING_CONFIDENCE_THRESHOLD (or there is nothing to
 * detect), a fixed list of encodings is tried with strict decoders, in
 * order, until one decodes the sample.
 *
 * @module services/analysis/encoding
 */

import { EncodingType } from '../../models/analysis.js';
import type { EncodingAttempt } from '../../models/analysis.js';

export const ENCODING_CONFIDENCE_THRESHOLD = 0.7;

/** Order matters: attempts are recorded exactly in this order */
export const FALLBACK_ENCODINGS = ['utf-8', 'utf-16le', 'latin1', 'windows-1252', 'iso-8859-1'] as const;

type FallbackEncoding = (typeof FALLBACK_ENCODINGS)[number];

const FALLBACK_TYPES: Record<FallbackEncoding, EncodingType> = {
  'utf-8': EncodingType.UTF8,
  'utf-16le': EncodingType.UTF16LE,
  latin1: EncodingType.LATIN1,
  'windows-1252': EncodingType.WINANSI,
  'iso-8859-1': EncodingType.LATIN1,
};

/** Bytes inspected for the UTF-16 null pattern */
const UTF16_SAMPLE_SIZE = 100;

export interface EncodingDetection {
  encoding: string;
  confidence: number;
  type: EncodingType;
}

export interface EncodingAnalysis {
  attempts: EncodingAttempt[];
  /** Encoding the sample was finally read as; UNKNOWN if nothing decoded it */
  primary: EncodingType;
}

function isStrictUtf8(sample: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(sample);
    return true;
  } catch {
    return false;
  }
}

function checkUtf16Pattern(sample: Uint8Array): EncodingDetection | null {
  if (sample.length < 4) return null;

  const size = Math.min(UTF16_SAMPLE_SIZE, sample.length);
  let evenNulls = 0;
  let oddNulls = 0;
  for (let i = 0; i < size; i++) {
    if (sample[i] !== 0) continue;
    if (i % 2 === 0) evenNulls++;
    else oddNulls++;
  }

  if (evenNulls / Math.ceil(size / 2) > ENCODING_CONFIDENCE_THRESHOLD) {
    return { encoding: 'UTF-16BE', confidence: 0.9, type: EncodingType.UTF16BE };
  }
  if (oddNulls / Math.floor(size / 2) > ENCODING_CONFIDENCE_THRESHOLD) {
    return { encoding: 'UTF-16LE', confidence: 0.9, type: EncodingType.UTF16LE };
  }
  return null;
}

/**
 * Best single guess for the sample's encoding. Null for an empty sample.
 */
export function detectEncoding(sample: Uint8Array): EncodingDetection | null {
  if (sample.length === 0) return null;

  if (sample.length >= 2 && sample[0] === 0xfe && sample[1] === 0xff) {
    return { encoding: 'UTF-16BE', confidence: 1.0, type: EncodingType.UTF16BE_WITH_BOM };
  }
  if (sample.length >= 2 && sample[0] === 0xff && sample[1] === 0xfe) {
    return { encoding: 'UTF-16LE', confidence: 1.0, type: EncodingType.UTF16LE_WITH_BOM };
  }
  if (sample.length >= 3 && sample[0] === 0xef && sample[1] === 0xbb && sample[2] === 0xbf) {
    return { encoding: 'UTF-8', confidence: 1.0, type: EncodingType.UTF8_WITH_BOM };
  }

  const utf16 = checkUtf16Pattern(sample);
  if (utf16) return utf16;

  if (sample.every((byte) => byte < 0x80)) {
    return { encoding: 'ascii', confidence: 1.0, type: EncodingType.ASCII };
  }

  if (isStrictUtf8(sample)) {
    return { encoding: 'utf-8', confidence: 0.9, type: EncodingType.UTF8 };
  }

  return { encoding: 'ISO-8859-1', confidence: 0.4, type: EncodingType.LATIN1 };
}

/**
 * Detect, then fall back if the detection is not trusted.
 * Deterministic: the same sample always yields the same attempts.
 */
export function analyzeEncoding(sample: Uint8Array): EncodingAnalysis {
  const attempts: EncodingAttempt[] = [];

  const detection = detectEncoding(sample);
  if (detection) {
    const trusted = detection.confidence >= ENCODING_CONFIDENCE_THRESHOLD;
    attempts.push({
      encoding: detection.encoding,
      confidence: detection.confidence,
      success: trusted,
    });
    if (trusted) {
      return { attempts, primary: detection.type };
    }
  }

  for (const encoding of FALLBACK_ENCODINGS) {
    try {
      new TextDecoder(encoding, { fatal: true }).decode(sample);
    } catch {
      attempts.push({ encoding, confidence: null, success: false });
      continue;
    }
    attempts.push({ encoding, confidence: null, success: true });
    return { attempts, primary: FALLBACK_TYPES[encoding] };
  }

  return { attempts, primary: EncodingType.UNKNOWN };
}

export { ExtractionError } from './errors.js';
export type { ExtractionErrorKind } from './errors.js';
export { ExtractionResponseSchema, buildExtractionRequest } from './extractor.js';
export type {
  ExtractionOptions,
  ExtractionOutput,
  ExtractionRequest,
  PdfSource,
  TextExtractor,
} from './extractor.js';
export { SubprocessExtractor, DEFAULT_EXTRACTION_TIMEOUT_MS } from './subprocess.js';
export type { SubprocessExtractorOptions } from './subprocess.js';

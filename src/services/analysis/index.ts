export { analyzePdf, readPdfBytes, AnalysisError, LARGE_FILE_BYTES, UNUSUAL_OBJECTS_PER_PAGE } from './analyzer.js';
export type { AnalyzeOptions } from './analyzer.js';
export {
  analyzeEncoding,
  detectEncoding,
  ENCODING_CONFIDENCE_THRESHOLD,
  FALLBACK_ENCODINGS,
} from './encoding.js';
export type { EncodingAnalysis, EncodingDetection } from './encoding.js';
export { scanPageResources, describeFont, isMissingFont } from './fonts.js';
export type { FontScan } from './fonts.js';
export { assessAcceptance, ACCEPTED_REASON } from './acceptance.js';

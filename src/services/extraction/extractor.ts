/**
 * TextExtractor contract and wire format
 *
 * @module services/extraction/extractor
 */

import { z } from 'zod';

/**
 * What to extract from. Paths are preferred: the worker reads the file itself
 * and large documents never cross the pipe.
 */
export type PdfSource = { path: string } | { bytes: Uint8Array };

export interface ExtractionOptions {
  password?: string;
  /** Stop after this many pages */
  maxPages?: number;
  /** Kills the worker when aborted; never sent on the wire */
  signal?: AbortSignal;
}

export interface ExtractionOutput {
  text: string;
  warnings: string[];
}

export interface TextExtractor {
  /**
   * @throws ExtractionError
   */
  extract(source: PdfSource, options?: ExtractionOptions): Promise<ExtractionOutput>;
}

/**
 * One request line on the worker's stdin
 */
export interface ExtractionRequest {
  pdf_path_or_bytes: string | { base64: string };
  options: { password?: string; max_pages?: number };
}

/**
 * One response line on the worker's stdout
 */
export const ExtractionResponseSchema = z.object({
  text: z.string(),
  warnings: z.array(z.string()).default([]),
  error: z.string().nullable().default(null),
});

export function buildExtractionRequest(
  source: PdfSource,
  options: ExtractionOptions = {}
): ExtractionRequest {
  const wireOptions: ExtractionRequest['options'] = {};
  if (options.password !== undefined) wireOptions.password = options.password;
  if (options.maxPages !== undefined) wireOptions.max_pages = options.maxPages;

  return {
    pdf_path_or_bytes:
      'path' in source ? source.path : { base64: Buffer.from(source.bytes).toString('base64') },
    options: wireOptions,
  };
}

/**
 * Token-window chunker
 *
 * Splits text into overlapping windows of `size` tokens, each sharing
 * `overlap` tokens with its predecessor. Chunk text is sliced verbatim from
 * the source between the first and last token of the window, so offsets map
 * straight back into the extracted text.
 *
 * @module services/chunking/chunker
 */

import { ConfigError } from '../../config.js';
import type { ChunkResult } from '../../models/chunk.js';

export interface Token {
  start: number;
  end: number;
}

/**
 * Splits text into tokens with character offsets. Must be deterministic.
 */
export interface Tokenizer {
  tokenize(text: string): Token[];
}

/**
 * Whitespace-delimited words; punctuation stays attached to its word.
 */
export const wordTokenizer: Tokenizer = {
  tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    for (const match of text.matchAll(/\S+/g)) {
      const start = match.index ?? 0;
      tokens.push({ start, end: start + match[0].length });
    }
    return tokens;
  },
};

/**
 * @throws ConfigError when size is not a positive integer or overlap >= size
 */
export function validateChunkParams(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`Chunk size must be a positive integer, got ${size}`, 'chunkSize');
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`Chunk overlap must be a non-negative integer, got ${overlap}`, 'chunkOverlap');
  }
  if (overlap >= size) {
    throw new ConfigError(
      `Chunk overlap (${overlap}) must be smaller than chunk size (${size})`,
      'chunkOverlap'
    );
  }
}

/**
 * Split text into ordered, overlapping token windows.
 * Empty or whitespace-only text yields [].
 *
 * @throws ConfigError on invalid size/overlap (checked before looking at text)
 */
export function chunkText(
  text: string,
  size: number,
  overlap: number,
  tokenizer: Tokenizer = wordTokenizer
): ChunkResult[] {
  validateChunkParams(size, overlap);

  const tokens = tokenizer.tokenize(text);
  if (tokens.length === 0) {
    return [];
  }

  const stride = size - overlap;
  const chunks: ChunkResult[] = [];

  for (let first = 0; ; first += stride) {
    const last = Math.min(first + size, tokens.length) - 1;
    const startOffset = tokens[first].start;
    const endOffset = tokens[last].end;

    chunks.push({
      index: chunks.length,
      text: text.slice(startOffset, endOffset),
      startOffset,
      endOffset,
      tokenCount: last - first + 1,
    });

    if (last === tokens.length - 1) break;
  }

  return chunks;
}

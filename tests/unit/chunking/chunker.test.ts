/**
 * Tests for the token-window chunker
 *
 * @module tests/unit/chunking/chunker
 */

import { describe, it, expect } from 'vitest';
import { chunkText, validateChunkParams, wordTokenizer } from '../../../src/services/chunking/chunker.js';
import type { Tokenizer } from '../../../src/services/chunking/chunker.js';
import { ConfigError } from '../../../src/config.js';

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `word${i}`).join(' ');
}

describe('wordTokenizer', () => {
  it('should return character offsets of whitespace-delimited words', () => {
    expect(wordTokenizer.tokenize('  ab  c\nde ')).toEqual([
      { start: 2, end: 4 },
      { start: 6, end: 7 },
      { start: 8, end: 10 },
    ]);
  });

  it('should keep punctuation attached to its word', () => {
    expect(wordTokenizer.tokenize('Hello, world!')).toEqual([
      { start: 0, end: 6 },
      { start: 7, end: 13 },
    ]);
  });
});

describe('chunkText', () => {
  it('should produce overlapping windows sliced verbatim from the source', () => {
    const chunks = chunkText('a b c d e', 3, 1);

    expect(chunks).toEqual([
      { index: 0, text: 'a b c', startOffset: 0, endOffset: 5, tokenCount: 3 },
      { index: 1, text: 'c d e', startOffset: 4, endOffset: 9, tokenCount: 3 },
    ]);
  });

  it('should preserve original whitespace inside a chunk', () => {
    const chunks = chunkText('one\n\ntwo   three', 10, 0);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe('one\n\ntwo   three');
  });

  it('should return identical output for identical input', () => {
    const text = words(250);

    const first = chunkText(text, 100, 10);
    const second = chunkText(text, 100, 10);

    expect(second).toEqual(first);
    expect(first.map((c) => c.tokenCount)).toEqual([100, 100, 70]);
  });

  it('should start each window overlap tokens before the previous one ended', () => {
    const chunks = chunkText(words(250), 100, 10);

    expect(chunks[1].text.startsWith('word90 ')).toBe(true);
    expect(chunks[2].text.startsWith('word180 ')).toBe(true);
    expect(chunks[2].text.endsWith('word249')).toBe(true);
  });

  it('should emit a single chunk when the text fits exactly', () => {
    const chunks = chunkText(words(5), 5, 1);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].tokenCount).toBe(5);
  });

  it('should map offsets back into the source text', () => {
    const text = '  leading and trailing  ';
    const [chunk] = chunkText(text, 10, 0);

    expect(text.slice(chunk.startOffset, chunk.endOffset)).toBe(chunk.text);
    expect(chunk.startOffset).toBe(2);
    expect(chunk.endOffset).toBe(22);
  });

  it('should return no chunks for empty or whitespace-only text', () => {
    expect(chunkText('', 10, 2)).toEqual([]);
    expect(chunkText(' \n\t ', 10, 2)).toEqual([]);
  });

  it('should use a custom tokenizer when given one', () => {
    const chars: Tokenizer = {
      tokenize: (text) => [...text].map((_, i) => ({ start: i, end: i + 1 })),
    };

    const chunks = chunkText('abcdef', 4, 2, chars);

    expect(chunks.map((c) => c.text)).toEqual(['abcd', 'cdef']);
  });

  it('should validate parameters before looking at the text', () => {
    expect(() => chunkText('', 10, 10)).toThrow(ConfigError);
  });
});

describe('validateChunkParams', () => {
  it('should accept overlap smaller than size', () => {
    expect(() => validateChunkParams(100, 99)).not.toThrow();
    expect(() => validateChunkParams(1, 0)).not.toThrow();
  });

  it('should reject a non-positive or fractional size', () => {
    expect(() => validateChunkParams(0, 0)).toThrow('Chunk size must be a positive integer, got 0');
    expect(() => validateChunkParams(2.5, 0)).toThrow(ConfigError);
  });

  it('should reject negative overlap', () => {
    expect(() => validateChunkParams(10, -1)).toThrow('Chunk overlap must be a non-negative integer, got -1');
  });

  it('should reject overlap equal to or larger than size and name the field', () => {
    try {
      validateChunkParams(10, 10);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.field).toBe('chunkOverlap');
        expect(error.message).toBe('Chunk overlap (10) must be smaller than chunk size (10)');
      }
    }
  });
});

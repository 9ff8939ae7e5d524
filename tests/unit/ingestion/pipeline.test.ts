/**
 * Tests for the per-file pipeline
 *
 * @module tests/unit/ingestion/pipeline
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'fs';
import {
  FileRejectedError,
  NO_TEXT_REASON,
  processFile,
} from '../../../src/services/ingestion/pipeline.js';
import type { PipelineDeps } from '../../../src/services/ingestion/pipeline.js';
import { describeFile } from '../../../src/services/ingestion/discovery.js';
import { ExtractionError } from '../../../src/services/extraction/errors.js';
import { pointId } from '../../../src/services/vector-store/types.js';
import { FakeEmbedder, FakeExtractor, MemoryVectorStore, defaultText } from '../../helpers/fakes.js';
import { buildEncryptedPdf, buildTextPdf } from '../../helpers/pdf.js';
import { cleanupTestDir, createTestDir, writeFixture } from '../../helpers/temp.js';

const COLLECTION = 'docs';
const ctx = { runId: 'run-pipeline', collection: COLLECTION };

describe('processFile', () => {
  let dir: string;
  let store: MemoryVectorStore;
  let embedder: FakeEmbedder;

  function deps(extractor: FakeExtractor = new FakeExtractor()): PipelineDeps {
    return { extractor, embedder, store, chunkSize: 5, chunkOverlap: 1 };
  }

  beforeEach(async () => {
    dir = createTestDir('orch');
    store = new MemoryVectorStore();
    embedder = new FakeEmbedder();
    await store.ensureCollection(COLLECTION, embedder.dimension);
  });

  afterEach(() => {
    cleanupTestDir(dir);
  });

  it('should store one point per chunk with metadata', async () => {
    const file = await describeFile(writeFixture(dir, 'clean.pdf', await buildTextPdf(['Hello', 'World'])));

    const result = await processFile(file, ctx, deps());

    // 12 words, 5 per chunk, stride 4: [0-4] [4-8] [8-11]
    expect(result.status).toBe('success');
    expect(result.error_message).toBeNull();
    expect(result.chunks_stored).toBe(3);
    expect(result.analysis?.page_count).toBe(2);

    const points = store.pointsFor(COLLECTION, file.file_path).sort((a, b) => a.metadata.chunk_index - b.metadata.chunk_index);
    expect(points.map((p) => p.id)).toEqual([0, 1, 2].map((i) => pointId(file.file_fingerprint, i)));
    expect(points[1].metadata).toMatchObject({
      file_fingerprint: file.file_fingerprint,
      chunk_index: 1,
      total_chunks: 3,
      run_id: 'run-pipeline',
      text: 'clean.pdf-w4 clean.pdf-w5 clean.pdf-w6 clean.pdf-w7 clean.pdf-w8',
    });
    const text = defaultText('clean.pdf');
    expect(text.slice(points[2].metadata.start_offset, points[2].metadata.end_offset)).toBe(points[2].metadata.text);
  });

  it('should reject an encrypted document after analysis', async () => {
    const file = await describeFile(writeFixture(dir, 'locked.pdf', await buildEncryptedPdf()));

    const result = await processFile(file, ctx, deps());

    expect(result.status).toBe('error');
    expect(result.error_message).toBe('FileRejectedError[REJECTED]: PDF is encrypted');
    expect(result.analysis?.is_encrypted).toBe(true);
    expect(await store.count(COLLECTION)).toBe(0);
  });

  it('should keep the analysis when extraction fails', async () => {
    const file = await describeFile(writeFixture(dir, 'slow.pdf', await buildTextPdf()));
    const extractor = new FakeExtractor(() => {
      throw new ExtractionError('Extraction of slow.pdf failed: worker exceeded 50ms', 'TIMEOUT');
    });

    const result = await processFile(file, ctx, deps(extractor));

    expect(result.status).toBe('error');
    expect(result.error_message).toBe('ExtractionError[TIMEOUT]: Extraction of slow.pdf failed: worker exceeded 50ms');
    expect(result.analysis?.page_count).toBe(1);
  });

  it('should skip a document without text', async () => {
    const file = await describeFile(writeFixture(dir, 'blank.pdf', await buildTextPdf()));

    const result = await processFile(file, ctx, deps(new FakeExtractor(() => ({ text: '  \n ', warnings: [] }))));

    expect(result).toMatchObject({ status: 'skipped', error_message: NO_TEXT_REASON, chunks_stored: 0 });
  });

  it('should store nothing when embedding fails', async () => {
    const file = await describeFile(writeFixture(dir, 'oom.pdf', await buildTextPdf()));
    embedder = new FakeEmbedder({ failOn: 'oom.pdf-w11' });

    const result = await processFile(file, ctx, deps());

    expect(result.status).toBe('error');
    expect(result.error_message).toBe('EmbeddingError[EMBEDDING_FAILED]: Backend ran out of memory');
    expect(await store.count(COLLECTION)).toBe(0);
  });

  it('should store nothing once the hard stop fired', async () => {
    const file = await describeFile(writeFixture(dir, 'late.pdf', await buildTextPdf()));
    const hardStop = new AbortController();
    hardStop.abort();

    const result = await processFile(file, { ...ctx, hardStop: hardStop.signal }, deps());

    expect(result.status).toBe('error');
    expect(result.error_message).toBe(`FileCancelledError[CANCELLED]: Run cancelled before ${file.file_path} was stored`);
    expect(await store.count(COLLECTION)).toBe(0);
  });

  it('should replace the points of a previous version of the file', async () => {
    const path = writeFixture(dir, 'report.pdf', await buildTextPdf(['First draft']));
    const first = await describeFile(path);
    await processFile(first, ctx, deps(new FakeExtractor(() => ({ text: defaultText('v1', 20), warnings: [] }))));
    expect(store.pointsFor(COLLECTION, path)).toHaveLength(5);

    writeFixture(dir, 'report.pdf', await buildTextPdf(['Second draft']));
    const second = await describeFile(path);
    const result = await processFile(second, ctx, deps());

    expect(result.chunks_stored).toBe(3);
    expect(store.pointsFor(COLLECTION, path).every((p) => p.metadata.file_fingerprint === second.file_fingerprint)).toBe(true);
    expect(await store.count(COLLECTION)).toBe(3);
  });

  it('should report a file that vanished before processing', async () => {
    const path = writeFixture(dir, 'gone.pdf', await buildTextPdf());
    const file = await describeFile(path);
    rmSync(path);

    const result = await processFile(file, ctx, deps());

    expect(result.status).toBe('error');
    expect(result.analysis).toBeNull();
    expect(result.error_message).toBe(
      `AnalysisError[READ_FAILED]: Cannot read ${path}: ENOENT: no such file or directory, open '${path}'`
    );
  });

  it('should expose rejection reasons as FileRejectedError', () => {
    const error = new FileRejectedError('PDF has no pages');

    expect(error.code).toBe('REJECTED');
    expect(error.message).toBe('PDF has no pages');
  });
});

/**
 * Tests for the process-isolated extraction channel
 *
 * Worker stand-ins speak the same one-line JSON protocol as
 * python/extract_worker.py.
 *
 * @module tests/unit/extraction/subprocess
 */

import { describe, it, expect } from 'vitest';
import { SubprocessExtractor, DEFAULT_EXTRACTION_TIMEOUT_MS } from '../../../src/services/extraction/subprocess.js';
import { ExtractionError } from '../../../src/services/extraction/errors.js';
import { buildExtractionRequest } from '../../../src/services/extraction/extractor.js';
import { NODE_INTERPRETER, workerPath } from '../../helpers/workers.js';
import type { WorkerFixture } from '../../helpers/workers.js';

function extractor(worker: WorkerFixture, timeoutMs = 10_000): SubprocessExtractor {
  return new SubprocessExtractor({ ...NODE_INTERPRETER, workerPath: workerPath(worker), timeoutMs });
}

async function extractionFailure(run: Promise<unknown>): Promise<ExtractionError> {
  try {
    await run;
  } catch (error) {
    if (error instanceof ExtractionError) return error;
    throw error;
  }
  throw new Error('Expected extraction to fail');
}

describe('buildExtractionRequest', () => {
  it('should pass paths through and base64-encode bytes', () => {
    expect(buildExtractionRequest({ path: '/docs/a.pdf' })).toEqual({
      pdf_path_or_bytes: '/docs/a.pdf',
      options: {},
    });
    expect(buildExtractionRequest({ bytes: Uint8Array.of(1, 2, 3) }, { maxPages: 5, password: 'test-secret' })).toEqual({
      pdf_path_or_bytes: { base64: 'AQID' },
      options: { password: 'test-secret', max_pages: 5 },
    });
  });
});

describe('SubprocessExtractor', () => {
  it('should default the timeout', () => {
    expect(new SubprocessExtractor().timeoutMs).toBe(DEFAULT_EXTRACTION_TIMEOUT_MS);
  });

  it('should return text and warnings for a path', async () => {
    await expect(extractor('echo-extract-worker').extract({ path: '/docs/a.pdf' })).resolves.toEqual({
      text: 'path:/docs/a.pdf',
      warnings: [],
    });
  });

  it('should send raw bytes across the pipe', async () => {
    const result = await extractor('echo-extract-worker').extract({ bytes: new Uint8Array(10) });

    expect(result.text).toBe('bytes:10');
  });

  it('should forward options to the worker', async () => {
    const result = await extractor('echo-extract-worker').extract(
      { path: '/docs/a.pdf' },
      { maxPages: 2, password: 'test-secret' }
    );

    expect(result.warnings).toEqual(['stopped after 2 page(s)', 'password supplied']);
  });

  it('should kill a hanging worker and report TIMEOUT', async () => {
    const error = await extractionFailure(extractor('hang-worker', 300).extract({ path: '/docs/slow.pdf' }));

    expect(error.code).toBe('TIMEOUT');
    expect(error.kind).toBe('TIMEOUT');
    expect(error.message).toBe('Extraction of /docs/slow.pdf failed: Extraction worker exceeded 300ms and was terminated');
  });

  it('should turn a crash into WORKER_FAILURE carrying stderr', async () => {
    const error = await extractionFailure(extractor('crash-worker').extract({ path: '/docs/bad.pdf' }));

    expect(error.code).toBe('WORKER_FAILURE');
    expect(error.detail).toContain('fatal: cannot parse xref table');
  });

  it('should treat a worker without a JSON answer as WORKER_FAILURE', async () => {
    const error = await extractionFailure(extractor('garbage-worker').extract({ path: '/docs/a.pdf' }));

    expect(error.code).toBe('WORKER_FAILURE');
  });

  it('should surface a worker-reported error', async () => {
    const error = await extractionFailure(extractor('error-worker').extract({ path: '/docs/locked.pdf' }));

    expect(error.code).toBe('WORKER_FAILURE');
    expect(error.detail).toBe('password required');
    expect(error.message).toBe('Extraction of /docs/locked.pdf failed: password required');
  });

  it('should stop a running extraction when its signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const error = await extractionFailure(
      extractor('hang-worker').extract({ path: '/docs/slow.pdf' }, { signal: controller.signal })
    );

    expect(error.code).toBe('ABORTED');
    expect(error.message).toBe('Extraction of /docs/slow.pdf failed: Extraction worker was cancelled and terminated');
  });

  it('should reject a response of the wrong shape', async () => {
    const error = await extractionFailure(extractor('malformed-worker').extract({ path: '/docs/a.pdf' }));

    expect(error.code).toBe('WORKER_FAILURE');
    expect(error.message).toBe('Extraction of /docs/a.pdf returned a malformed response: Required');
  });
});

/**
 * Tests for input discovery and fingerprinting
 *
 * @module tests/unit/ingestion/discovery
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, statSync, symlinkSync } from 'fs';
import { join } from 'path';
import { describeFile, listInputFiles } from '../../../src/services/ingestion/discovery.js';
import { IngestionError } from '../../../src/services/ingestion/errors.js';
import { computeHash } from '../../../src/utils/hash.js';
import { cleanupTestDir, createTestDir, writeFixture } from '../../helpers/temp.js';

describe('listInputFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestDir('discovery');
    writeFixture(dir, 'a.pdf', 'a');
    writeFixture(dir, 'B.PDF', 'b');
    writeFixture(dir, 'notes.txt', 'not a pdf');
    mkdirSync(join(dir, 'sub'));
    writeFixture(join(dir, 'sub'), 'c.pdf', 'c');
  });

  afterEach(() => {
    cleanupTestDir(dir);
  });

  it('should recurse, match the extension case-insensitively and sort', () => {
    expect(listInputFiles([dir])).toEqual([join(dir, 'B.PDF'), join(dir, 'a.pdf'), join(dir, 'sub', 'c.pdf')]);
  });

  it('should skip symlinks inside directories', () => {
    symlinkSync(join(dir, 'a.pdf'), join(dir, 'link.pdf'));

    expect(listInputFiles([dir])).not.toContain(join(dir, 'link.pdf'));
    expect(listInputFiles([dir])).toHaveLength(3);
  });

  it('should take an explicitly named file whatever its extension', () => {
    expect(listInputFiles([join(dir, 'notes.txt')])).toEqual([join(dir, 'notes.txt')]);
  });

  it('should list each file once, in input order', () => {
    const files = listInputFiles([join(dir, 'sub', 'c.pdf'), dir]);

    expect(files).toEqual([join(dir, 'sub', 'c.pdf'), join(dir, 'B.PDF'), join(dir, 'a.pdf')]);
  });

  it('should fail on a missing path', () => {
    const missing = join(dir, 'missing');
    let caught: unknown;
    try {
      listInputFiles([dir, missing]);
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof IngestionError)) throw new Error('Expected an IngestionError');
    expect(caught.category).toBe('PATH_NOT_FOUND');
    expect(caught.message).toBe(`Path not found: ${missing}`);
  });

  it('should return nothing for an empty directory', () => {
    mkdirSync(join(dir, 'empty'));

    expect(listInputFiles([join(dir, 'empty')])).toEqual([]);
  });
});

describe('describeFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestDir('discovery');
  });

  afterEach(() => {
    cleanupTestDir(dir);
  });

  it('should fingerprint content and record size and mtime', async () => {
    const file = writeFixture(dir, 'doc.pdf', 'hello');

    const described = await describeFile(file);

    expect(described).toEqual({
      file_path: file,
      file_fingerprint: computeHash('hello'),
      file_mtime: statSync(file).mtime.toISOString(),
      filesize: 5,
    });
  });
});

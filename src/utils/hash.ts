/**
 * SHA-256 content fingerprints
 *
 * Fingerprints use the format 'sha256:' + 64-character lowercase hex string
 * and depend on file content only, so a renamed or touched file keeps its
 * fingerprint.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

const HASH_PREFIX = 'sha256:';

const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Uint8Array): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Compute SHA-256 hash of a file by streaming it.
 *
 * @throws Error if the path is not absolute, missing, unreadable or not a file
 */
export async function hashFile(filePath: string): Promise<string> {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  const stats = await fs.promises.stat(filePath).catch((error: NodeJS.ErrnoException) => {
    if (error.code === 'ENOENT') throw new Error(`File not found: ${filePath}`);
    throw new Error(`Cannot access file: ${filePath} - ${error.message}`);
  });
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });

    stream.on('error', (error: NodeJS.ErrnoException) => {
      stream.destroy();
      if (error.code === 'EACCES') {
        reject(new Error(`Permission denied: ${filePath}`));
      } else {
        reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
      }
    });
  });
}

export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}

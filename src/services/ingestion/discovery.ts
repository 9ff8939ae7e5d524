/**
 * Input discovery: expand paths into fingerprinted PDF candidates
 *
 * @module services/ingestion/discovery
 */

import { existsSync, lstatSync, readdirSync, statSync } from 'fs';
import { extname, resolve } from 'path';
import { hashFile } from '../../utils/hash.js';
import { pathNotFoundError } from './errors.js';

export const SUPPORTED_EXTENSIONS = ['pdf'] as const;

export interface DiscoveredFile {
  /** Absolute path */
  file_path: string;
  file_fingerprint: string;
  /** ISO 8601, null when the file could not be read */
  file_mtime: string | null;
  filesize: number;
}

function isSupported(name: string): boolean {
  const ext = extname(name).slice(1).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

function collectFiles(dirPath: string): string[] {
  const files: string[] = [];
  const entries = readdirSync(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = resolve(dirPath, entry.name);

    try {
      if (lstatSync(fullPath).isSymbolicLink()) {
        console.error(`[WARN] Skipping symlink during discovery: ${fullPath}`);
        continue;
      }
    } catch (error) {
      console.error(
        `[WARN] Could not stat entry, skipping: ${fullPath}:`,
        error instanceof Error ? error.message : String(error)
      );
      continue;
    }

    if (entry.isDirectory()) {
      files.push(...collectFiles(fullPath));
    } else if (entry.isFile() && isSupported(entry.name)) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Expand files and directories (recursively) into absolute PDF paths.
 * An explicitly named file is taken as-is, whatever its extension.
 * Order is stable: inputs in the given order, directory entries sorted.
 *
 * @throws IngestionError PATH_NOT_FOUND for the first path that does not exist
 */
export function listInputFiles(paths: readonly string[]): string[] {
  const seen = new Set<string>();
  const files: string[] = [];

  for (const input of paths) {
    const absolute = resolve(input);
    if (!existsSync(absolute)) {
      throw pathNotFoundError(absolute);
    }

    const found = statSync(absolute).isDirectory() ? collectFiles(absolute).sort() : [absolute];
    for (const file of found) {
      if (seen.has(file)) continue;
      seen.add(file);
      files.push(file);
    }
  }

  return files;
}

/**
 * Fingerprint one file: content hash, modification time, size
 */
export async function describeFile(filePath: string): Promise<DiscoveredFile> {
  const stats = statSync(filePath);
  const fingerprint = await hashFile(filePath);
  return {
    file_path: filePath,
    file_fingerprint: fingerprint,
    file_mtime: stats.mtime.toISOString(),
    filesize: stats.size,
  };
}

/**
 * docmirror - File Discovery
 *
 * Walks a mapping root and yields the document files eligible for upload.
 * Every real directory is descended into, hidden ones included. The walk
 * is lazy and keeps no state between calls, so every run sees the directory
 * as it is now.
 */

import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';

import { ScanError } from '../core/errors.js';

// ============================================================================
// Eligibility
// ============================================================================

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.pdf',
  '.docx',
  '.txt',
  '.pptx',
  '.xlsx',
]);

export function isSupportedFile(fileName: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * Relative path with POSIX separators, used as the tracking key on every
 * platform.
 */
export function toRelativeKey(root: string, absolutePath: string): string {
  return path.relative(root, absolutePath).split(path.sep).join('/');
}

// ============================================================================
// Walk
// ============================================================================

export interface ScannedFile {
  relativePath: string;
  absolutePath: string;
}

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    // Code-point order keeps the walk identical across runs
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new ScanError(dir, error);
  }
}

async function* walk(dir: string, root: string): AsyncGenerator<ScannedFile> {
  const entries = await readEntries(dir);

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    // Dirent reports symlinks as neither file nor directory, so they fall through
    if (entry.isDirectory()) {
      yield* walk(fullPath, root);
    } else if (entry.isFile() && isSupportedFile(entry.name)) {
      yield { relativePath: toRelativeKey(root, fullPath), absolutePath: fullPath };
    }
  }
}

/**
 * Lazily enumerate eligible files under `root`.
 *
 * Throws ScanError (on iteration) when the root or a subdirectory cannot be
 * read.
 */
export function scanDirectory(root: string): AsyncGenerator<ScannedFile> {
  return walk(path.resolve(root), path.resolve(root));
}

export async function collectFiles(root: string): Promise<ScannedFile[]> {
  const files: ScannedFile[] = [];
  for await (const file of scanDirectory(root)) {
    files.push(file);
  }
  return files;
}

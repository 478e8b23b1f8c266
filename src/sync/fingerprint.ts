/**
 * docmirror - File Fingerprints
 *
 * Two tiers: a cheap size + mtime stat taken for every scanned file, and an
 * MD5 content hash read only when the stat alone cannot settle whether a
 * tracked file changed.
 */

import { stat } from 'fs/promises';
import { createReadStream } from 'fs';
import { createHash } from 'crypto';

import type { FileRecord, FileStat } from '../core/types.js';
import { FingerprintError } from '../core/errors.js';

export interface Fingerprinter {
  stat(filePath: string): Promise<FileStat>;
  hash(filePath: string): Promise<string>;
}

// ============================================================================
// Hash Decision
// ============================================================================

/**
 * Whether a content hash is needed to classify a scanned file.
 *
 * Untracked files need none (they are uploaded regardless), and a tracked
 * file whose size and mtime both match its record is skipped on the stat
 * alone.
 */
export function needsHash(record: FileRecord | undefined, current: FileStat): boolean {
  if (!record) return false;
  return record.size !== current.size || record.mtime !== current.mtime;
}

// ============================================================================
// File System Implementation
// ============================================================================

export async function statFile(filePath: string): Promise<FileStat> {
  try {
    const info = await stat(filePath);
    return { size: info.size, mtime: info.mtimeMs };
  } catch (error) {
    throw new FingerprintError(filePath, error);
  }
}

export async function computeFileHash(filePath: string): Promise<string> {
  const hash = createHash('md5');
  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (error) {
    throw new FingerprintError(filePath, error);
  }
  return hash.digest('hex');
}

export const fsFingerprinter: Fingerprinter = {
  stat: statFile,
  hash: computeFileHash,
};

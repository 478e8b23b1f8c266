/**
 * Temporary directory and file fixtures
 */

import { mkdtemp, mkdir, rm, writeFile, utimes } from 'fs/promises';
import path from 'path';
import os from 'os';

import type { FileRecord, LocalFile } from '../../src/core/types.js';

export async function makeTempDir(prefix = 'docmirror-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a file (creating parent directories) and optionally pin its mtime.
 */
export async function writeFixture(
  root: string,
  relativePath: string,
  content: string,
  mtimeSeconds?: number
): Promise<string> {
  const fullPath = path.join(root, ...relativePath.split('/'));
  await mkdir(path.dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
  if (mtimeSeconds !== undefined) {
    await utimes(fullPath, mtimeSeconds, mtimeSeconds);
  }
  return fullPath;
}

export function localFile(relativePath: string, overrides: Partial<LocalFile> = {}): LocalFile {
  return {
    relativePath,
    absolutePath: `/docs/${relativePath}`,
    size: 100,
    mtime: 1_700_000_000_000,
    ...overrides,
  };
}

export function fileRecord(remoteId: string, overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    size: 100,
    mtime: 1_700_000_000_000,
    content_hash: 'aaaa',
    remote_id: remoteId,
    last_synced_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * docmirror - Mapping Configuration
 *
 * Builds the list of directory -> remote folder mappings from a mapping file
 * and command-line pairs. Everything is validated here, so the sync core
 * only ever sees absolute roots and non-empty folder ids.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import type { Mapping } from '../core/types.js';
import { ConfigError, describeError } from '../core/errors.js';

// ============================================================================
// Path Expansion
// ============================================================================

export function expandPath(p: string): string {
  if (p === '~' || p.startsWith('~/') || p.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

export function normalizeRoot(p: string): string {
  return path.resolve(expandPath(p));
}

// ============================================================================
// Mapping File
// ============================================================================

// { "<local directory>": "<remote folder id>", ... }
const MappingFileSchema = z.record(z.string().min(1, 'folder id must not be empty'));

export async function loadMappingFile(filePath: string): Promise<Mapping[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(expandPath(filePath), 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to load mapping file ${filePath}: ${describeError(error)}`);
  }

  const parsed = MappingFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ConfigError(`Invalid mapping file ${filePath}${where}: ${issue?.message ?? 'expected an object'}`);
  }

  return Object.entries(parsed.data).map(([localRoot, remoteFolderId]) => ({
    localRoot: normalizeRoot(localRoot),
    remoteFolderId,
  }));
}

// ============================================================================
// Command-line Pairs
// ============================================================================

/**
 * Parse `dir=folderId`. Splits on the last `=` so directory names may
 * contain one.
 */
export function parseMappingPair(pair: string): Mapping {
  const index = pair.lastIndexOf('=');
  const localRoot = index > 0 ? pair.slice(0, index).trim() : '';
  const remoteFolderId = index > 0 ? pair.slice(index + 1).trim() : '';
  if (!localRoot || !remoteFolderId) {
    throw new ConfigError(`Invalid mapping "${pair}": expected <directory>=<folderId>`);
  }
  return { localRoot: normalizeRoot(localRoot), remoteFolderId };
}

// ============================================================================
// Assembly
// ============================================================================

export interface MappingSources {
  mappingFile?: string;
  mappings?: string[];
  directory?: string;
  folderId?: string;
}

/**
 * Combine every mapping source. Later sources override earlier ones for the
 * same root: mapping file, then --mapping pairs, then --directory/--folder-id.
 */
export async function resolveMappings(sources: MappingSources): Promise<Mapping[]> {
  const byRoot = new Map<string, Mapping>();
  const add = (mapping: Mapping) => byRoot.set(mapping.localRoot, mapping);

  if (sources.mappingFile) {
    (await loadMappingFile(sources.mappingFile)).forEach(add);
  }

  for (const pair of sources.mappings ?? []) {
    add(parseMappingPair(pair));
  }

  if (sources.directory || sources.folderId) {
    if (!sources.directory || !sources.folderId) {
      throw new ConfigError('--directory and --folder-id must be given together');
    }
    add({ localRoot: normalizeRoot(sources.directory), remoteFolderId: sources.folderId });
  }

  if (byRoot.size === 0) {
    throw new ConfigError('No folder mappings provided');
  }

  return [...byRoot.values()];
}

/**
 * docmirror - Tracking Store
 *
 * Durable record of what has been synchronized, per mapping root. The file
 * is plain JSON so it can be inspected by hand, and deleting it forces a
 * full re-sync.
 *
 * Loading never aborts a run: a missing file is a first run, and a malformed
 * one is logged and treated as empty. Saving writes a temporary file beside
 * the target and renames it over the old one, so a crash mid-write leaves
 * the previous state intact.
 */

import { readFile, writeFile, mkdir, rename, unlink } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import type { FileRecord, MappingState, TrackingState } from '../core/types.js';
import { TrackingStoreCorruptError, describeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

// ============================================================================
// Persisted Schema
// ============================================================================

const STATE_VERSION = 1;

const FileRecordSchema = z.object({
  size: z.number().int().nonnegative(),
  mtime: z.number(),
  content_hash: z.string().nullable(),
  remote_id: z.string().min(1),
  last_synced_at: z.string(),
});

const MappingStateSchema = z.object({
  files: z.record(FileRecordSchema),
  pending_deletes: z.record(z.string()).default({}),
});

const TrackingFileSchema = z.object({
  version: z.literal(STATE_VERSION),
  mappings: z.record(MappingStateSchema),
});

type TrackingFile = z.infer<typeof TrackingFileSchema>;

// ============================================================================
// Conversion
// ============================================================================

function emptyMappingState(): MappingState {
  return { files: new Map(), pendingDeletes: new Map() };
}

function fromFile(data: TrackingFile): TrackingState {
  const state: TrackingState = new Map();
  for (const [root, mapping] of Object.entries(data.mappings)) {
    state.set(root, {
      files: new Map(Object.entries(mapping.files)),
      pendingDeletes: new Map(Object.entries(mapping.pending_deletes)),
    });
  }
  return state;
}

function toFile(state: TrackingState): TrackingFile {
  const mappings: TrackingFile['mappings'] = {};
  const roots = [...state.keys()].sort();
  for (const root of roots) {
    const mapping = state.get(root);
    if (!mapping) continue;
    const files: Record<string, FileRecord> = {};
    for (const relativePath of [...mapping.files.keys()].sort()) {
      const record = mapping.files.get(relativePath);
      if (record) files[relativePath] = { ...record };
    }
    mappings[root] = {
      files,
      pending_deletes: Object.fromEntries(mapping.pendingDeletes),
    };
  }
  return { version: STATE_VERSION, mappings };
}

// ============================================================================
// Store
// ============================================================================

export class TrackingStore {
  private state: TrackingState = new Map();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<TrackingState> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.info(`[tracking] No tracking state at ${this.filePath}, starting fresh`);
      } else {
        this.logger.warn(new TrackingStoreCorruptError(this.filePath, describeError(error)).message);
      }
      this.state = new Map();
      return this.state;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.warn(new TrackingStoreCorruptError(this.filePath, `invalid JSON: ${describeError(error)}`).message);
      this.state = new Map();
      return this.state;
    }

    const parsed = TrackingFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
      this.logger.warn(new TrackingStoreCorruptError(this.filePath, detail).message);
      this.state = new Map();
      return this.state;
    }

    this.state = fromFile(parsed.data);
    return this.state;
  }

  /**
   * Persist the current state (or the one given, which then becomes current).
   */
  async save(state: TrackingState = this.state): Promise<void> {
    this.state = state;
    const dir = path.dirname(this.filePath);
    await mkdir(dir, { recursive: true });

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(toFile(state), null, 2) + '\n');
    try {
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }

  snapshot(): TrackingState {
    return this.state;
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  get(root: string, relativePath: string): FileRecord | undefined {
    return this.state.get(root)?.files.get(relativePath);
  }

  put(root: string, relativePath: string, record: FileRecord): void {
    this.mapping(root).files.set(relativePath, record);
  }

  remove(root: string, relativePath: string): void {
    this.state.get(root)?.files.delete(relativePath);
  }

  /** Tracked files for a root; empty map when nothing is tracked yet. */
  files(root: string): ReadonlyMap<string, FileRecord> {
    return this.state.get(root)?.files ?? new Map();
  }

  // ==========================================================================
  // Pending Deletes
  // ==========================================================================

  pendingDeletes(root: string): ReadonlyMap<string, string> {
    return this.state.get(root)?.pendingDeletes ?? new Map();
  }

  addPendingDelete(root: string, remoteId: string, relativePath: string): void {
    this.mapping(root).pendingDeletes.set(remoteId, relativePath);
  }

  clearPendingDelete(root: string, remoteId: string): void {
    this.state.get(root)?.pendingDeletes.delete(remoteId);
  }

  /**
   * Forget one mapping root, or every root when none is given.
   * Returns the number of roots removed.
   */
  clear(root?: string): number {
    if (root === undefined) {
      const count = this.state.size;
      this.state.clear();
      return count;
    }
    return this.state.delete(root) ? 1 : 0;
  }

  private mapping(root: string): MappingState {
    let mapping = this.state.get(root);
    if (!mapping) {
      mapping = emptyMappingState();
      this.state.set(root, mapping);
    }
    return mapping;
  }
}

/**
 * docmirror - Sync Orchestrator
 *
 * Drives one mapping end to end:
 *   scan -> fingerprint -> list remote folder -> plan -> execute -> commit
 *
 * Tracking records change only after the remote side confirms an operation.
 * A failed operation leaves its record as it was, so the next run retries
 * it. Entry failures are collected into the SyncResult; only a failure to
 * scan the root or to list the remote folder aborts the mapping.
 */

import type {
  FileRecord,
  LocalFile,
  Mapping,
  OperationPlan,
  PlanEntry,
  SyncFailure,
  SyncResult,
} from '../core/types.js';
import {
  DeleteError,
  RemoteListError,
  ReplaceError,
  ScanError,
  SyncError,
  UploadError,
  describeError,
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { RemoteStorage } from '../remote/types.js';
import { scanDirectory } from './discover.js';
import { fsFingerprinter, needsHash, type Fingerprinter } from './fingerprint.js';
import { planSync, summarizePlan, describeEntry } from './reconcile.js';
import type { TrackingStore } from './tracking-store.js';

// ============================================================================
// Types
// ============================================================================

export interface SyncOrchestratorOptions {
  remote: RemoteStorage;
  store: TrackingStore;
  logger: Logger;
  fingerprinter?: Fingerprinter;
  now?: () => Date;
}

export interface SyncPreview {
  mapping: Mapping;
  plan?: OperationPlan;
  errors: SyncFailure[];
  aborted?: string;
}

interface LocalSnapshot {
  files: Map<string, LocalFile>;
  unreadable: Set<string>;
  errors: SyncFailure[];
}

// Order in which plan entries are executed
const EXECUTION_ORDER: Record<PlanEntry['kind'], number> = {
  delete: 0,
  replace: 1,
  upload: 2,
  skip: 3,
};

function emptyResult(mapping: Mapping): SyncResult {
  return { mapping, uploaded: 0, replaced: 0, deleted: 0, skipped: 0, errors: [] };
}

function toFailure(error: unknown, fallbackPath: string, operation: string): SyncFailure {
  if (error instanceof SyncError) {
    return { path: fallbackPath, operation: error.operation, message: error.message };
  }
  return { path: fallbackPath, operation, message: describeError(error) };
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly remote: RemoteStorage;
  private readonly store: TrackingStore;
  private readonly logger: Logger;
  private readonly fingerprinter: Fingerprinter;
  private readonly now: () => Date;

  constructor(options: SyncOrchestratorOptions) {
    this.remote = options.remote;
    this.store = options.store;
    this.logger = options.logger;
    this.fingerprinter = options.fingerprinter ?? fsFingerprinter;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sync every mapping in turn, persisting the tracking state after each one
   * so a crash loses at most the mapping in progress.
   */
  async runAll(mappings: Mapping[]): Promise<SyncResult[]> {
    await this.store.load();
    const results: SyncResult[] = [];

    for (const mapping of mappings) {
      const result = await this.run(mapping);
      results.push(result);
      await this.store.save();
    }

    return results;
  }

  /**
   * Sync one mapping against the tracking state currently held by the
   * store. The caller persists the store afterwards (runAll does).
   */
  async run(mapping: Mapping): Promise<SyncResult> {
    const result = emptyResult(mapping);
    this.logger.info(`[sync] ${mapping.localRoot} -> folder ${mapping.remoteFolderId}`);

    const prepared = await this.prepare(mapping);
    result.errors.push(...prepared.errors);
    if (!prepared.plan) {
      result.aborted = prepared.aborted;
      this.logger.error(`[sync] Mapping aborted: ${prepared.aborted}`);
      return result;
    }

    await this.execute(mapping, prepared.plan, result);

    this.logger.info(
      `[sync] ${mapping.localRoot}: uploaded ${result.uploaded}, replaced ${result.replaced}, ` +
      `deleted ${result.deleted}, skipped ${result.skipped}, errors ${result.errors.length}`
    );
    return result;
  }

  /**
   * Compute the plan for a mapping without touching the remote folder's
   * contents or the tracking state.
   */
  async preview(mapping: Mapping): Promise<SyncPreview> {
    return this.prepare(mapping);
  }

  // ==========================================================================
  // Planning
  // ==========================================================================

  private async prepare(mapping: Mapping): Promise<SyncPreview> {
    const root = mapping.localRoot;
    const tracked = this.store.files(root);

    let snapshot: LocalSnapshot;
    try {
      snapshot = await this.snapshotLocal(root, tracked);
    } catch (error) {
      if (error instanceof ScanError) {
        return { mapping, errors: [], aborted: error.message };
      }
      throw error;
    }

    let remoteIds: Set<string>;
    try {
      const listing = await this.remote.listFiles(mapping.remoteFolderId);
      remoteIds = new Set(listing.map((f) => f.remoteId));
      this.logger.debug(`[sync] Remote folder ${mapping.remoteFolderId} holds ${remoteIds.size} objects`);
    } catch (error) {
      const listError = new RemoteListError(mapping.remoteFolderId, error);
      return { mapping, errors: snapshot.errors, aborted: listError.message };
    }

    const plan = planSync({
      local: snapshot.files,
      tracked,
      remoteIds,
      unreadable: snapshot.unreadable,
      pendingDeletes: this.store.pendingDeletes(root),
    });

    const summary = summarizePlan(plan);
    this.logger.debug(
      `[sync] Plan: ${summary.upload} upload, ${summary.replace} replace, ${summary.delete} delete, ` +
      `${summary.skip} skip, ${summary.cleanup} cleanup`
    );

    return { mapping, plan, errors: snapshot.errors };
  }

  private async snapshotLocal(
    root: string,
    tracked: ReadonlyMap<string, FileRecord>
  ): Promise<LocalSnapshot> {
    const snapshot: LocalSnapshot = { files: new Map(), unreadable: new Set(), errors: [] };

    for await (const scanned of scanDirectory(root)) {
      try {
        const current = await this.fingerprinter.stat(scanned.absolutePath);
        const file: LocalFile = { ...scanned, ...current };
        if (needsHash(tracked.get(scanned.relativePath), current)) {
          file.contentHash = await this.fingerprinter.hash(scanned.absolutePath);
        }
        snapshot.files.set(scanned.relativePath, file);
      } catch (error) {
        const failure = toFailure(error, scanned.relativePath, 'fingerprint');
        this.logger.error(`[sync] ${failure.message}`);
        snapshot.unreadable.add(scanned.relativePath);
        snapshot.errors.push(failure);
      }
    }

    return snapshot;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private async execute(mapping: Mapping, plan: OperationPlan, result: SyncResult): Promise<void> {
    const root = mapping.localRoot;

    for (const remoteId of plan.resolvedPendingDeletes) {
      this.store.clearPendingDelete(root, remoteId);
    }

    for (const cleanup of plan.cleanups) {
      try {
        await this.remote.delete(cleanup.remoteId);
        this.store.clearPendingDelete(root, cleanup.remoteId);
        this.logger.info(`[sync] Removed superseded remote object ${cleanup.remoteId} (${cleanup.path})`);
      } catch (error) {
        this.recordFailure(result, toFailure(error, cleanup.path, 'cleanup'));
      }
    }

    const ordered = [...plan.entries].sort((a, b) => EXECUTION_ORDER[a.kind] - EXECUTION_ORDER[b.kind]);
    for (const entry of ordered) {
      this.logger.debug(`[sync] ${describeEntry(entry)}`);
      switch (entry.kind) {
        case 'upload':
          await this.executeUpload(mapping, entry.file, result);
          break;
        case 'replace':
          await this.executeReplace(mapping, entry.file, entry.previous, result);
          break;
        case 'delete':
          await this.executeDelete(root, entry.path, entry.previous, result);
          break;
        case 'skip':
          if (entry.refresh) {
            this.store.put(root, entry.path, {
              ...entry.previous,
              size: entry.file.size,
              mtime: entry.file.mtime,
            });
          }
          result.skipped++;
          break;
      }
    }
  }

  /**
   * Hash (when not already known) and upload a file, returning the record to
   * commit. Throws on failure without touching the store.
   */
  private async uploadFile(mapping: Mapping, file: LocalFile): Promise<FileRecord> {
    const contentHash = file.contentHash ?? await this.fingerprinter.hash(file.absolutePath);
    const remoteId = await this.remote.upload(file.absolutePath, mapping.remoteFolderId);
    return {
      size: file.size,
      mtime: file.mtime,
      content_hash: contentHash,
      remote_id: remoteId,
      last_synced_at: this.now().toISOString(),
    };
  }

  private async executeUpload(mapping: Mapping, file: LocalFile, result: SyncResult): Promise<void> {
    try {
      const record = await this.uploadFile(mapping, file);
      this.store.put(mapping.localRoot, file.relativePath, record);
      result.uploaded++;
      this.logger.info(`[sync] Uploaded ${file.relativePath} -> ${record.remote_id}`);
    } catch (error) {
      const wrapped = error instanceof SyncError ? error : new UploadError(file.relativePath, describeError(error));
      this.recordFailure(result, toFailure(wrapped, file.relativePath, 'upload'));
    }
  }

  /**
   * Upload the new version, then delete the old one. Both halves are always
   * attempted and committed independently, except that an upload returning
   * the old id leaves nothing to delete.
   */
  private async executeReplace(
    mapping: Mapping,
    file: LocalFile,
    previous: FileRecord,
    result: SyncResult
  ): Promise<void> {
    const root = mapping.localRoot;
    const failures: string[] = [];

    let uploaded: FileRecord | null = null;
    try {
      uploaded = await this.uploadFile(mapping, file);
    } catch (error) {
      failures.push(describeError(error));
    }

    let deleted = false;
    if (uploaded && uploaded.remote_id === previous.remote_id) {
      // The service overwrote the object in place; deleting it would drop the new version
      deleted = true;
    } else {
      try {
        await this.remote.delete(previous.remote_id);
        deleted = true;
      } catch (error) {
        failures.push(describeError(error));
      }
    }

    if (uploaded) {
      this.store.put(root, file.relativePath, uploaded);
      if (!deleted) {
        this.store.addPendingDelete(root, previous.remote_id, file.relativePath);
      }
    } else if (deleted) {
      // Old object is gone and nothing replaced it: untrack so the next run uploads
      this.store.remove(root, file.relativePath);
    }

    if (failures.length === 0 && uploaded) {
      result.replaced++;
      this.logger.info(`[sync] Replaced ${file.relativePath}: ${previous.remote_id} -> ${uploaded.remote_id}`);
      return;
    }

    this.recordFailure(result, toFailure(new ReplaceError(file.relativePath, failures), file.relativePath, 'replace'));
  }

  private async executeDelete(
    root: string,
    relativePath: string,
    previous: FileRecord,
    result: SyncResult
  ): Promise<void> {
    try {
      await this.remote.delete(previous.remote_id);
      this.store.remove(root, relativePath);
      result.deleted++;
      this.logger.info(`[sync] Deleted ${relativePath} (${previous.remote_id})`);
    } catch (error) {
      const wrapped = error instanceof SyncError ? error : new DeleteError(previous.remote_id, describeError(error));
      this.recordFailure(result, toFailure(wrapped, relativePath, 'delete'));
    }
  }

  private recordFailure(result: SyncResult, failure: SyncFailure): void {
    result.errors.push(failure);
    this.logger.error(`[sync] ${failure.operation} ${failure.path}: ${failure.message}`);
  }
}

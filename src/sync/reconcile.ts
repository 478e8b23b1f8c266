/**
 * docmirror - Reconciliation
 *
 * Decides, for one mapping, what has to happen to each relative path. This
 * is a pure function of the local snapshot, the tracked records and the
 * remote listing: it performs no I/O, so the same inputs always give the
 * same plan.
 *
 * Decision table per path:
 *
 *   local  tracked  remote id listed  fingerprint        -> entry
 *   yes    no       -                 -                  -> upload (new)
 *   yes    yes      no                any                -> upload (missing-remote)
 *   yes    yes      yes               size+mtime equal   -> skip
 *   yes    yes      yes               hash equal         -> skip (refresh)
 *   yes    yes      yes               hash differs       -> replace
 *   no     yes      -                 -                  -> delete
 *
 * Paths that could not be fingerprinted this run get no entry at all.
 */

import type {
  CleanupEntry,
  FileRecord,
  LocalFile,
  OperationPlan,
  PlanEntry,
  PlanEntryKind,
} from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface PlanInput {
  local: ReadonlyMap<string, LocalFile>;
  tracked: ReadonlyMap<string, FileRecord>;
  remoteIds: ReadonlySet<string>;
  /** Paths whose fingerprint failed this run */
  unreadable?: ReadonlySet<string>;
  /** remote id -> path, superseded objects awaiting deletion */
  pendingDeletes?: ReadonlyMap<string, string>;
}

// ============================================================================
// Planning
// ============================================================================

function classify(
  relativePath: string,
  file: LocalFile | undefined,
  record: FileRecord | undefined,
  remoteIds: ReadonlySet<string>
): PlanEntry | null {
  if (file && !record) {
    return { kind: 'upload', path: relativePath, file, reason: 'new' };
  }

  if (!file && record) {
    return { kind: 'delete', path: relativePath, previous: record };
  }

  if (!file || !record) return null;

  // Stale tracking beats any fingerprint comparison
  if (!remoteIds.has(record.remote_id)) {
    return { kind: 'upload', path: relativePath, file, reason: 'missing-remote', previous: record };
  }

  if (file.size === record.size && file.mtime === record.mtime) {
    return { kind: 'skip', path: relativePath, file, previous: record, refresh: false };
  }

  if (
    file.contentHash !== undefined &&
    record.content_hash !== null &&
    file.contentHash === record.content_hash
  ) {
    return { kind: 'skip', path: relativePath, file, previous: record, refresh: true };
  }

  return { kind: 'replace', path: relativePath, file, previous: record };
}

export function planSync(input: PlanInput): OperationPlan {
  const { local, tracked, remoteIds } = input;
  const unreadable = input.unreadable ?? new Set<string>();
  const pendingDeletes = input.pendingDeletes ?? new Map<string, string>();

  const allPaths = new Set<string>([...local.keys(), ...tracked.keys()]);
  const sortedPaths = [...allPaths].filter((p) => !unreadable.has(p)).sort();

  const entries: PlanEntry[] = [];
  for (const relativePath of sortedPaths) {
    const entry = classify(relativePath, local.get(relativePath), tracked.get(relativePath), remoteIds);
    if (entry) entries.push(entry);
  }

  const cleanups: CleanupEntry[] = [];
  const resolvedPendingDeletes: string[] = [];
  for (const remoteId of [...pendingDeletes.keys()].sort()) {
    if (remoteIds.has(remoteId)) {
      cleanups.push({ remoteId, path: pendingDeletes.get(remoteId) ?? '' });
    } else {
      resolvedPendingDeletes.push(remoteId);
    }
  }

  return { entries, cleanups, resolvedPendingDeletes };
}

// ============================================================================
// Summary
// ============================================================================

export type PlanSummary = Record<PlanEntryKind, number> & { cleanup: number };

export function summarizePlan(plan: OperationPlan): PlanSummary {
  const summary: PlanSummary = { upload: 0, replace: 0, delete: 0, skip: 0, cleanup: plan.cleanups.length };
  for (const entry of plan.entries) {
    summary[entry.kind]++;
  }
  return summary;
}

export function describeEntry(entry: PlanEntry): string {
  switch (entry.kind) {
    case 'upload':
      return entry.reason === 'new'
        ? `upload   ${entry.path}`
        : `upload   ${entry.path} (remote object ${entry.previous?.remote_id ?? '?'} missing)`;
    case 'replace':
      return `replace  ${entry.path} (old ${entry.previous.remote_id})`;
    case 'delete':
      return `delete   ${entry.path} (${entry.previous.remote_id})`;
    case 'skip':
      return entry.refresh ? `skip     ${entry.path} (touched, content unchanged)` : `skip     ${entry.path}`;
  }
}

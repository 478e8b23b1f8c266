/**
 * docmirror - Core Types
 *
 * Shapes shared by the scanner, planner, orchestrator and tracking store.
 * Persisted fields use snake_case so the tracking file reads the same as the
 * objects in memory.
 */

// ============================================================================
// Mapping
// ============================================================================

export interface Mapping {
  localRoot: string;        // Absolute, normalized directory path
  remoteFolderId: string;   // Folder identifier on the document service
}

// ============================================================================
// Fingerprints
// ============================================================================

export interface FileStat {
  size: number;   // Bytes
  mtime: number;  // Milliseconds since epoch
}

export interface LocalFile extends FileStat {
  relativePath: string;   // POSIX separators, relative to the mapping root
  absolutePath: string;
  contentHash?: string;   // Present only when it had to be computed
}

// ============================================================================
// Tracking State
// ============================================================================

export interface FileRecord {
  size: number;
  mtime: number;
  content_hash: string | null;
  remote_id: string;
  last_synced_at: string;   // ISO-8601
}

export interface MappingState {
  files: Map<string, FileRecord>;               // relative path -> record
  pendingDeletes: Map<string, string>;          // remote id -> relative path
}

export type TrackingState = Map<string, MappingState>;  // mapping root -> state

// ============================================================================
// Remote
// ============================================================================

export interface RemoteFile {
  remoteId: string;
  name: string;
}

// ============================================================================
// Plan
// ============================================================================

export type UploadReason =
  | 'new'              // Not tracked yet
  | 'missing-remote';  // Tracked, but its remote object is gone

export type PlanEntry =
  | { kind: 'upload'; path: string; file: LocalFile; reason: UploadReason; previous?: FileRecord }
  | { kind: 'replace'; path: string; file: LocalFile; previous: FileRecord }
  | { kind: 'delete'; path: string; previous: FileRecord }
  | { kind: 'skip'; path: string; file: LocalFile; previous: FileRecord; refresh: boolean };

export type PlanEntryKind = PlanEntry['kind'];

export interface CleanupEntry {
  remoteId: string;
  path: string;   // Path the superseded object belonged to
}

export interface OperationPlan {
  entries: PlanEntry[];
  cleanups: CleanupEntry[];
  resolvedPendingDeletes: string[];   // Pending remote ids already gone remotely
}

// ============================================================================
// Results
// ============================================================================

export interface SyncFailure {
  path: string;
  operation: string;
  message: string;
}

export interface SyncResult {
  mapping: Mapping;
  uploaded: number;
  replaced: number;
  deleted: number;
  skipped: number;
  errors: SyncFailure[];
  aborted?: string;   // Mapping-level failure message
}

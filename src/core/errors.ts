/**
 * docmirror - Error Types
 *
 * Every error carries the path (or remote id) it is attributable to, so the
 * orchestrator can collect it into a SyncResult instead of dropping it.
 */

export type SyncOperation =
  | 'scan'
  | 'fingerprint'
  | 'list'
  | 'upload'
  | 'replace'
  | 'delete'
  | 'cleanup'
  | 'tracking'
  | 'config';

/**
 * Base error for docmirror operations
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly operation: SyncOperation,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Mapping root (or one of its subdirectories) could not be read.
 * Aborts that mapping only.
 */
export class ScanError extends SyncError {
  constructor(dirPath: string, cause?: unknown) {
    super(`Cannot scan directory ${dirPath}: ${describeError(cause)}`, 'scan', dirPath, { cause });
  }
}

export class FingerprintError extends SyncError {
  constructor(filePath: string, cause?: unknown) {
    super(`Cannot fingerprint ${filePath}: ${describeError(cause)}`, 'fingerprint', filePath, { cause });
  }
}

/**
 * Errors raised by a RemoteStorage implementation. `status` is the HTTP
 * status when the failure came from a server response.
 */
export class RemoteError extends SyncError {
  constructor(
    message: string,
    operation: SyncOperation,
    target: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, operation, target, options);
  }
}

export class UploadError extends RemoteError {
  constructor(localPath: string, detail: string, status?: number, cause?: unknown) {
    super(`Upload failed for ${localPath}: ${detail}`, 'upload', localPath, status, { cause });
  }
}

export class DeleteError extends RemoteError {
  constructor(remoteId: string, detail: string, status?: number, cause?: unknown) {
    super(`Delete failed for remote object ${remoteId}: ${detail}`, 'delete', remoteId, status, { cause });
  }
}

export class ListError extends RemoteError {
  constructor(folderId: string, detail: string, status?: number, cause?: unknown) {
    super(`Cannot list remote folder ${folderId}: ${detail}`, 'list', folderId, status, { cause });
  }
}

/** Mapping-level wrapper around a ListError. */
export class RemoteListError extends SyncError {
  constructor(folderId: string, cause: unknown) {
    super(describeError(cause), 'list', folderId, { cause });
  }
}

/**
 * A replace where at least one of its two sub-operations failed.
 */
export class ReplaceError extends SyncError {
  constructor(relativePath: string, failures: string[]) {
    super(`Replace incomplete for ${relativePath}: ${failures.join('; ')}`, 'replace', relativePath);
  }
}

export class TrackingStoreCorruptError extends SyncError {
  constructor(filePath: string, detail: string) {
    super(`Tracking state ${filePath} is unreadable (${detail}); starting from empty state`, 'tracking', filePath);
  }
}

export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message, 'config');
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

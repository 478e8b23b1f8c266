/**
 * docmirror - Remote Storage Contract
 *
 * What the sync core needs from a document service. Implementations do
 * their own retrying, if any; the core calls each method once.
 */

import type { RemoteFile } from '../core/types.js';

export interface RemoteStorage {
  /** Upload a local file into a folder. Rejects with UploadError. */
  upload(localPath: string, folderId: string): Promise<string>;

  /**
   * Delete a remote object. Resolves when the object is already gone.
   * Rejects with DeleteError.
   */
  delete(remoteId: string): Promise<void>;

  /** Objects currently in a folder. Rejects with ListError. */
  listFiles(folderId: string): Promise<RemoteFile[]>;
}

/**
 * docmirror - Sync Module
 *
 * Change detection and reconciliation:
 * 1. Discovery: walk the mapping root for eligible documents
 * 2. Fingerprint: size + mtime, content hash only when those moved
 * 3. Plan: pure diff of local files, tracking records and remote listing
 * 4. Execute: drive the plan through RemoteStorage, commit confirmed results
 */

export * from './config.js';
export * from './discover.js';
export * from './fingerprint.js';
export * from './reconcile.js';
export * from './tracking-store.js';
export * from './orchestrator.js';

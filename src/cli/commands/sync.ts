/**
 * Sync Command
 *
 * One-shot mirror of every configured mapping, or a dry run that prints the
 * plan without changing anything.
 */

import type { Command } from 'commander';

import { c } from '../colors.js';
import { resolveServiceConfig } from '../../core/config.js';
import { createLogger, type Logger } from '../../core/logger.js';
import type { Mapping, SyncResult } from '../../core/types.js';
import { DocumentServiceClient } from '../../remote/client.js';
import type { RemoteStorage } from '../../remote/types.js';
import { resolveMappings } from '../../sync/config.js';
import { SyncOrchestrator, type SyncPreview } from '../../sync/orchestrator.js';
import { describeEntry, summarizePlan } from '../../sync/reconcile.js';
import { TrackingStore } from '../../sync/tracking-store.js';
import { collect } from '../helpers.js';

export interface SyncCommandOptions {
  baseUrl?: string;
  apiKey?: string;
  mappingFile?: string;
  mapping?: string[];
  directory?: string;
  folderId?: string;
  stateFile: string;
  verbose?: boolean;
  /** Unset means verify; only an explicit --no-verify-ssl turns it off */
  verifySsl?: boolean;
  logFile?: string;
  dryRun?: boolean;
}

export interface SyncCommandDeps {
  remote?: RemoteStorage;
  logger?: Logger;
  print?: (line: string) => void;
}

// ============================================================================
// Output
// ============================================================================

export function formatResult(result: SyncResult): string[] {
  const lines = [c.title(result.mapping.localRoot) + c.dim(` -> ${result.mapping.remoteFolderId}`)];

  if (result.aborted) {
    lines.push(`  ${c.error('ABORTED')} ${result.aborted}`);
  } else {
    lines.push(
      `  uploaded ${result.uploaded}, replaced ${result.replaced}, deleted ${result.deleted}, ` +
      `skipped ${result.skipped}, errors ${result.errors.length}`
    );
  }

  for (const failure of result.errors) {
    lines.push(`  ${c.warning('⚠')} ${failure.operation} ${c.file(failure.path)}: ${failure.message}`);
  }
  return lines;
}

export function formatTotals(results: SyncResult[]): string {
  const total = results.reduce(
    (sum, r) => ({
      uploaded: sum.uploaded + r.uploaded,
      replaced: sum.replaced + r.replaced,
      deleted: sum.deleted + r.deleted,
      skipped: sum.skipped + r.skipped,
      errors: sum.errors + r.errors.length + (r.aborted ? 1 : 0),
    }),
    { uploaded: 0, replaced: 0, deleted: 0, skipped: 0, errors: 0 }
  );
  return `Total: uploaded ${total.uploaded}, replaced ${total.replaced}, deleted ${total.deleted}, ` +
    `skipped ${total.skipped}, errors ${total.errors}`;
}

export function formatPreview(preview: SyncPreview): string[] {
  const lines = [c.title(preview.mapping.localRoot) + c.dim(` -> ${preview.mapping.remoteFolderId}`)];

  if (!preview.plan) {
    lines.push(`  ${c.error('ABORTED')} ${preview.aborted ?? 'unknown error'}`);
    return lines;
  }

  for (const cleanup of preview.plan.cleanups) {
    lines.push(`  cleanup  ${cleanup.path} (${cleanup.remoteId})`);
  }
  for (const entry of preview.plan.entries) {
    if (entry.kind === 'skip') continue;
    lines.push(`  ${describeEntry(entry)}`);
  }
  for (const failure of preview.errors) {
    lines.push(`  ${c.warning('⚠')} ${failure.operation} ${c.file(failure.path)}: ${failure.message}`);
  }

  const summary = summarizePlan(preview.plan);
  lines.push(c.dim(
    `  ${summary.upload} upload, ${summary.replace} replace, ${summary.delete} delete, ` +
    `${summary.skip} unchanged, ${summary.cleanup} cleanup`
  ));
  return lines;
}

// ============================================================================
// Action
// ============================================================================

/**
 * Turn certificate verification off for the process when asked to. Returns
 * whether verification stays on.
 */
export function applyTlsVerification(verifySsl: boolean | undefined, logger: Logger): boolean {
  if (verifySsl === false) {
    logger.warn('[sync] TLS certificate verification is disabled');
    process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
    return false;
  }
  return true;
}

/**
 * Run the sync (or dry run) and return the process exit code.
 */
export async function runSync(options: SyncCommandOptions, deps: SyncCommandDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const logger = deps.logger ?? createLogger({ verbose: options.verbose, logFile: options.logFile });

  const mappings: Mapping[] = await resolveMappings({
    mappingFile: options.mappingFile,
    mappings: options.mapping,
    directory: options.directory,
    folderId: options.folderId,
  });
  logger.info(`[sync] Using ${mappings.length} mapping(s): ${mappings.map((m) => `${m.localRoot} -> ${m.remoteFolderId}`).join(', ')}`);

  let remote = deps.remote;
  if (!remote) {
    applyTlsVerification(options.verifySsl, logger);
    const service = await resolveServiceConfig({ baseUrl: options.baseUrl, apiKey: options.apiKey });
    remote = new DocumentServiceClient({ ...service, logger });
  }

  const store = new TrackingStore(options.stateFile, logger);
  const orchestrator = new SyncOrchestrator({ remote, store, logger });

  if (options.dryRun) {
    await store.load();
    let failed = false;
    for (const mapping of mappings) {
      const preview = await orchestrator.preview(mapping);
      formatPreview(preview).forEach((line) => print(line));
      failed = failed || !preview.plan;
    }
    return failed ? 1 : 0;
  }

  const results = await orchestrator.runAll(mappings);
  print('');
  for (const result of results) {
    formatResult(result).forEach((line) => print(line));
  }
  print('');
  print(formatTotals(results));

  const failed = results.some((r) => r.aborted || r.errors.length > 0);
  return failed ? 1 : 0;
}

export function registerSyncCommand(program: Command, defaultStatePath: string): void {
  program
    .command('sync')
    .description('Mirror local directories into their remote folders')
    .option('--base-url <url>', 'Base URL of the document service')
    .option('--api-key <key>', 'API key for the document service')
    .option('--mapping-file <file>', 'JSON file of local directory -> folder id mappings')
    .option('-m, --mapping <dir=folderId>', 'Map a local directory to a remote folder (repeatable)', collect, [])
    .option('--directory <dir>', 'Sync a single local directory')
    .option('--folder-id <id>', 'Remote folder id for --directory')
    .option('-s, --state-file <file>', 'Tracking state file', defaultStatePath)
    .option('--log-file <file>', 'Also append log lines to this file')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--verify-ssl', 'Verify TLS certificates (the default)')
    .option('--no-verify-ssl', 'Skip TLS certificate verification')
    .option('--dry-run', 'Show what would change without uploading or deleting')
    .action(async (options: SyncCommandOptions) => {
      process.exitCode = await runSync(options);
    });
}

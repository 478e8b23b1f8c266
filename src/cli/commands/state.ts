/**
 * State Command
 *
 * Inspect or reset the tracking state. Clearing a root makes the next sync
 * treat every file under it as new.
 */

import type { Command } from 'commander';

import { c } from '../colors.js';
import { createLogger } from '../../core/logger.js';
import { normalizeRoot } from '../../sync/config.js';
import { TrackingStore } from '../../sync/tracking-store.js';

interface StateOptions {
  stateFile: string;
  root?: string;
}

export async function showState(
  store: TrackingStore,
  print: (line: string) => void = console.log
): Promise<void> {
  const state = await store.load();

  if (state.size === 0) {
    print(c.dim(`No tracked mappings in ${store.getFilePath()}`));
    return;
  }

  print(c.header(`Tracking state: ${store.getFilePath()}`));
  for (const [root, mapping] of [...state.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const bytes = [...mapping.files.values()].reduce((sum, record) => sum + record.size, 0);
    const lastSync = [...mapping.files.values()]
      .map((record) => record.last_synced_at)
      .sort()
      .at(-1);
    print(c.list(`${c.path(root)}: ${mapping.files.size} file(s), ${bytes} bytes`));
    if (lastSync) print(`    last synced ${c.time(lastSync)}`);
    if (mapping.pendingDeletes.size > 0) {
      print(`    ${c.warning(`${mapping.pendingDeletes.size} superseded remote object(s) awaiting deletion`)}`);
    }
  }
}

export async function clearState(
  store: TrackingStore,
  root: string | undefined,
  print: (line: string) => void = console.log
): Promise<number> {
  await store.load();
  const removed = store.clear(root === undefined ? undefined : normalizeRoot(root));
  await store.save();
  print(c.success(`Cleared tracking for ${removed} mapping(s)`));
  return removed;
}

export function registerStateCommand(program: Command, defaultStatePath: string): void {
  const stateCmd = program
    .command('state')
    .description('Inspect or reset the sync tracking state');

  stateCmd
    .command('show')
    .description('Show tracked files per mapping')
    .option('-s, --state-file <file>', 'Tracking state file', defaultStatePath)
    .action(async (options: StateOptions) => {
      await showState(new TrackingStore(options.stateFile, createLogger()));
    });

  stateCmd
    .command('clear')
    .description('Forget tracked files so the next sync re-uploads them')
    .option('-s, --state-file <file>', 'Tracking state file', defaultStatePath)
    .option('-r, --root <dir>', 'Only clear this local directory')
    .action(async (options: StateOptions) => {
      await clearState(new TrackingStore(options.stateFile, createLogger()), options.root);
    });
}

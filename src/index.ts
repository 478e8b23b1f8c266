#!/usr/bin/env node

/**
 * docmirror CLI
 *
 * Commands:
 * - sync: Mirror local directories into remote document folders
 * - state: Inspect or reset the tracking state
 * - config: Store service URL and API key
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

// Load .env files silently; variables already set in the environment win
function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  try {
    const parsed = parse(readFileSync(filePath, 'utf-8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
      }
    }
  } catch (error) {
    console.error(`[env] Could not read ${filePath}: ${error}`);
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { getDefaultStatePath } from './core/config.js';
import { registerSyncCommand } from './cli/commands/sync.js';
import { registerStateCommand } from './cli/commands/state.js';
import { registerConfigCommand } from './cli/commands/config.js';
import { reportCommandError } from './cli/helpers.js';

const program = new Command();

const DEFAULT_STATE_FILE = process.env.DOCMIRROR_STATE_FILE || getDefaultStatePath();

program
  .name('docmirror')
  .description('Mirror local document folders into a remote document service')
  .version('0.1.0');

registerSyncCommand(program, DEFAULT_STATE_FILE);
registerStateCommand(program, DEFAULT_STATE_FILE);
registerConfigCommand(program);

program.parseAsync().catch((error: unknown) => {
  process.exitCode = reportCommandError(error);
});

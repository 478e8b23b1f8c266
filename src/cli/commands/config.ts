/**
 * Config Command
 *
 * Store the document service URL and API key so they need not be passed on
 * every run.
 */

import type { Command } from 'commander';

import { c } from '../colors.js';
import { getConfigPath, loadConfigFile, saveConfig } from '../../core/config.js';

interface ConfigSetOptions {
  baseUrl?: string;
  apiKey?: string;
}

export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '********';
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Manage stored service settings');

  configCmd
    .command('set')
    .description('Save the service URL and/or API key')
    .option('--base-url <url>', 'Base URL of the document service')
    .option('--api-key <key>', 'API key for the document service')
    .action(async (options: ConfigSetOptions) => {
      if (!options.baseUrl && !options.apiKey) {
        console.log(c.warning('Nothing to save: pass --base-url and/or --api-key'));
        process.exitCode = 2;
        return;
      }
      await saveConfig({
        ...(options.baseUrl ? { base_url: options.baseUrl } : {}),
        ...(options.apiKey ? { api_key: options.apiKey } : {}),
      });
      console.log(c.success(`Saved ${getConfigPath()}`));
    });

  configCmd
    .command('show')
    .description('Show stored service settings')
    .action(async () => {
      const config = await loadConfigFile();
      console.log(c.header(getConfigPath()));
      if (!config) {
        console.log(c.dim('  (not configured)'));
        return;
      }
      console.log(`  base_url: ${config.base_url ?? c.dim('(unset)')}`);
      console.log(`  api_key:  ${config.api_key ? maskSecret(config.api_key) : c.dim('(unset)')}`);
      console.log(c.dim('  DOCMIRROR_BASE_URL / DOCMIRROR_API_KEY override these values'));
    });
}

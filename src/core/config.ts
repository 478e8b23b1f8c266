/**
 * docmirror - Service Config Loader
 *
 * Loads document service settings from ~/.config/docmirror/config.json with
 * env var overrides.
 * Resolution order: CLI flag > process.env > config.json > error
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import { ConfigError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

const ConfigFileSchema = z.object({
  version: z.number(),
  base_url: z.string().optional(),
  api_key: z.string().optional(),
});

export type DocmirrorConfig = z.infer<typeof ConfigFileSchema>;

export interface ServiceConfig {
  baseUrl: string;
  apiKey: string;
}

export interface ServiceOverrides {
  baseUrl?: string;
  apiKey?: string;
}

// ============================================================================
// Paths
// ============================================================================

const CONFIG_DIR = path.join(os.homedir(), '.config', 'docmirror');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export function getConfigPath(): string {
  return CONFIG_FILE;
}

export function getDefaultStatePath(): string {
  return path.join(CONFIG_DIR, 'sync-state.json');
}

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from disk. Returns null if the file doesn't exist or can't be
 * parsed.
 */
export async function loadConfigFile(configPath: string = CONFIG_FILE): Promise<DocmirrorConfig | null> {
  if (!existsSync(configPath)) {
    return null;
  }

  try {
    const content = await readFile(configPath, 'utf-8');
    const parsed = ConfigFileSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Resolve service settings. Throws ConfigError naming whatever is missing.
 */
export async function resolveServiceConfig(
  overrides: ServiceOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = CONFIG_FILE
): Promise<ServiceConfig> {
  const file = await loadConfigFile(configPath);

  const baseUrl = overrides.baseUrl || env.DOCMIRROR_BASE_URL || file?.base_url;
  const apiKey = overrides.apiKey || env.DOCMIRROR_API_KEY || file?.api_key;

  const missing: string[] = [];
  if (!baseUrl) missing.push('base URL (--base-url or DOCMIRROR_BASE_URL)');
  if (!apiKey) missing.push('API key (--api-key or DOCMIRROR_API_KEY)');
  if (!baseUrl || !apiKey) {
    throw new ConfigError(`Missing ${missing.join(' and ')}`);
  }

  return { baseUrl, apiKey };
}

/**
 * Save config to disk, merged with what is already there.
 */
export async function saveConfig(
  config: Partial<DocmirrorConfig>,
  configPath: string = CONFIG_FILE
): Promise<void> {
  await mkdir(path.dirname(configPath), { recursive: true });

  const existing = await loadConfigFile(configPath);
  const merged: DocmirrorConfig = {
    version: 1,
    ...existing,
    ...config,
  };

  await writeFile(configPath, JSON.stringify(merged, null, 2) + '\n', { mode: 0o600 });
}

import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.listing-replay.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return parseConfig(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

/**
 * Like `loadConfigFile`, but a missing file yields the defaults.
 * Any other read or validation error is rethrown.
 */
export async function loadConfigFileOrDefaults(
  configPath: string,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw err;
  }
}

export function parseConfig(raw: string, format: 'json' | 'yaml'): FileConfig {
  const parsed: unknown = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  return fileConfigSchema.parse(parsed ?? {});
}

// ── Helpers ─────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * TOML configuration loader.
 *
 * Reads an optional TOML file, parses it with smol-toml, validates it and
 * returns a fully typed `ModuleConfig`.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { parseConfig, DEFAULT_CONFIG } from '../types/config.js';
import type { ModuleConfig } from '../types/config.js';

/** Environment variable naming a config file when `--config` is not given. */
export const CONFIG_PATH_ENV = 'WORD_COUNTER_CONFIG';

/**
 * Load and validate a TOML config file.
 *
 * Without a path, or when the file does not exist or is empty, returns
 * `DEFAULT_CONFIG`. Throws on invalid TOML syntax or schema validation
 * errors.
 */
export function loadConfig(configPath?: string): ModuleConfig {
  if (configPath === undefined || !existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return { ...DEFAULT_CONFIG };
  }

  return parseConfig(parseTOML(content));
}

/** Pick the config path: an explicit one wins over the environment. */
export function resolveConfigPath(
  explicit: string | undefined,
  env: Record<string, string | undefined> = process.env,
): string | undefined {
  if (explicit !== undefined) return explicit;
  const fromEnv = env[CONFIG_PATH_ENV];
  return fromEnv !== undefined && fromEnv.length > 0 ? fromEnv : undefined;
}

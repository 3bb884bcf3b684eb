/**
 * Module configuration schema.
 *
 * Defines the TypeScript types for the sections of the optional TOML
 * config file, their defaults, and the validation applied when a raw
 * parsed document is turned into a `ModuleConfig`.
 */

import { PAGE_SIZE } from '../core/memory-arena.js';

// ---------------------------------------------------------------------------
// Log level union
// ---------------------------------------------------------------------------

/** Log severity levels accepted in `[logging]`. */
export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<ConfigLogLevel>([
  'debug',
  'info',
  'warn',
  'error',
]);

function isConfigLogLevel(value: string): value is ConfigLogLevel {
  return VALID_LOG_LEVELS.has(value);
}

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[memory]` section. */
export interface MemoryConfig {
  /** Linear memory ceiling, e.g. `"5MB"`. Declared to the host as-is. */
  limit: string;
}

/** `[execution]` section. */
export interface ExecutionConfig {
  /** Per-call timeout the host should enforce, in milliseconds. */
  timeout_ms: number;
}

/** `[logging]` section. */
export interface LoggingConfig {
  level: ConfigLogLevel;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full module configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are
 * preserved as-is so newer config files still load.
 */
export interface ModuleConfig {
  memory: MemoryConfig;
  execution: ExecutionConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when the config file is absent or partial. */
export const DEFAULT_CONFIG: ModuleConfig = {
  memory: { limit: '5MB' },
  execution: { timeout_ms: 3000 },
  logging: { level: 'info' },
};

const KNOWN_SECTIONS = ['memory', 'execution', 'logging'];

// ---------------------------------------------------------------------------
// parseMemoryLimit()
// ---------------------------------------------------------------------------

const UNIT_BYTES: Record<string, number> = {
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

/**
 * Parse a memory limit such as `"100MB"` or `"1GB"` into bytes.
 *
 * Memory grows in whole pages, so a limit below one page cannot be
 * honoured and is rejected. Larger limits are rounded down to whole pages
 * by the arena.
 *
 * @throws If the string is not an integer followed by KB, MB or GB, or is
 *   smaller than one page.
 */
export function parseMemoryLimit(limit: string): number {
  const match = /^(\d+)(KB|MB|GB)$/.exec(limit);
  if (!match) {
    throw new Error(`Invalid memory limit: "${limit}". Expected e.g. "512KB", "5MB" or "1GB"`);
  }
  const [, digits, unit] = match;
  const bytes = Number(digits) * UNIT_BYTES[unit];
  if (bytes < PAGE_SIZE) {
    throw new Error(`Invalid memory limit: "${limit}". Must be at least 64KB (one memory page)`);
  }
  return bytes;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return Object.fromEntries(Object.entries(value));
}

function positiveInteger(value: unknown, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into
 * a fully typed `ModuleConfig`. Applies defaults for missing sections
 * and validates known fields.
 */
export function parseConfig(raw: Record<string, unknown>): ModuleConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      extra[key] = raw[key];
    }
  }

  // --- memory ---
  const rawMemory = section(raw, 'memory');
  const limit = rawMemory['limit'] ?? DEFAULT_CONFIG.memory.limit;
  if (typeof limit !== 'string') {
    throw new Error('memory.limit must be a string such as "5MB"');
  }
  parseMemoryLimit(limit);

  // --- execution ---
  const rawExecution = section(raw, 'execution');
  const timeoutMs = positiveInteger(
    rawExecution['timeout_ms'],
    DEFAULT_CONFIG.execution.timeout_ms,
    'execution.timeout_ms',
  );

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (typeof level !== 'string' || !isConfigLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". ` +
        `Must be one of: ${[...VALID_LOG_LEVELS].join(', ')}`,
    );
  }

  return {
    ...extra,
    memory: { limit },
    execution: { timeout_ms: timeoutMs },
    logging: { level },
  };
}

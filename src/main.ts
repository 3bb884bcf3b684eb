#!/usr/bin/env node
/**
 * Production entry point for the word-counter CLI.
 *
 * Wires real dependencies (stdout, stderr, the TOML config file and the
 * global log level) into CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js describe
 *   node dist/main.js run --text "The cat sat."
 */

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { loadConfig, resolveConfigPath } from './core/config-loader.js';
import { configureLogging } from './core/logger.js';

/**
 * Build production CliDeps. `env` supplies the config path fallback.
 */
export function createProductionDeps(env: Record<string, string | undefined> = process.env): CliDeps {
  return {
    stdout: (msg) => process.stdout.write(`${msg}\n`),
    stderr: (msg) => process.stderr.write(`${msg}\n`),
    loadConfig: (path) => loadConfig(resolveConfigPath(path, env)),
    configureLogging: (level) => configureLogging({ level }),
  };
}

export async function main(argv: string[] = process.argv): Promise<number> {
  return runCommand(parseArgs(argv), createProductionDeps());
}

/* c8 ignore next 3 */
main().then((code) => {
  process.exitCode = code;
});

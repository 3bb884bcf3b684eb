/**
 * word-counter CLI.
 *
 * Drives the word-counter module through its export table, the same way
 * a host engine would:
 *   - `describe`: Print the capability descriptor as JSON.
 *   - `manifest`: Print the capability descriptor as a YAML manifest.
 *   - `invoke`: Send one raw request and print the response.
 *   - `run`: Run prep → exec → post over a text.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { stringify as stringifyYaml } from 'yaml';

import { VERSION } from './index.js';
import { HostBridge } from './core/host-bridge.js';
import type { LogLevel } from './core/logger.js';
import { createWordCounterModule } from './plugins/word-counter/index.js';
import { WORD_COUNT_NODE_TYPE } from './plugins/word-counter/word-counter-definition.js';
import type { ModuleConfig } from './types/config.js';
import type { JsonObject } from './types/protocol.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Load and validate config; no path means defaults. */
  loadConfig: (path: string | undefined) => ModuleConfig;
  /** Apply the configured log level. */
  configureLogging: (level: LogLevel) => void;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  flags: Record<string, boolean>;
  options: Record<string, string>;
  positionals: string[];
}

/** Options that take a value, as `--name value` or `--name=value`. */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(['config', 'text', 'min-word-length']);

/**
 * Parse process.argv into a command, flags, valued options and positionals.
 *
 * Expects argv in the form: [node, script, command?, ...args]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        options[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (VALUE_OPTIONS.has(body)) {
        if (i + 1 < args.length) {
          options[body] = args[i + 1];
          i++;
        }
      } else {
        flags[body] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, flags, options, positionals };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: word-counter <command> [options]

Commands:
  describe                 Print the capability descriptor as JSON
  manifest                 Print the capability descriptor as YAML
  invoke '<request-json>'  Send one raw request and print the response
  run --text <text>        Count words in <text> through all three phases

Options:
  --config <path>          TOML config file (default: $WORD_COUNTER_CONFIG)
  --case-sensitive         Keep case when counting (run)
  --min-word-length <n>    Ignore words shorter than <n> (run)
  --version                Show version number
  --help                   Show this help message`;

/**
 * Dispatch parsed arguments to the appropriate command.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const { command, flags } = args;

  if (flags['version'] && !command) {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  let config: ModuleConfig;
  try {
    config = deps.loadConfig(args.options['config']);
  } catch (err) {
    deps.stderr(`Invalid config: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  deps.configureLogging(config.logging.level);

  switch (command) {
    case 'describe':
      return describe(deps, config);
    case 'manifest':
      return manifest(deps, config);
    case 'invoke':
      return invoke(deps, config, args.positionals);
    case 'run':
      return run(deps, config, args);
    default:
      deps.stderr(`Unknown command: "${command}"\n`);
      deps.stdout(USAGE);
      return 1;
  }
}

function createBridge(config: ModuleConfig): HostBridge {
  return new HostBridge(createWordCounterModule(config).exports());
}

// ---------------------------------------------------------------------------
// describe / manifest
// ---------------------------------------------------------------------------

export async function describe(deps: CliDeps, config: ModuleConfig): Promise<number> {
  deps.stdout(JSON.stringify(createBridge(config).describe(), null, 2));
  return 0;
}

export async function manifest(deps: CliDeps, config: ModuleConfig): Promise<number> {
  deps.stdout(stringifyYaml(createBridge(config).describe()).trimEnd());
  return 0;
}

// ---------------------------------------------------------------------------
// invoke
// ---------------------------------------------------------------------------

/**
 * Send the request text as-is. Exit code follows the response's
 * `success` field.
 */
export async function invoke(
  deps: CliDeps,
  config: ModuleConfig,
  positionals: string[],
): Promise<number> {
  const [requestText] = positionals;
  if (requestText === undefined) {
    deps.stderr("Missing request JSON. Usage: word-counter invoke '<request-json>'");
    return 1;
  }

  const response = createBridge(config).callRaw(new TextEncoder().encode(requestText));
  deps.stdout(JSON.stringify(response, null, 2));
  return response.success ? 0 : 1;
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

export async function run(deps: CliDeps, config: ModuleConfig, args: ParsedArgs): Promise<number> {
  const text = args.options['text'];
  if (text === undefined) {
    deps.stderr('Missing required option --text');
    return 1;
  }

  const nodeConfig: JsonObject = {};
  const rawMinLength = args.options['min-word-length'];
  if (rawMinLength !== undefined) {
    if (!/^\d+$/.test(rawMinLength)) {
      deps.stderr(
        `Invalid --min-word-length: "${rawMinLength}". Must be a non-negative integer`,
      );
      return 1;
    }
    nodeConfig['min_word_length'] = Number(rawMinLength);
  }

  const input: JsonObject = { text, case_sensitive: hasFlag(args, 'case-sensitive') };
  const outcome = createBridge(config).runPipeline(
    WORD_COUNT_NODE_TYPE,
    input,
    Object.keys(nodeConfig).length > 0 ? nodeConfig : undefined,
  );

  if (!outcome.ok) {
    deps.stderr(`${outcome.phase} failed: ${outcome.error}`);
    return 1;
  }

  deps.stdout(JSON.stringify({ next: outcome.next ?? null, output: outcome.output ?? null }, null, 2));
  return 0;
}

function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.flags[name] === true;
}

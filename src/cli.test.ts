import { describe, it, expect, vi } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { VERSION } from './index.js';
import { DEFAULT_CONFIG } from './types/config.js';
import type { ModuleConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface TestDeps extends CliDeps {
  out: string[];
  err: string[];
}

function createTestDeps(overrides?: Partial<CliDeps>): TestDeps {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (msg) => out.push(msg),
    stderr: (msg) => err.push(msg),
    loadConfig: vi.fn().mockReturnValue(DEFAULT_CONFIG),
    configureLogging: vi.fn(),
    ...overrides,
  };
}

function cli(...args: string[]): string[] {
  return ['node', 'word-counter', ...args];
}

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('parses a command from argv', () => {
    expect(parseArgs(cli('describe')).command).toBe('describe');
  });

  it('returns empty command when none is given', () => {
    expect(parseArgs(cli()).command).toBe('');
  });

  it('parses boolean flags', () => {
    const result = parseArgs(cli('--version'));
    expect(result.flags).toEqual({ version: true });
    expect(result.command).toBe('');
  });

  it('takes the next argument as the value of a valued option', () => {
    const result = parseArgs(cli('run', '--text', '--not-a-flag', '--config', 'a.toml'));
    expect(result.options).toEqual({ text: '--not-a-flag', config: 'a.toml' });
    expect(result.flags).toEqual({});
  });

  it('accepts --name=value', () => {
    expect(parseArgs(cli('run', '--min-word-length=3')).options).toEqual({
      'min-word-length': '3',
    });
  });

  it('ignores a valued option with no value', () => {
    const result = parseArgs(cli('run', '--text'));
    expect(result.options).toEqual({});
    expect(result.flags).toEqual({});
  });

  it('collects positionals after the command', () => {
    expect(parseArgs(cli('invoke', '{}', 'extra')).positionals).toEqual(['{}', 'extra']);
  });
});

// ---------------------------------------------------------------------------
// runCommand: global behaviour
// ---------------------------------------------------------------------------

describe('runCommand', () => {
  it('prints the version', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('--version')), deps)).toBe(0);
    expect(deps.out).toEqual([VERSION]);
  });

  it('prints usage with no command', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli()), deps)).toBe(0);
    expect(deps.out[0].split('\n')[0]).toBe('Usage: word-counter <command> [options]');
  });

  it('prints usage for --help even with a command', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('run', '--help')), deps)).toBe(0);
    expect(deps.out[0]).toMatch(/^Usage: /);
    expect(deps.loadConfig).not.toHaveBeenCalled();
  });

  it('rejects unknown commands', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('bogus')), deps)).toBe(1);
    expect(deps.err).toEqual(['Unknown command: "bogus"\n']);
    expect(deps.out[0]).toMatch(/^Usage: /);
  });

  it('passes --config to the loader and applies its log level', async () => {
    const config: ModuleConfig = { ...DEFAULT_CONFIG, logging: { level: 'debug' } };
    const deps = createTestDeps({ loadConfig: vi.fn().mockReturnValue(config) });

    await runCommand(parseArgs(cli('describe', '--config', 'custom.toml')), deps);

    expect(deps.loadConfig).toHaveBeenCalledWith('custom.toml');
    expect(deps.configureLogging).toHaveBeenCalledWith('debug');
  });

  it('reports an invalid config', async () => {
    const deps = createTestDeps({
      loadConfig: () => {
        throw new Error('memory.limit must be a string such as "5MB"');
      },
    });

    expect(await runCommand(parseArgs(cli('describe')), deps)).toBe(1);
    expect(deps.err).toEqual(['Invalid config: memory.limit must be a string such as "5MB"']);
  });
});

// ---------------------------------------------------------------------------
// describe / manifest
// ---------------------------------------------------------------------------

describe('describe command', () => {
  it('prints the descriptor as JSON', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('describe')), deps)).toBe(0);

    const descriptor = JSON.parse(deps.out[0]);
    expect(descriptor.name).toBe('word-counter');
    expect(descriptor.nodes[0].type).toBe('word-count');
    expect(descriptor.permissions).toEqual({ memory: '5MB', timeout: 3000 });
  });

  it('declares limits from config', async () => {
    const config: ModuleConfig = {
      ...DEFAULT_CONFIG,
      memory: { limit: '2MB' },
      execution: { timeout_ms: 500 },
    };
    const deps = createTestDeps({ loadConfig: vi.fn().mockReturnValue(config) });

    await runCommand(parseArgs(cli('describe')), deps);
    expect(JSON.parse(deps.out[0]).permissions).toEqual({ memory: '2MB', timeout: 500 });
  });
});

describe('manifest command', () => {
  it('prints the same document as YAML', async () => {
    const json = createTestDeps();
    const yaml = createTestDeps();
    await runCommand(parseArgs(cli('describe')), json);

    expect(await runCommand(parseArgs(cli('manifest')), yaml)).toBe(0);
    expect(yaml.out[0].startsWith('name: word-counter\n')).toBe(true);
    expect(parseYaml(yaml.out[0])).toEqual(JSON.parse(json.out[0]));
  });
});

// ---------------------------------------------------------------------------
// invoke
// ---------------------------------------------------------------------------

describe('invoke command', () => {
  it('prints a success response and exits 0', async () => {
    const deps = createTestDeps();
    const request = '{"node":"word-count","function":"post","input":{"total_words":3}}';

    expect(await runCommand(parseArgs(cli('invoke', request)), deps)).toBe(0);
    expect(JSON.parse(deps.out[0])).toEqual({
      success: true,
      output: { total_words: 3 },
      next: 'short',
    });
  });

  it('prints an error response and exits 1', async () => {
    const deps = createTestDeps();
    const request = '{"node":"word-count","function":"finalize"}';

    expect(await runCommand(parseArgs(cli('invoke', request)), deps)).toBe(1);
    expect(JSON.parse(deps.out[0])).toEqual({
      success: false,
      error: 'Unknown function: finalize',
    });
  });

  it('requires the request text', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('invoke')), deps)).toBe(1);
    expect(deps.err).toEqual(["Missing request JSON. Usage: word-counter invoke '<request-json>'"]);
  });
});

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

describe('run command', () => {
  it('runs all three phases and prints the result', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('run', '--text', 'The cat sat.')), deps)).toBe(0);

    expect(JSON.parse(deps.out[0])).toEqual({
      next: 'short',
      output: {
        total_words: 2,
        unique_words: 2,
        word_frequencies: { cat: 1, sat: 1 },
        average_word_length: 3,
        longest_word: 'cat',
        shortest_word: 'cat',
      },
    });
  });

  it('keeps case with --case-sensitive', async () => {
    const deps = createTestDeps();
    await runCommand(parseArgs(cli('run', '--text', 'Cat cat', '--case-sensitive')), deps);
    expect(JSON.parse(deps.out[0]).output.word_frequencies).toEqual({ Cat: 1, cat: 1 });
  });

  it('sends --min-word-length as node config', async () => {
    const deps = createTestDeps();
    await runCommand(parseArgs(cli('run', '--text', 'The cat sat.', '--min-word-length=4')), deps);
    expect(JSON.parse(deps.out[0])).toMatchObject({
      next: 'empty',
      output: { total_words: 0, longest_word: '' },
    });
  });

  it('rejects a malformed --min-word-length', async () => {
    const deps = createTestDeps();
    const code = await runCommand(
      parseArgs(cli('run', '--text', 'x', '--min-word-length', '-2')),
      deps,
    );
    expect(code).toBe(1);
    expect(deps.err).toEqual([
      'Invalid --min-word-length: "-2". Must be a non-negative integer',
    ]);
  });

  it('requires --text', async () => {
    const deps = createTestDeps();
    expect(await runCommand(parseArgs(cli('run')), deps)).toBe(1);
    expect(deps.err).toEqual(['Missing required option --text']);
  });
});

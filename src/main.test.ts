/**
 * Tests for main() entry point.
 *
 * main() is a thin wiring layer that parses args, creates real CliDeps,
 * calls runCommand, and returns the exit code.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createProductionDeps, main } from './main.js';

// Mock cli.ts to intercept runCommand calls
vi.mock('./cli.js', async () => {
  const actual = await vi.importActual<typeof import('./cli.js')>('./cli.js');
  return {
    ...actual,
    runCommand: vi.fn().mockResolvedValue(0),
  };
});

import { runCommand } from './cli.js';

describe('main', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('calls runCommand with parsed args and returns exit code', async () => {
    const code = await main(['node', 'word-counter', 'describe']);
    expect(runCommand).toHaveBeenCalledWith(
      { command: 'describe', flags: {}, options: {}, positionals: [] },
      expect.any(Object),
    );
    expect(code).toBe(0);
  });

  it('passes run options through', async () => {
    await main(['node', 'word-counter', 'run', '--text', 'a b', '--case-sensitive']);
    expect(runCommand).toHaveBeenCalledWith(
      {
        command: 'run',
        flags: { 'case-sensitive': true },
        options: { text: 'a b' },
        positionals: [],
      },
      expect.any(Object),
    );
  });

  it('returns non-zero exit code on failure', async () => {
    vi.mocked(runCommand).mockResolvedValueOnce(1);
    const code = await main(['node', 'word-counter', 'bogus']);
    expect(code).toBe(1);
  });
});

describe('createProductionDeps', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('falls back to the config path from the environment', () => {
    dir = mkdtempSync(join(tmpdir(), 'word-counter-main-'));
    const path = join(dir, 'config.toml');
    writeFileSync(path, '[logging]\nlevel = "debug"\n');

    const deps = createProductionDeps({ WORD_COUNTER_CONFIG: path });
    expect(deps.loadConfig(undefined).logging.level).toBe('debug');
  });

  it('returns defaults when no path is given anywhere', () => {
    const deps = createProductionDeps({});
    expect(deps.loadConfig(undefined).logging.level).toBe('info');
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { VERSION } from './index.js';
import { parseConfig } from './types/config.js';
import { ConfigError } from './types/errors.js';
import { configureLogging, resetLogging, type LogEntry } from './core/logger.js';
import { createFakeImporter, createMathlib, createMemoryFs, createTestSink } from './testing/factories.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PASSING_SPEC = ['- PACKAGE: ./mathlib.js', '- "add()": [2, 3, 5]', '- VERSION: "1.0"', ''].join('\n');

interface TestDeps extends CliDeps {
  out: string[];
  err: string[];
}

function createTestDeps(files: Record<string, string>, overrides?: Partial<CliDeps>): TestDeps {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (msg) => {
      out.push(msg);
    },
    stderr: (msg) => {
      err.push(msg);
    },
    cwd: '/work',
    env: {},
    fs: createMemoryFs(files),
    importModule: createFakeImporter({ 'file:///work/specs/mathlib.js': createMathlib() }),
    loadConfig: vi.fn().mockReturnValue(parseConfig({})),
    ...overrides,
  };
}

function run(deps: CliDeps, ...args: string[]): Promise<number> {
  return runCommand(parseArgs(['node', 'packcheck', ...args]), deps);
}

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('splits positionals and flags', () => {
    expect(parseArgs(['node', 'packcheck', 'specs', '--verbose'])).toEqual({
      positionals: ['specs'],
      flags: { verbose: true },
    });
  });

  it('returns empty results with no arguments', () => {
    expect(parseArgs(['node', 'packcheck'])).toEqual({ positionals: [], flags: {} });
  });
});

// ---------------------------------------------------------------------------
// runCommand
// ---------------------------------------------------------------------------

describe('runCommand', () => {
  let logs: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    logs = test.entries;
    configureLogging({ sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  it('prints the version', async () => {
    const deps = createTestDeps({});
    expect(await run(deps, '--version')).toBe(0);
    expect(deps.out).toEqual([VERSION]);
  });

  it('prints usage for --help', async () => {
    const deps = createTestDeps({});
    expect(await run(deps, '--help')).toBe(0);
    expect(deps.out[0]?.startsWith('Usage: packcheck [path] [options]')).toBe(true);
  });

  it('rejects unknown options', async () => {
    const deps = createTestDeps({});
    expect(await run(deps, '--fast')).toBe(1);
    expect(deps.err).toEqual(['Unknown option: "--fast"\n']);
  });

  it('rejects a second path', async () => {
    const deps = createTestDeps({});
    expect(await run(deps, 'a', 'b')).toBe(1);
    expect(deps.err).toEqual(['Unexpected argument: "b"\n']);
  });

  it('runs the specs under a path and prints the trace', async () => {
    const deps = createTestDeps({ '/work/specs/mathlib.yml': PASSING_SPEC });
    expect(await run(deps, 'specs')).toBe(0);
    expect(deps.out).toEqual([
      './mathlib.js',
      '  (+) add(2, 3) == 5',
      '  (+) VERSION == "1.0"',
      './mathlib.js: 2/2',
    ]);
    expect(deps.loadConfig).toHaveBeenCalledWith('/work/specs');
  });

  it('accepts a single spec file', async () => {
    const deps = createTestDeps({ '/work/specs/mathlib.yml': PASSING_SPEC });
    expect(await run(deps, 'specs/mathlib.yml')).toBe(0);
    expect(deps.loadConfig).toHaveBeenCalledWith('/work/specs');
  });

  it('returns 1 when a feature fails', async () => {
    const deps = createTestDeps({
      '/work/specs/mathlib.yml': ['- PACKAGE: ./mathlib.js', '- "add()": [2, 2, 5]', ''].join('\n'),
    });
    expect(await run(deps, 'specs')).toBe(1);
    expect(deps.out).toEqual(['./mathlib.js', '  (-) add(2, 2) == 5 # 4 != 5', './mathlib.js: 0/1']);
  });

  it('reports a package that could not be loaded', async () => {
    const deps = createTestDeps({
      '/work/specs/gone.yml': ['- PACKAGE: ./gone.js', '- VERSION: ANY', ''].join('\n'),
    });
    expect(await run(deps, 'specs')).toBe(1);
    expect(deps.out).toEqual([
      './gone.js',
      '  (!) package "./gone.js" could not be loaded',
      '  (-) VERSION == ANY # ResolutionError: "VERSION" is not defined (in "VERSION")',
      './gone.js: 0/1',
    ]);
    expect(logs.some((entry) => entry.msg === 'package could not be loaded')).toBe(true);
  });

  it('succeeds with a message when no specs are found', async () => {
    const deps = createTestDeps({ '/work/readme.md': '# notes' });
    expect(await run(deps)).toBe(0);
    expect(deps.out).toEqual(['No spec documents found under /work']);
  });

  it('fails when the path does not exist', async () => {
    const deps = createTestDeps({});
    expect(await run(deps, 'nope')).toBe(1);
    expect(deps.err[0]).toContain('Cannot read "/work/nope"');
  });

  it('fails on invalid configuration', async () => {
    const deps = createTestDeps(
      { '/work/specs/mathlib.yml': PASSING_SPEC },
      {
        loadConfig: () => {
          throw new ConfigError('Invalid log.level: "chatty". Must be one of: debug, info, warn, error');
        },
      },
    );
    expect(await run(deps, 'specs')).toBe(1);
    expect(deps.err).toEqual(['Invalid log.level: "chatty". Must be one of: debug, info, warn, error']);
    expect(deps.out).toEqual([]);
  });

  it('applies the tag from the environment', async () => {
    const deps = createTestDeps(
      { '/work/specs/mathlib.yml': ['- PACKAGE: ./mathlib.js', '- "(js)VERSION": "2.0"', ''].join('\n') },
      { env: { PACKCHECK_TAG: 'go' } },
    );
    expect(await run(deps, 'specs')).toBe(0);
    expect(deps.out[1]).toBe('  (#) VERSION == "2.0"');
  });

  it('binds hooks from the configured module', async () => {
    const deps = createTestDeps(
      { '/work/specs/mathlib.yml': ['- PACKAGE: ./mathlib.js', '- "$shout()": ["hi", "HI"]', ''].join('\n') },
      {
        loadConfig: () => parseConfig({ hooks: { module: 'hooks.js' } }),
        importModule: createFakeImporter({
          'file:///work/specs/mathlib.js': createMathlib(),
          'file:///work/specs/hooks.js': { shout: (text: string) => text.toUpperCase() },
        }),
      },
    );
    expect(await run(deps, 'specs')).toBe(0);
    expect(deps.out[1]).toBe('  (+) $shout("hi") == "HI"');
  });

  it('fails when the hooks module cannot be loaded', async () => {
    const deps = createTestDeps(
      { '/work/specs/mathlib.yml': PASSING_SPEC },
      { loadConfig: () => parseConfig({ hooks: { module: 'missing.js' } }) },
    );
    expect(await run(deps, 'specs')).toBe(1);
    expect(deps.err[0]?.startsWith('Cannot load hooks module "/work/specs/missing.js"')).toBe(true);
  });
});

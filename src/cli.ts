/**
 * packcheck CLI.
 *
 *   packcheck [path] [--verbose]
 *
 * Discovers spec files under `path` (default: current directory), runs
 * every document against its package, prints the trace, and returns exit
 * code 0 when all documents pass.
 *
 * All external dependencies are injected via {@link CliDeps} for
 * testability. The real `main()` wires production dependencies.
 */

import { dirname, resolve } from 'node:path';

import { VERSION } from './index.js';
import type { PackcheckConfig } from './types/config.js';
import { applyEnvOverrides } from './types/config.js';
import { describeError, isPackcheckError } from './types/errors.js';
import { configureLogging } from './core/logger.js';
import { buildScope, loadHooks, type ModuleImporter } from './core/introspector.js';
import { loadSpecs, type SpecFs } from './core/spec-loader.js';
import { runDocument } from './core/runner.js';
import { formatDocumentReport, runSucceeded, type DocumentReport } from './core/reporter.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for the CLI. */
export interface CliDeps {
  /** Write a line to stdout. */
  stdout: (msg: string) => void;
  /** Write a line to stderr. */
  stderr: (msg: string) => void;
  /** Directory relative paths are resolved against. */
  cwd: string;
  /** Environment variables (for `PACKCHECK_*` overrides). */
  env: Record<string, string | undefined>;
  /** Filesystem used for spec discovery. */
  fs: SpecFs;
  /** Loads packages under test and the hooks module. */
  importModule: ModuleImporter;
  /** Load and validate packcheck.toml from a directory. */
  loadConfig: (root: string) => PackcheckConfig;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  /** Positional arguments in order. */
  positionals: string[];
  flags: Record<string, boolean>;
}

/**
 * Parse process.argv into positionals and `--flags`.
 *
 * Expects argv in the form: [node, script, ...args]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, boolean> = {};

  for (const arg of argv.slice(2)) {
    if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, flags };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: packcheck [path] [options]

Runs every spec document found under path (default: .) against the
package it names and prints one line per feature.

Options:
  --verbose    Log loader and runner diagnostics to stderr
  --version    Show version number
  --help       Show this help message`;

const KNOWN_FLAGS: ReadonlySet<string> = new Set(['verbose', 'version', 'help']);

/**
 * Dispatch parsed arguments.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  if (args.flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  if (args.flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  const unknown = Object.keys(args.flags).filter((flag) => !KNOWN_FLAGS.has(flag));
  if (unknown.length > 0) {
    deps.stderr(`Unknown option: "--${unknown[0]}"\n`);
    deps.stdout(USAGE);
    return 1;
  }

  if (args.positionals.length > 1) {
    deps.stderr(`Unexpected argument: "${args.positionals[1]}"\n`);
    deps.stdout(USAGE);
    return 1;
  }

  return check(resolve(deps.cwd, args.positionals[0] ?? '.'), deps, args.flags['verbose'] === true);
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

function specRoot(path: string, deps: CliDeps): string {
  try {
    return deps.fs.isDirectory(path) ? path : dirname(path);
  } catch (err) {
    throw new Error(`Cannot read "${path}": ${describeError(err)}`);
  }
}

/**
 * Load configuration and hooks, then run every document under `path`.
 */
export async function check(path: string, deps: CliDeps, verbose = false): Promise<number> {
  let config: PackcheckConfig;
  let hooks: Record<string, unknown> = {};
  try {
    const root = specRoot(path, deps);
    config = applyEnvOverrides(deps.loadConfig(root), deps.env);
    configureLogging({ level: verbose ? 'debug' : config.log.level });
    if (config.hooks.module !== undefined) {
      hooks = await loadHooks(resolve(root, config.hooks.module), config.hooks.prefix, deps.importModule);
    }
  } catch (err) {
    deps.stderr(isPackcheckError(err) ? err.message : describeError(err));
    return 1;
  }

  const docs = loadSpecs(path, { tag: config.run.tag, extensions: config.run.extensions }, deps.fs);
  if (docs.length === 0) {
    deps.stdout(`No spec documents found under ${path}`);
    return 0;
  }

  const reports: DocumentReport[] = [];
  for (const doc of docs) {
    const scope = await buildScope(doc, {
      baseDir: dirname(doc.sources[0] ?? path),
      hooks,
      importModule: deps.importModule,
    });
    const report = await runDocument({ ...doc, scope });
    for (const line of formatDocumentReport(report)) {
      deps.stdout(line);
    }
    reports.push(report);
  }

  return runSucceeded(reports) ? 0 : 1;
}

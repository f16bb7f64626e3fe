#!/usr/bin/env node
/**
 * Production entry point for packcheck.
 *
 * Wires real dependencies (filesystem, module loading, environment) into
 * CliDeps and dispatches to the CLI.
 *
 * Usage:
 *   node dist/main.js [path]
 */

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { loadConfig } from './core/config-loader.js';
import { importModule } from './core/introspector.js';
import { nodeSpecFs } from './core/spec-loader.js';

export async function main(argv: string[] = process.argv): Promise<number> {
  const deps: CliDeps = {
    stdout: (msg) => process.stdout.write(msg + '\n'),
    stderr: (msg) => process.stderr.write(msg + '\n'),
    cwd: process.cwd(),
    env: process.env,
    fs: nodeSpecFs,
    importModule,
    loadConfig,
  };

  return runCommand(parseArgs(argv), deps);
}

// ---------------------------------------------------------------------------
// Entry point: run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 7 */
main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  },
);

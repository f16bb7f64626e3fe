/**
 * TOML-based configuration loader for packcheck.
 *
 * Reads `packcheck.toml` from the spec root, parses it with smol-toml,
 * validates it, and applies environment overrides.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  applyEnvOverrides,
  parseConfig,
  type PackcheckConfig,
} from '../types/config.js';
import { ConfigError, describeError } from '../types/errors.js';

/**
 * Load and validate `packcheck.toml` from `root`.
 *
 * If the file does not exist or is empty, the defaults apply.
 *
 * @throws ConfigError on invalid TOML syntax or invalid values.
 */
export function loadConfig(root: string): PackcheckConfig {
  const configPath = join(root, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return parseConfig({});
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return parseConfig({});
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseTOML(content);
  } catch (err) {
    throw new ConfigError(`${configPath}: ${describeError(err)}`);
  }
  return parseConfig(raw);
}

/** {@link loadConfig} followed by `PACKCHECK_*` environment overrides. */
export function resolveConfig(
  root: string,
  env: Record<string, string | undefined> = process.env,
): PackcheckConfig {
  return applyEnvOverrides(loadConfig(root), env);
}

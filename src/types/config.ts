/**
 * packcheck configuration schema.
 *
 * Defines the TypeScript types for `packcheck.toml` sections, the defaults
 * applied when the file is absent or partial, and the environment overrides.
 */

import { ConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Log level union
// ---------------------------------------------------------------------------

/** Log levels accepted by `[log] level`. */
export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<ConfigLogLevel>([
  'debug',
  'info',
  'warn',
  'error',
]);

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[run]` section of packcheck.toml. */
export interface RunConfig {
  /** Identifier of this host implementation, matched against filter tags. */
  tag: string;
  /** File extensions treated as spec files. */
  extensions: string[];
}

/** `[hooks]` section of packcheck.toml. */
export interface HooksConfig {
  /** Module exporting hook functions, relative to the config file. */
  module?: string;
  /** Scope name prefix for hooks. */
  prefix: string;
}

/** `[log]` section of packcheck.toml. */
export interface LogConfig {
  level: ConfigLogLevel;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full packcheck configuration. Unknown top-level sections are preserved
 * as-is.
 */
export interface PackcheckConfig {
  run: RunConfig;
  hooks: HooksConfig;
  log: LogConfig;
  [section: string]: unknown;
}

/** Name of the configuration file looked up in the spec root. */
export const CONFIG_FILE_NAME = 'packcheck.toml';

/** Default configuration applied when packcheck.toml is absent or partial. */
export const DEFAULT_CONFIG: PackcheckConfig = {
  run: { tag: 'js', extensions: ['.yml', '.yaml'] },
  hooks: { prefix: '$' },
  log: { level: 'warn' },
};

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new ConfigError(`[${name}] must be a table`);
  }
  return value;
}

function stringField(
  table: Record<string, unknown>,
  name: string,
  fallback: string,
  sectionName: string,
): string {
  const value = table[name] ?? fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${sectionName}.${name} must be a non-empty string`);
  }
  return value;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `PackcheckConfig`. Missing sections get defaults.
 */
export function parseConfig(raw: Record<string, unknown>): PackcheckConfig {
  const result: PackcheckConfig = {
    run: { ...DEFAULT_CONFIG.run },
    hooks: { ...DEFAULT_CONFIG.hooks },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const key of Object.keys(raw)) {
    if (!['run', 'hooks', 'log'].includes(key)) {
      result[key] = raw[key];
    }
  }

  // --- run ---
  const rawRun = section(raw, 'run');
  const tag = stringField(rawRun, 'tag', DEFAULT_CONFIG.run.tag, 'run');
  if (!/^[A-Za-z0-9_-]+$/.test(tag)) {
    throw new ConfigError(`Invalid run.tag: "${tag}". Tags may only contain letters, digits, _ and -`);
  }
  const extensions = rawRun['extensions'] ?? DEFAULT_CONFIG.run.extensions;
  if (!Array.isArray(extensions) || extensions.length === 0) {
    throw new ConfigError('run.extensions must be a non-empty array');
  }
  const checked: string[] = [];
  for (const entry of extensions) {
    if (typeof entry !== 'string' || !entry.startsWith('.')) {
      throw new ConfigError('run.extensions entries must be strings starting with "."');
    }
    checked.push(entry);
  }
  result.run = { tag, extensions: checked };

  // --- hooks ---
  const rawHooks = section(raw, 'hooks');
  const prefix = stringField(rawHooks, 'prefix', DEFAULT_CONFIG.hooks.prefix, 'hooks');
  if (!/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(prefix)) {
    throw new ConfigError(`Invalid hooks.prefix: "${prefix}". Must be usable as a name prefix`);
  }
  result.hooks = { prefix };
  if (rawHooks['module'] !== undefined) {
    result.hooks.module = stringField(rawHooks, 'module', '', 'hooks');
  }

  // --- log ---
  const rawLog = section(raw, 'log');
  const level = stringField(rawLog, 'level', DEFAULT_CONFIG.log.level, 'log');
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Invalid log.level: "${level}". Must be one of: ${[...VALID_LOG_LEVELS].join(', ')}`,
    );
  }
  result.log = { level };

  return result;
}

/** Narrow a string to a {@link ConfigLogLevel}. */
export function isLogLevel(value: string): value is ConfigLogLevel {
  return VALID_LOG_LEVELS.has(value);
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

/**
 * Apply `PACKCHECK_TAG` and `PACKCHECK_LOG_LEVEL` on top of a parsed config.
 * Empty variables are ignored.
 */
export function applyEnvOverrides(
  config: PackcheckConfig,
  env: Record<string, string | undefined>,
): PackcheckConfig {
  const merged: PackcheckConfig = { ...config, run: { ...config.run }, log: { ...config.log } };

  const tag = env['PACKCHECK_TAG'];
  if (tag && tag.length > 0) {
    merged.run.tag = tag;
  }

  const level = env['PACKCHECK_LOG_LEVEL'];
  if (level && level.length > 0) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid PACKCHECK_LOG_LEVEL: "${level}"`);
    }
    merged.log.level = level;
  }

  return merged;
}

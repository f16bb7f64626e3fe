/**
 * Package introspection: loads the package a document tests and turns its
 * public exports into the document's initial Scope.
 *
 * Packages are loaded with dynamic `import()`. Bare names resolve from the
 * spec file's directory (Node module resolution), relative paths against
 * it. A package that fails to load yields an empty binding set, and the
 * document runs with a Scope that is not ready.
 *
 * Hooks are a host-side table of functions, exported by a module named in
 * the configuration and bound into every Scope under a prefix (`$name`).
 */

import { createRequire } from 'node:module';
import { isAbsolute, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { PACKAGE_BINDING, type ParsedDocument } from '../types/feature.js';
import { ConfigError, describeError } from '../types/errors.js';
import { createLogger } from './logger.js';
import { Scope } from './scope.js';
import { isPlainObject } from './values.js';

const logger = createLogger('introspector');
const hooksLogger = logger.child('hooks');

// ---------------------------------------------------------------------------
// Module loading
// ---------------------------------------------------------------------------

/** Loads a module by specifier and returns its namespace as a record. */
export type ModuleImporter = (specifier: string) => Promise<Record<string, unknown>>;

export const importModule: ModuleImporter = async (specifier) => {
  const ns: unknown = await import(specifier);
  if (typeof ns !== 'object' || ns === null) {
    throw new TypeError(`Module "${specifier}" did not produce a namespace object`);
  }
  return Object.fromEntries(Object.entries(ns));
};

/**
 * Turn a package identifier into something `import()` accepts from here.
 *
 * Relative and absolute paths become file URLs. Bare names are resolved
 * from `baseDir` so the package under test is the one installed next to
 * the specs; names Node resolves to builtins are returned unchanged.
 */
export function resolveSpecifier(packageId: string, baseDir: string): string {
  if (packageId.startsWith('.') || isAbsolute(packageId)) {
    return pathToFileURL(resolve(baseDir, packageId)).href;
  }
  if (packageId.startsWith('node:')) {
    return packageId;
  }
  try {
    const resolved = createRequire(join(baseDir, 'noop.js')).resolve(packageId);
    return isAbsolute(resolved) ? pathToFileURL(resolved).href : resolved;
  } catch (err) {
    // ESM-only packages without a "require" condition fail here; import() may still find them.
    logger.debug('require.resolve failed, importing by name', {
      package: packageId,
      reason: describeError(err),
    });
    return packageId;
  }
}

/**
 * Public names of a module namespace: no `_`-prefixed names and no
 * `default`. A module whose only export is a default object contributes
 * that object's public members instead.
 */
export function publicBindings(ns: Record<string, unknown>): Record<string, unknown> {
  const isPublic = (name: string): boolean => !name.startsWith('_') && name !== 'default';

  let source: Record<string, unknown> = ns;
  let names = Object.keys(ns).filter(isPublic);
  const fallback = ns['default'];
  if (names.length === 0 && fallback !== null && (typeof fallback === 'object' || typeof fallback === 'function')) {
    source = Object.fromEntries(Object.entries(fallback));
    names = Object.keys(source).filter(isPublic);
  }

  const bindings: Record<string, unknown> = {};
  for (const name of names.sort()) {
    bindings[name] = source[name];
  }
  return bindings;
}

/** Options for {@link introspect} and {@link buildScope}. */
export interface IntrospectOptions {
  /** Directory package identifiers are resolved from. */
  baseDir: string;
  importModule?: ModuleImporter;
}

/**
 * Load `packageId` and return its public bindings. Never throws: a package
 * that cannot be loaded yields an empty mapping.
 */
export async function introspect(
  packageId: string,
  options: IntrospectOptions,
): Promise<Record<string, unknown>> {
  const load = options.importModule ?? importModule;
  const specifier = resolveSpecifier(packageId, options.baseDir);
  try {
    const bindings = publicBindings(await load(specifier));
    logger.debug('package introspected', { package: packageId, names: Object.keys(bindings) });
    return bindings;
  } catch (err) {
    logger.warn('package could not be loaded', { package: packageId, reason: describeError(err) });
    return {};
  }
}

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

/**
 * Load the hook table exported by `modulePath` and prefix every function
 * name. Non-function exports are ignored.
 *
 * @throws ConfigError when the hook module cannot be loaded.
 */
export async function loadHooks(
  modulePath: string,
  prefix: string,
  load: ModuleImporter = importModule,
): Promise<Record<string, unknown>> {
  let ns: Record<string, unknown>;
  try {
    ns = await load(pathToFileURL(modulePath).href);
  } catch (err) {
    throw new ConfigError(`Cannot load hooks module "${modulePath}": ${describeError(err)}`);
  }

  const table: Record<string, unknown> = { ...ns };
  const fallback = ns['default'];
  if (isPlainObject(fallback)) {
    Object.assign(table, fallback);
  }

  const hooks: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(table)) {
    if (name === 'default' || typeof value !== 'function') continue;
    hooks[`${prefix}${name}`] = value;
  }
  hooksLogger.debug('hooks loaded', { module: modulePath, hooks: Object.keys(hooks) });
  return hooks;
}

// ---------------------------------------------------------------------------
// Scope building
// ---------------------------------------------------------------------------

export interface BuildScopeOptions extends IntrospectOptions {
  /** Prefixed hook functions to bind alongside the package exports. */
  hooks?: Record<string, unknown>;
}

/**
 * Build the Scope for one document: the package's public bindings, the
 * hooks, and `PACKAGE`. The Scope is ready only when the package exposed
 * at least one name; otherwise `PACKAGE` is bound to null, so a document
 * can still assign ERROR to it.
 */
export async function buildScope(doc: ParsedDocument, options: BuildScopeOptions): Promise<Scope> {
  const bindings = await introspect(doc.package, options);
  const ready = Object.keys(bindings).length > 0;
  return new Scope(
    { ...bindings, ...(options.hooks ?? {}), [PACKAGE_BINDING]: ready ? doc.package : null },
    { ready },
  );
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildScope, importModule, introspect, loadHooks, publicBindings, resolveSpecifier } from './introspector.js';
import { configureLogging, resetLogging, type LogEntry } from './logger.js';
import { ConfigError } from '../types/errors.js';
import { createFakeImporter, createMathlib, createTestSink } from '../testing/factories.js';

const upper = (text: string) => text.toUpperCase();
const lower = (text: string) => text.toLowerCase();

describe('resolveSpecifier', () => {
  it('turns relative and absolute paths into file URLs', () => {
    expect(resolveSpecifier('./mathlib.js', '/specs')).toBe('file:///specs/mathlib.js');
    expect(resolveSpecifier('/lib/mathlib.js', '/specs')).toBe('file:///lib/mathlib.js');
  });

  it('passes node: specifiers through', () => {
    expect(resolveSpecifier('node:path', '/specs')).toBe('node:path');
  });

  it('falls back to the bare name when resolution fails', () => {
    expect(resolveSpecifier('no-such-package-for-tests', '/specs')).toBe('no-such-package-for-tests');
  });
});

describe('publicBindings', () => {
  it('drops private names and default, sorted', () => {
    expect(publicBindings({ b: 1, _a: 2, default: 3, a: 4 })).toEqual({ a: 4, b: 1 });
    expect(Object.keys(publicBindings({ b: 1, a: 4 }))).toEqual(['a', 'b']);
  });

  it('uses the default export when nothing else is exported', () => {
    expect(publicBindings({ default: { x: 1, _y: 2 } })).toEqual({ x: 1 });
  });

  it('returns nothing for an empty namespace', () => {
    expect(publicBindings({})).toEqual({});
  });
});

describe('importModule', () => {
  it('returns a namespace record', async () => {
    const ns = await importModule('node:path');
    expect(typeof ns['join']).toBe('function');
  });
});

describe('introspect and buildScope', () => {
  let entries: LogEntry[];
  const load = createFakeImporter({ 'file:///specs/mathlib.js': createMathlib() });

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'warn', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  it('returns the public bindings of a loaded package', async () => {
    const bindings = await introspect('./mathlib.js', { baseDir: '/specs', importModule: load });
    expect(Object.keys(bindings)).toEqual(['VERSION', 'add', 'constants', 'div', 'fail', 'join', 'later', 'pair']);
  });

  it('returns an empty mapping and warns when loading fails', async () => {
    const bindings = await introspect('./missing.js', { baseDir: '/specs', importModule: load });
    expect(bindings).toEqual({});
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', msg: 'package could not be loaded', package: './missing.js' });
  });

  it('builds a ready scope with the package binding and hooks', async () => {
    const doc = { package: './mathlib.js', entries: [], sources: ['/specs/mathlib.yml'] };
    const scope = await buildScope(doc, { baseDir: '/specs', importModule: load, hooks: { $upper: upper } });
    expect(scope.ready).toBe(true);
    expect(scope.lookup('PACKAGE')).toBe('./mathlib.js');
    expect(scope.lookup('$upper')).toBe(upper);
    expect(scope.lookup('VERSION')).toBe('1.0');
  });

  it('builds a scope that is not ready when the package is missing', async () => {
    const doc = { package: './missing.js', entries: [], sources: [] };
    const scope = await buildScope(doc, { baseDir: '/specs', importModule: load });
    expect(scope.ready).toBe(false);
    expect(scope.names()).toEqual(['PACKAGE']);
    expect(scope.lookup('PACKAGE')).toBeNull();
  });
});

describe('loadHooks', () => {
  it('prefixes exported functions and merges a default table', async () => {
    const load = createFakeImporter({
      'file:///hooks/helpers.js': { upper, LIMIT: 3, default: { lower } },
    });
    const hooks = await loadHooks('/hooks/helpers.js', '$', load);
    expect(hooks).toEqual({ $upper: upper, $lower: lower });
  });

  it('logs the bound hooks under the hooks component', async () => {
    const test = createTestSink();
    configureLogging({ level: 'debug', sink: test.sink });
    try {
      const load = createFakeImporter({ 'file:///hooks/helpers.js': { upper } });
      await loadHooks('/hooks/helpers.js', '$', load);
    } finally {
      resetLogging();
    }
    expect(test.entries).toEqual([
      expect.objectContaining({
        level: 'debug',
        component: 'introspector:hooks',
        msg: 'hooks loaded',
        meta: { module: '/hooks/helpers.js', hooks: ['$upper'] },
      }),
    ]);
  });

  it('throws ConfigError when the module cannot be loaded', async () => {
    const load = createFakeImporter({});
    await expect(loadHooks('/hooks/missing.js', '$', load)).rejects.toThrow(ConfigError);
    await expect(loadHooks('/hooks/missing.js', '$', load)).rejects.toThrow(
      `Cannot load hooks module "/hooks/missing.js": Error: Cannot find module 'file:///hooks/missing.js'`,
    );
  });
});

import { describe, it, expect } from 'vitest';
import {
  defineEntry,
  isConstantPath,
  isPath,
  isPlainObject,
  isThenable,
  normalizeResult,
  referencePath,
  valuesEqual,
} from './values.js';

describe('isPath', () => {
  it.each(['a', 'a.b', 'items.0.name', '$hook', '_private.x'])('accepts %s', (text) => {
    expect(isPath(text)).toBe(true);
  });

  it.each(['', 'a.', '.a', 'a b', 'a-b', '0a'])('rejects "%s"', (text) => {
    expect(isPath(text)).toBe(false);
  });
});

describe('isConstantPath', () => {
  it('looks at the last segment only', () => {
    expect(isConstantPath('VERSION')).toBe(true);
    expect(isConstantPath('cfg.MAX_SIZE')).toBe(true);
    expect(isConstantPath('CFG.size')).toBe(false);
  });

  it('requires at least one letter', () => {
    expect(isConstantPath('items.0')).toBe(false);
    expect(isConstantPath('V2')).toBe(true);
  });
});

describe('referencePath', () => {
  it('returns the path of a reference marker', () => {
    expect(referencePath({ 'a.b': null })).toBe('a.b');
  });

  it('ignores literals', () => {
    expect(referencePath({ a: 1 })).toBeNull();
    expect(referencePath({ a: null, b: null })).toBeNull();
    expect(referencePath({ 'not a path': null })).toBeNull();
    expect(referencePath('a')).toBeNull();
    expect(referencePath([{ a: null }])).toBeNull();
  });
});

describe('isPlainObject', () => {
  it('accepts literals and null-prototype objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects arrays, instances and null', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Map())).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe('normalizeResult', () => {
  it('maps undefined to null', () => {
    expect(normalizeResult(undefined)).toBeNull();
    expect(normalizeResult([undefined])).toEqual([null]);
  });

  it('converts Maps and Sets recursively', () => {
    const value = new Map<string, unknown>([
      ['tags', new Set(['a', 'b'])],
      ['inner', { missing: undefined }],
    ]);
    expect(normalizeResult(value)).toEqual({ tags: ['a', 'b'], inner: { missing: null } });
  });

  it('maps negative zero to zero', () => {
    expect(Object.is(normalizeResult(-0), 0)).toBe(true);
    expect(valuesEqual(normalizeResult([-0]), [0])).toBe(true);
  });

  it('converts typed arrays to sequences', () => {
    expect(normalizeResult(new Uint8Array([1, 2]))).toEqual([1, 2]);
    expect(valuesEqual(normalizeResult(new Float64Array([0.5])), [0.5])).toBe(true);
  });

  it('keeps a __proto__ key as an own key', () => {
    const normalized = normalizeResult(new Map([['__proto__', 1]]));
    expect(Object.getOwnPropertyNames(normalized)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(normalized)).toBe(Object.prototype);
  });

  it('leaves class instances alone', () => {
    const date = new Date(0);
    expect(normalizeResult(date)).toBe(date);
  });
});

describe('valuesEqual', () => {
  it('compares structurally and strictly', () => {
    expect(valuesEqual({ a: [1, 2] }, { a: [1, 2] })).toBe(true);
    expect(valuesEqual(1, '1')).toBe(false);
    expect(valuesEqual([1, 2], [2, 1])).toBe(false);
  });
});

describe('isThenable', () => {
  it('detects promises and promise-likes', () => {
    expect(isThenable(Promise.resolve(1))).toBe(true);
    expect(isThenable({ then: () => undefined })).toBe(true);
    expect(isThenable({ then: 1 })).toBe(false);
    expect(isThenable(null)).toBe(false);
  });
});

describe('defineEntry', () => {
  it('adds __proto__ as an enumerable own key', () => {
    const target: Record<string, unknown> = {};
    defineEntry(target, '__proto__', { a: 1 });
    expect(Object.keys(target)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(target)).toBe(Object.prototype);
  });
});

/**
 * Value helpers shared by the parser, the dereferencer and the executor:
 * dotted-path syntax, reference markers, result normalization, and the
 * equality used to compare results with expectations.
 */

import { isDeepStrictEqual } from 'node:util';

// ---------------------------------------------------------------------------
// Dotted paths
// ---------------------------------------------------------------------------

const SEGMENT = '(?:[A-Za-z_$][A-Za-z0-9_$]*|\\d+)';

/** `a`, `a.b`, `items.0.name`, `$hook` */
export const PATH_PATTERN = new RegExp(`^${SEGMENT}(?:\\.${SEGMENT})*$`);

const CONSTANT_SEGMENT = /^[A-Z0-9_]*[A-Z][A-Z0-9_]*$/;

export function isPath(text: string): boolean {
  return PATH_PATTERN.test(text);
}

export function splitPath(path: string): string[] {
  return path.split('.');
}

/** True when the last segment of `path` names a constant (all uppercase). */
export function isConstantPath(path: string): boolean {
  const segments = splitPath(path);
  return CONSTANT_SEGMENT.test(segments[segments.length - 1] ?? '');
}

// ---------------------------------------------------------------------------
// Plain data
// ---------------------------------------------------------------------------

/** A mapping created by a literal or a data parser, not a class instance. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * If `value` is a reference marker (`{"a.b": null}`), return its path.
 * A one-key mapping with a non-null value is a literal.
 */
export function referencePath(value: unknown): string | null {
  if (!isPlainObject(value)) return null;
  const keys = Object.keys(value);
  if (keys.length !== 1) return null;
  const key = keys[0];
  if (key === undefined || value[key] !== null || !isPath(key)) return null;
  return key;
}

/**
 * Add `key` to `target` as an own enumerable property. A `__proto__` key
 * from parsed data stays a key instead of replacing the prototype.
 */
export function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

const TYPED_ARRAYS = [
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
  Float32Array,
  Float64Array,
  BigInt64Array,
  BigUint64Array,
] as const;

type TypedArray = InstanceType<(typeof TYPED_ARRAYS)[number]>;

function isTypedArray(value: unknown): value is TypedArray {
  return TYPED_ARRAYS.some((ctor) => value instanceof ctor);
}

/**
 * Bring a result into the shape the YAML side uses: `undefined` becomes
 * null, `-0` becomes 0, Maps become mappings, Sets and typed arrays become
 * sequences, and plain collections are normalized recursively. Class
 * instances and functions are returned as they are.
 */
export function normalizeResult(value: unknown): unknown {
  if (value === undefined) return null;
  if (Object.is(value, -0)) return 0;
  if (Array.isArray(value)) return value.map(normalizeResult);
  if (isTypedArray(value)) return [...value].map(normalizeResult);
  if (value instanceof Map) {
    const mapped: Record<string, unknown> = {};
    for (const [key, item] of value) {
      defineEntry(mapped, String(key), normalizeResult(item));
    }
    return mapped;
  }
  if (value instanceof Set) return [...value].map(normalizeResult);
  if (isPlainObject(value)) {
    const mapped: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      defineEntry(mapped, key, normalizeResult(item));
    }
    return mapped;
  }
  return value;
}

/** Strict structural equality between a normalized result and an expectation. */
export function valuesEqual(actual: unknown, expected: unknown): boolean {
  return isDeepStrictEqual(actual, expected);
}

/** Thenable check for results that must be awaited. */
export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

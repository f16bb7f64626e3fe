/**
 * Dereferencer: replaces reference markers (`{"a.b": null}`) inside
 * arguments and expected values with what the Scope holds at that path
 * when the feature runs.
 *
 * Literals are copied so execution never aliases the parsed spec data.
 * The value substituted for a marker is used as-is and not walked again.
 */

import type { Value } from '../types/feature.js';
import type { Scope } from './scope.js';
import { defineEntry, referencePath } from './values.js';

/**
 * Resolve every reference marker in `value` against `scope`.
 *
 * @throws ResolutionError when a marker names a path the scope lacks.
 */
export function dereference(value: Value, scope: Scope): unknown {
  const path = referencePath(value);
  if (path !== null) {
    return scope.lookup(path);
  }
  if (Array.isArray(value)) {
    return value.map((item) => dereference(item, scope));
  }
  if (value !== null && typeof value === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      defineEntry(copy, key, dereference(item, scope));
    }
    return copy;
  }
  return value;
}

/** Dereference keyword arguments into one options object, in declaration order. */
export function dereferenceKeywords(
  keywordArgs: ReadonlyArray<[string, Value]>,
  scope: Scope,
): Record<string, unknown> {
  const options: Record<string, unknown> = {};
  for (const [name, value] of keywordArgs) {
    defineEntry(options, name, dereference(value, scope));
  }
  return options;
}

/**
 * Canonical text rendering for features and values.
 *
 * The rendered form only feeds the report. It is deterministic so that two
 * runs of the same spec produce identical traces.
 */

import { ANY, ERROR, type Feature } from '../types/feature.js';
import { isPlainObject, referencePath } from './values.js';

/** The fields of a feature that determine its text. */
export type FeatureParts = Pick<
  Feature,
  'target' | 'property' | 'isCall' | 'positionalArgs' | 'keywordArgs' | 'expected'
>;

/**
 * Render a value for the trace. Strings are JSON-quoted, references are
 * shown as their bare path, and the ANY/ERROR sentinels by name.
 */
export function renderValue(value: unknown): string {
  if (value === ANY) return 'ANY';
  if (value === ERROR) return 'ERROR';
  if (value === null || value === undefined) return 'null';

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return value.name ? `<function ${value.name}>` : '<function>';
  }

  const path = referencePath(value);
  if (path !== null) return path;

  if (Array.isArray(value)) {
    return `[${value.map(renderValue).join(', ')}]`;
  }

  if (isPlainObject(value)) {
    const items = Object.entries(value).map(
      ([key, item]) => `${JSON.stringify(key)}: ${renderValue(item)}`,
    );
    return `{${items.join(', ')}}`;
  }

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  const name = typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  return `<${name}>`;
}

/**
 * Render a feature:
 *   - `property == expected` for a read
 *   - `property(a, b, kw=v) == expected` for a call
 *   - `target = property(...)` for an assignment (expected not shown)
 */
export function renderFeature(parts: FeatureParts): string {
  let text = parts.property;

  if (parts.isCall) {
    const args = [
      ...parts.positionalArgs.map(renderValue),
      ...parts.keywordArgs.map(([name, value]) => `${name}=${renderValue(value)}`),
    ];
    text = `${text}(${args.join(', ')})`;
  }

  if (parts.target !== undefined) {
    return `${parts.target} = ${text}`;
  }

  return `${text} == ${renderValue(parts.expected)}`;
}

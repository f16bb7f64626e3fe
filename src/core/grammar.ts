/**
 * Feature grammar parser.
 *
 * Turns one raw spec entry (a string or a single-key mapping, as produced
 * by the YAML parser) into a {@link Feature} or a {@link Comment}.
 *
 * Left-hand side (the mapping key):
 *
 *   [ "(" tags ")" ] [ target "=" ] property [ "()" ]
 *
 * Right-hand side (the mapping value):
 *   - read: the expected value, verbatim
 *   - call: a sequence of positional args, then keyword args (`{"name=": v}`),
 *     then an optional `{"==": expected}`. Without that marker the last
 *     element is the expected value, unless the call is an assignment, in
 *     which case every element is an argument and the result may be anything.
 */

import {
  ANY,
  ERROR,
  type Comment,
  type Entry,
  type Expected,
  type Feature,
  type Value,
} from '../types/feature.js';
import { MalformedFeatureError } from '../types/errors.js';
import { parseFilter, SkipState, type Filter } from './skip.js';
import { defineEntry, isPath, isPlainObject } from './values.js';
import { renderFeature } from './render.js';

// ---------------------------------------------------------------------------
// Markers
// ---------------------------------------------------------------------------

/** Key of the explicit expected-value marker. */
export const EXPECTED_MARKER = '==';

/** Suffix that turns a single-key mapping argument into a keyword argument. */
export const KEYWORD_SUFFIX = '=';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// ---------------------------------------------------------------------------
// Left-hand side
// ---------------------------------------------------------------------------

/** A parsed mapping key. */
export interface LeftHandSide {
  filter: Filter | null;
  target?: string;
  property: string;
  isCall: boolean;
}

/** Split a leading `( ... )` filter from `text`. Unbalanced prefixes are kept as text. */
function splitFilter(text: string): { filter: Filter | null; rest: string; valid: boolean } {
  const trimmed = text.trim();
  if (!trimmed.startsWith('(')) {
    return { filter: null, rest: trimmed, valid: true };
  }
  const close = trimmed.indexOf(')');
  if (close < 0) {
    return { filter: null, rest: trimmed, valid: false };
  }
  const filter = parseFilter(trimmed.slice(1, close));
  return { filter, rest: trimmed.slice(close + 1).trim(), valid: filter !== null };
}

/** Parse a mapping key. Returns null when it does not follow the grammar. */
export function parseLeftHandSide(key: string): LeftHandSide | null {
  const { filter, rest, valid } = splitFilter(key);
  if (!valid) return null;

  let target: string | undefined;
  let property = rest;
  const eq = rest.indexOf('=');
  if (eq >= 0) {
    target = rest.slice(0, eq).trim();
    property = rest.slice(eq + 1).trim();
    if (!isPath(target)) return null;
  }

  let isCall = false;
  if (property.endsWith('()')) {
    isCall = true;
    property = property.slice(0, -2).trim();
  }

  if (!isPath(property)) return null;

  const lhs: LeftHandSide = { filter, property, isCall };
  if (target !== undefined) lhs.target = target;
  return lhs;
}

// ---------------------------------------------------------------------------
// Right-hand side
// ---------------------------------------------------------------------------

/** Check that a parsed YAML value is plain JSON-compatible data. */
export function toValue(raw: unknown, where: string): Value {
  if (raw === null || typeof raw === 'boolean' || typeof raw === 'string') return raw;
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new MalformedFeatureError(`${where}: non-finite number ${raw}`);
    }
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item, i) => toValue(item, `${where}[${i}]`));
  }
  if (isPlainObject(raw)) {
    const mapped: { [key: string]: Value } = {};
    for (const [key, item] of Object.entries(raw)) {
      defineEntry(mapped, key, toValue(item, `${where}.${key}`));
    }
    return mapped;
  }
  throw new MalformedFeatureError(`${where}: unsupported value of type ${typeof raw}`);
}

/** Map the reserved literals to their sentinels. */
function toExpected(raw: unknown, where: string): Expected {
  if (raw === 'ANY') return ANY;
  if (raw === 'ERROR') return ERROR;
  return toValue(raw, where);
}

/** If `raw` is a one-key mapping, return its single key. */
function singleKey(raw: unknown): string | null {
  if (!isPlainObject(raw)) return null;
  const keys = Object.keys(raw);
  return keys.length === 1 && keys[0] !== undefined ? keys[0] : null;
}

function isExpectedMarker(raw: unknown): raw is Record<string, unknown> {
  return singleKey(raw) === EXPECTED_MARKER;
}

function keywordName(raw: unknown): string | null {
  const key = singleKey(raw);
  if (key === null || key === EXPECTED_MARKER || !key.endsWith(KEYWORD_SUFFIX)) return null;
  return key.slice(0, -KEYWORD_SUFFIX.length).trim();
}

interface CallParts {
  positionalArgs: Value[];
  keywordArgs: Array<[string, Value]>;
  expected: Expected;
}

function parseCallValue(raw: unknown, lhs: LeftHandSide, where: string): CallParts {
  if (!Array.isArray(raw)) {
    throw new MalformedFeatureError(`${where}: a call expects a sequence of arguments`);
  }
  const items: unknown[] = [...raw];

  let expected: Expected = ANY;
  const last = items[items.length - 1];
  if (items.length > 0 && isExpectedMarker(last)) {
    items.pop();
    expected = toExpected(last[EXPECTED_MARKER], `${where} expected`);
  } else if (lhs.target === undefined) {
    if (items.length === 0) {
      throw new MalformedFeatureError(`${where}: a call without target needs an expected value`);
    }
    const tail = items.pop();
    if (keywordName(tail) !== null) {
      throw new MalformedFeatureError(`${where}: the last element is a keyword argument, not an expected value`);
    }
    expected = toExpected(tail, `${where} expected`);
  }

  const positionalArgs: Value[] = [];
  const keywordArgs: Array<[string, Value]> = [];
  items.forEach((item, i) => {
    const at = `${where}[${i}]`;
    if (isExpectedMarker(item)) {
      throw new MalformedFeatureError(`${at}: "${EXPECTED_MARKER}" must be the last element`);
    }
    const name = keywordName(item);
    if (name !== null && isPlainObject(item)) {
      if (!IDENTIFIER.test(name)) {
        throw new MalformedFeatureError(`${at}: invalid keyword argument name "${name}"`);
      }
      if (keywordArgs.some(([existing]) => existing === name)) {
        throw new MalformedFeatureError(`${at}: duplicate keyword argument "${name}"`);
      }
      const [value] = Object.values(item);
      keywordArgs.push([name, toValue(value ?? null, at)]);
      return;
    }
    if (keywordArgs.length > 0) {
      throw new MalformedFeatureError(`${at}: positional argument after keyword arguments`);
    }
    positionalArgs.push(toValue(item, at));
  });

  return { positionalArgs, keywordArgs, expected };
}

// ---------------------------------------------------------------------------
// Entries
// ---------------------------------------------------------------------------

function parseComment(text: string, state: SkipState): Comment {
  const { filter, rest, valid } = splitFilter(text);
  const commentText = valid ? rest : text.trim();
  const skip = state.enterComment(valid ? filter : null);
  return { kind: 'comment', commentText, skip };
}

/**
 * Parse one raw entry. `state` carries the skip filter inherited from the
 * last comment and is updated when `raw` is itself a comment.
 *
 * @throws MalformedFeatureError when the entry does not follow the grammar.
 */
export function parseEntry(raw: unknown, state: SkipState, index = 0): Entry {
  const where = `entry ${index}`;

  if (typeof raw === 'string') {
    return parseComment(raw, state);
  }

  const key = singleKey(raw);
  if (key === null || !isPlainObject(raw)) {
    throw new MalformedFeatureError(`${where}: expected a string or a single-key mapping`, index);
  }
  const value = raw[key];

  const lhs = parseLeftHandSide(key);
  if (lhs === null) {
    if (value === null) {
      return parseComment(key, state);
    }
    throw new MalformedFeatureError(`${where}: cannot parse "${key}"`, index);
  }

  try {
    const parts: CallParts = lhs.isCall
      ? parseCallValue(value, lhs, where)
      : { positionalArgs: [], keywordArgs: [], expected: toExpected(value, `${where} expected`) };

    const feature: Feature = {
      kind: 'feature',
      property: lhs.property,
      isCall: lhs.isCall,
      positionalArgs: parts.positionalArgs,
      keywordArgs: parts.keywordArgs,
      expected: parts.expected,
      skip: state.resolveFeature(lhs.filter),
      text: '',
    };
    if (lhs.target !== undefined) feature.target = lhs.target;
    feature.text = renderFeature(feature);
    return feature;
  } catch (err) {
    if (err instanceof MalformedFeatureError && err.index === undefined) {
      throw new MalformedFeatureError(err.message, index);
    }
    throw err;
  }
}

/**
 * Parse a whole entry list for host `tag`.
 *
 * @throws MalformedFeatureError on the first entry that does not parse.
 */
export function parseEntries(raw: readonly unknown[], tag: string): Entry[] {
  const state = new SkipState(tag);
  return raw.map((entry, index) => parseEntry(entry, state, index));
}

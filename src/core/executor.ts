/**
 * Resolver/Executor: runs one feature against a Scope.
 *
 * Every feature goes PENDING → SKIPPED, or PENDING → EXECUTED → PASSED |
 * FAILED. Anything raised while resolving arguments, walking the property
 * path, or calling becomes the ERROR sentinel. Errors from the target
 * assignment escape; the runner decides whether they abort the document.
 */

import {
  ERROR,
  PACKAGE_BINDING,
  isAnySentinel,
  isErrorSentinel,
  type Expected,
  type Feature,
} from '../types/feature.js';
import { describeError } from '../types/errors.js';
import type { Scope } from './scope.js';
import { dereference, dereferenceKeywords } from './dereference.js';
import { isThenable, normalizeResult, valuesEqual } from './values.js';

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export type FeatureStatus = 'passed' | 'failed' | 'skipped';

/** What happened to one feature. */
export interface FeatureOutcome {
  status: FeatureStatus;
  text: string;
  /** Normalized result, or ERROR. Absent for skipped features. */
  result?: unknown;
  /** Expected value after dereferencing. */
  expected: unknown;
  /** Message of the error behind an ERROR result. */
  error?: string;
}

/** Error message used when the package under test never loaded. */
export const PACKAGE_NOT_READY = 'package could not be loaded';

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

/**
 * ES class syntax, detected from the function's source text. Classes
 * compiled down to ES5 functions look like plain functions here and are
 * called without `new`.
 */
function isClass(fn: Function): boolean {
  return /^class[\s{]/.test(Function.prototype.toString.call(fn));
}

function invoke(callee: unknown, owner: unknown, args: unknown[], property: string): unknown {
  if (typeof callee !== 'function') {
    throw new TypeError(`"${property}" is not callable`);
  }
  if (isClass(callee)) {
    return Reflect.construct(callee, args);
  }
  return Reflect.apply(callee, owner, args);
}

/** Read or call the feature's property. Throws whatever resolution or the call throws. */
async function evaluate(feature: Feature, scope: Scope): Promise<unknown> {
  const args = feature.positionalArgs.map((arg) => dereference(arg, scope));
  if (feature.keywordArgs.length > 0) {
    args.push(dereferenceKeywords(feature.keywordArgs, scope));
  }

  const { owner, value } = scope.resolve(feature.property);
  let result = feature.isCall ? invoke(value, owner, args, feature.property) : value;
  if (isThenable(result)) {
    result = await result;
  }
  return normalizeResult(result);
}

function resolveExpected(expected: Expected, scope: Scope): unknown {
  if (isAnySentinel(expected) || isErrorSentinel(expected)) return expected;
  return dereference(expected, scope);
}

/** Success rule shared by every feature. */
export function isSuccess(result: unknown, expected: unknown): boolean {
  if (isErrorSentinel(expected)) return isErrorSentinel(result);
  if (isErrorSentinel(result)) return false;
  return isAnySentinel(expected) || valuesEqual(result, expected);
}

// ---------------------------------------------------------------------------
// executeFeature
// ---------------------------------------------------------------------------

/**
 * Execute one feature.
 *
 * @throws ConstantViolationError / ScopeError from the target assignment,
 *   or whatever a setter on the target throws.
 */
export async function executeFeature(feature: Feature, scope: Scope): Promise<FeatureOutcome> {
  if (feature.skip) {
    return { status: 'skipped', text: feature.text, expected: feature.expected };
  }

  let result: unknown;
  let expected: unknown = feature.expected;
  let error: string | undefined;

  if (feature.target === PACKAGE_BINDING && !scope.ready) {
    result = ERROR;
    error = PACKAGE_NOT_READY;
  } else {
    try {
      expected = resolveExpected(feature.expected, scope);
      result = await evaluate(feature, scope);
    } catch (err) {
      result = ERROR;
      error = describeError(err);
    }
  }

  if (feature.target !== undefined) {
    scope.assign(feature.target, result);
  }

  const outcome: FeatureOutcome = {
    status: isSuccess(result, expected) ? 'passed' : 'failed',
    text: feature.text,
    result,
    expected,
  };
  if (error !== undefined) outcome.error = error;
  return outcome;
}

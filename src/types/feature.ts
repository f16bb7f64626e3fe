/**
 * Core data model for packcheck spec documents.
 *
 * A spec document is an ordered list of entries. Each entry parses into
 * either a {@link Feature} (read, call, or assignment under test) or a
 * {@link Comment} that carries a skip filter for the entries after it.
 */

// ---------------------------------------------------------------------------
// Sentinels
// ---------------------------------------------------------------------------

/** Wildcard expected value: any non-error result passes. */
export const ANY: unique symbol = Symbol('ANY');

/** Result of a read or call that raised; also "expect a raise" as expected value. */
export const ERROR: unique symbol = Symbol('ERROR');

export type AnySentinel = typeof ANY;
export type ErrorSentinel = typeof ERROR;

/** Reserved name of the binding that identifies the package under test. */
export const PACKAGE_BINDING = 'PACKAGE';

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A JSON-compatible literal as it comes out of the YAML parser. */
export type Value = null | boolean | number | string | Value[] | { [key: string]: Value };

/** What a feature expects: a literal, the wildcard, or a raise. */
export type Expected = Value | AnySentinel | ErrorSentinel;

// ---------------------------------------------------------------------------
// Entries
// ---------------------------------------------------------------------------

/** One testable unit: a read, a call, or an assignment. */
export interface Feature {
  kind: 'feature';
  /** Dotted path the result is stored at. */
  target?: string;
  /** Dotted path that is read or called. */
  property: string;
  isCall: boolean;
  positionalArgs: Value[];
  /** Keyword arguments in declaration order. */
  keywordArgs: Array<[string, Value]>;
  expected: Expected;
  /** Own filter result, or the one inherited from the last comment. */
  skip: boolean;
  /** Canonical rendering used in reports. */
  text: string;
}

/** A free-text entry; its filter seeds `skip` for the features that follow. */
export interface Comment {
  kind: 'comment';
  commentText: string;
  skip: boolean;
}

export type Entry = Feature | Comment;

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** Aggregate counts for one document. */
export interface Stats {
  /** Every entry after the package header. */
  features: number;
  comments: number;
  /** Entries that were actually executed (`features - comments - skipped`). */
  tests: number;
  skipped: number;
}

/** One package's merged entry list, before a Scope is attached. */
export interface ParsedDocument {
  /** Package identifier taken from the `PACKAGE` header entry. */
  package: string;
  entries: Entry[];
  /** Spec files the entries came from, in discovery order. */
  sources: string[];
}

/** Type guard for the ERROR sentinel. */
export function isErrorSentinel(value: unknown): value is ErrorSentinel {
  return value === ERROR;
}

/** Type guard for the ANY sentinel. */
export function isAnySentinel(value: unknown): value is AnySentinel {
  return value === ANY;
}

/** Build a zeroed {@link Stats}. */
export function emptyStats(): Stats {
  return { features: 0, comments: 0, tests: 0, skipped: 0 };
}

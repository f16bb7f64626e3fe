/**
 * Scope: the mutable, path-addressable environment a document's features
 * read and write.
 *
 * All reflection over arbitrary values goes through {@link getMember} and
 * {@link setMember}, so the executor never branches on concrete types.
 * Mappings, arrays, functions and class instances are all addressed by
 * property name; primitives expose their wrapper's members (`"abc".length`).
 */

import { ConstantViolationError, ResolutionError, ScopeError } from '../types/errors.js';
import { isConstantPath, splitPath } from './values.js';

// ---------------------------------------------------------------------------
// Reflection
// ---------------------------------------------------------------------------

function describeOwner(owner: unknown): string {
  if (owner === null) return 'null';
  if (Array.isArray(owner)) return 'array';
  return typeof owner;
}

/**
 * Read member `name` of `owner`, own or inherited.
 *
 * @throws ResolutionError when the owner is null/undefined or lacks the member.
 */
export function getMember(owner: unknown, name: string, path = name): unknown {
  if (owner === null || owner === undefined) {
    throw new ResolutionError(path, `Cannot read "${name}" of ${describeOwner(owner)} (in "${path}")`);
  }
  const box: object = Object(owner);
  if (!(name in box)) {
    throw new ResolutionError(path, `"${name}" is not defined (in "${path}")`);
  }
  return Reflect.get(box, name);
}

/**
 * Write member `name` of `owner`.
 *
 * @throws ScopeError when the owner is not an object or rejects the write.
 */
export function setMember(owner: unknown, name: string, value: unknown, path = name): void {
  if ((typeof owner !== 'object' && typeof owner !== 'function') || owner === null) {
    throw new ScopeError(path, `Cannot assign "${name}" on ${describeOwner(owner)} (in "${path}")`);
  }
  if (!Reflect.set(owner, name, value)) {
    throw new ScopeError(path, `"${name}" is read-only (in "${path}")`);
  }
}

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------

/** The binding a call is made on: the callee plus its receiver. */
export interface ResolvedMember {
  /** The value holding the member; undefined for top-level names. */
  owner: unknown;
  value: unknown;
}

export interface ScopeOptions {
  /** False when the package under test could not be loaded. */
  ready?: boolean;
}

export class Scope {
  /** False when the package under test could not be loaded. */
  readonly ready: boolean;
  private readonly bindings: Record<string, unknown>;

  constructor(bindings: Record<string, unknown> = {}, options: ScopeOptions = {}) {
    const own: Record<string, unknown> = Object.create(null);
    this.bindings = own;
    for (const [name, value] of Object.entries(bindings)) {
      this.bindings[name] = value;
    }
    this.ready = options.ready ?? true;
  }

  /** Top-level names, sorted. */
  names(): string[] {
    return Object.keys(this.bindings).sort();
  }

  /**
   * Resolve `path` to its value and the value that owns its last segment.
   *
   * @throws ResolutionError when a segment is missing.
   */
  resolve(path: string): ResolvedMember {
    const segments = splitPath(path);
    let owner: unknown = undefined;
    let value: unknown = this.bindings;
    for (const segment of segments) {
      owner = value;
      value = getMember(value, segment, path);
    }
    return { owner: owner === this.bindings ? undefined : owner, value };
  }

  /** Current value at `path`, without invoking anything. */
  lookup(path: string): unknown {
    return this.resolve(path).value;
  }

  /** True when `path` resolves to something other than null/undefined. */
  isBound(path: string): boolean {
    try {
      const value = this.lookup(path);
      return value !== null && value !== undefined;
    } catch (err) {
      if (err instanceof Error) return false;
      throw err;
    }
  }

  /**
   * Bind `value` at `path`. Intermediate segments must already exist.
   *
   * @throws ConstantViolationError when `path` names an uppercase binding
   *   that already holds a non-null value.
   * @throws ScopeError when the parent of `path` cannot be written.
   */
  assign(path: string, value: unknown): void {
    if (isConstantPath(path) && this.isBound(path)) {
      throw new ConstantViolationError(path);
    }

    const segments = splitPath(path);
    const name = segments.pop() ?? path;
    let owner: unknown = this.bindings;
    for (const segment of segments) {
      try {
        owner = getMember(owner, segment, path);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ScopeError(path, `Cannot assign "${path}": ${reason}`);
      }
    }
    setMember(owner, name, value, path);
  }
}

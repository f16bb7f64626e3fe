/**
 * Error codes and error classes raised by packcheck.
 *
 * Every error thrown by the interpreter is a {@link PackcheckError} carrying
 * a machine-readable code. Whether a code aborts a whole document or only a
 * single feature is decided by {@link FATAL_CODES}.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  MALFORMED_FEATURE: 'MALFORMED_FEATURE',
  INVALID_DOCUMENT: 'INVALID_DOCUMENT',
  RESOLUTION_FAILED: 'RESOLUTION_FAILED',
  CONSTANT_VIOLATION: 'CONSTANT_VIOLATION',
  SCOPE_ERROR: 'SCOPE_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes that abort the enclosing document instead of failing one feature. */
export const FATAL_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.CONSTANT_VIOLATION,
  ErrorCode.SCOPE_ERROR,
]);

// ---------------------------------------------------------------------------
// Brand
// ---------------------------------------------------------------------------

const PACKCHECK_ERROR_BRAND: unique symbol = Symbol.for('packcheck.PackcheckError');

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class PackcheckError extends Error {
  readonly code: ErrorCodeValue;

  /** @internal */
  readonly [PACKCHECK_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string) {
    super(message);
    this.name = 'PackcheckError';
    this.code = code;
  }

  /** True when this error must abort the document it was raised in. */
  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

/** An entry that does not follow the feature grammar. */
export class MalformedFeatureError extends PackcheckError {
  /** Zero-based index of the offending entry within its file. */
  readonly index?: number;

  constructor(message: string, index?: number) {
    super(ErrorCode.MALFORMED_FEATURE, message);
    this.name = 'MalformedFeatureError';
    if (index !== undefined) {
      this.index = index;
    }
  }
}

/** A spec file whose overall shape or header is not valid. */
export class InvalidDocumentError extends PackcheckError {
  constructor(message: string) {
    super(ErrorCode.INVALID_DOCUMENT, message);
    this.name = 'InvalidDocumentError';
  }
}

/** A dotted path that does not resolve against the Scope. */
export class ResolutionError extends PackcheckError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(ErrorCode.RESOLUTION_FAILED, message);
    this.name = 'ResolutionError';
    this.path = path;
  }
}

/** Re-assignment of an already bound uppercase name. */
export class ConstantViolationError extends PackcheckError {
  readonly path: string;

  constructor(path: string) {
    super(ErrorCode.CONSTANT_VIOLATION, `Cannot reassign constant "${path}"`);
    this.name = 'ConstantViolationError';
    this.path = path;
  }
}

/** An assignment whose target path cannot be written. */
export class ScopeError extends PackcheckError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(ErrorCode.SCOPE_ERROR, message);
    this.name = 'ScopeError';
    this.path = path;
  }
}

/** Invalid `packcheck.toml` content. */
export class ConfigError extends PackcheckError {
  constructor(message: string) {
    super(ErrorCode.INVALID_CONFIG, message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/** Brand-based guard, so errors from another copy of the module still match. */
export function isPackcheckError(value: unknown): value is PackcheckError {
  if (value instanceof PackcheckError) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    PACKCHECK_ERROR_BRAND in value &&
    (value as Record<symbol, unknown>)[PACKCHECK_ERROR_BRAND] === true
  );
}

/** Human-readable message for anything that was thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

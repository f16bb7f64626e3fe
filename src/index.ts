/**
 * packcheck public API.
 */

export const VERSION = '0.1.0';

export {
  ANY,
  ERROR,
  PACKAGE_BINDING,
  emptyStats,
  isAnySentinel,
  isErrorSentinel,
  type Comment,
  type Entry,
  type Expected,
  type Feature,
  type ParsedDocument,
  type Stats,
  type Value,
} from './types/feature.js';

export {
  ErrorCode,
  FATAL_CODES,
  PackcheckError,
  MalformedFeatureError,
  InvalidDocumentError,
  ResolutionError,
  ConstantViolationError,
  ScopeError,
  ConfigError,
  isPackcheckError,
  type ErrorCodeValue,
} from './types/errors.js';

export {
  DEFAULT_CONFIG,
  parseConfig,
  applyEnvOverrides,
  type PackcheckConfig,
} from './types/config.js';

export { parseEntry, parseEntries, parseLeftHandSide } from './core/grammar.js';
export { renderFeature, renderValue } from './core/render.js';
export { Scope, getMember, setMember } from './core/scope.js';
export { dereference } from './core/dereference.js';
export { executeFeature, isSuccess, type FeatureOutcome } from './core/executor.js';
export {
  DocumentRecorder,
  formatDocumentReport,
  formatRatio,
  runSucceeded,
  type DocumentReport,
} from './core/reporter.js';
export { runDocument, runDocuments, type SpecDocument } from './core/runner.js';
export { loadSpecs, parseSpecFile, discoverSpecFiles } from './core/spec-loader.js';
export { introspect, buildScope, loadHooks, type ModuleImporter } from './core/introspector.js';
export { loadConfig, resolveConfig } from './core/config-loader.js';

/**
 * Spec file discovery and loading.
 *
 * Walks a directory for spec files, parses each one as YAML, checks its
 * top-level shape against SPEC_DOCUMENT_SCHEMA (ajv), parses the entries,
 * and merges files that describe the same package. A file that fails any
 * of these steps is dropped with a warning; the rest of the run continues.
 */

import { readFileSync, readdirSync, statSync } from 'node:fs';
import { extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: the CJS module object carries the constructor on `default`
const Ajv = _Ajv.default;

import { SPEC_DOCUMENT_SCHEMA } from '../types/spec-schema.js';
import { InvalidDocumentError, describeError } from '../types/errors.js';
import { PACKAGE_BINDING, type Entry, type Feature, type ParsedDocument } from '../types/feature.js';
import { parseEntries } from './grammar.js';
import { createLogger } from './logger.js';

const logger = createLogger('loader');

const ajv = new Ajv({ allErrors: true, strict: false });
const validateShape = ajv.compile(SPEC_DOCUMENT_SCHEMA);

// ---------------------------------------------------------------------------
// Filesystem seam
// ---------------------------------------------------------------------------

/** A directory entry as the walker sees it. */
export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

/** Filesystem operations the loader needs. */
export interface SpecFs {
  readFile: (path: string) => string;
  readDir: (path: string) => DirEntry[];
  isDirectory: (path: string) => boolean;
}

export const nodeSpecFs: SpecFs = {
  readFile: (path) => readFileSync(path, 'utf-8'),
  readDir: (path) =>
    readdirSync(path, { withFileTypes: true }).map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
    })),
  isDirectory: (path) => statSync(path).isDirectory(),
};

/** Options that shape discovery and parsing. */
export interface LoadOptions {
  /** Host tag for filter evaluation. */
  tag: string;
  /** Extensions (with leading dot) that mark spec files. */
  extensions: string[];
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

const IGNORED_DIRS: ReadonlySet<string> = new Set(['node_modules']);

/**
 * List spec files under `root`, depth-first, entries sorted by name.
 * A `root` that is a file is returned as-is.
 */
export function discoverSpecFiles(root: string, extensions: string[], fs: SpecFs = nodeSpecFs): string[] {
  if (!fs.isDirectory(root)) {
    return [root];
  }

  const files: string[] = [];
  const entries = [...fs.readDir(root)].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = join(root, entry.name);
    if (entry.isDirectory) {
      if (entry.name.startsWith('.') || IGNORED_DIRS.has(entry.name)) continue;
      files.push(...discoverSpecFiles(full, extensions, fs));
    } else if (extensions.includes(extname(entry.name))) {
      files.push(full);
    }
  }
  return files;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown schema error';
  return errors.map((err) => `${err.instancePath || '/'} ${err.message ?? err.keyword}`).join('; ');
}

function isPackageHeader(entry: Entry): entry is Feature & { expected: string } {
  return (
    entry.kind === 'feature' &&
    entry.property === PACKAGE_BINDING &&
    entry.target === undefined &&
    !entry.isCall &&
    typeof entry.expected === 'string' &&
    entry.expected.length > 0
  );
}

/**
 * Parse one spec file's content.
 *
 * The first non-comment entry must be the `PACKAGE: <id>` header; it names
 * the document and is not kept as a feature.
 *
 * @throws InvalidDocumentError, MalformedFeatureError, or a YAML parse error.
 */
export function parseSpecFile(content: string, file: string, tag: string): ParsedDocument {
  const raw: unknown = parseYaml(content);

  if (!validateShape(raw)) {
    throw new InvalidDocumentError(`${file}: ${formatSchemaErrors(validateShape.errors)}`);
  }
  if (!Array.isArray(raw)) {
    throw new InvalidDocumentError(`${file}: a spec file must be a sequence`);
  }

  const entries = parseEntries(raw, tag);
  const headerIndex = entries.findIndex((entry) => entry.kind === 'feature');
  const header = entries[headerIndex];
  if (header === undefined || !isPackageHeader(header)) {
    throw new InvalidDocumentError(`${file}: the first feature must be "${PACKAGE_BINDING}: <package>"`);
  }

  return {
    package: header.expected,
    entries: entries.filter((_, i) => i !== headerIndex),
    sources: [file],
  };
}

/**
 * Discover, parse and merge every spec file under `path`.
 *
 * Files naming the same package are merged in discovery order. The result
 * is sorted by package name.
 */
export function loadSpecs(path: string, options: LoadOptions, fs: SpecFs = nodeSpecFs): ParsedDocument[] {
  const byPackage = new Map<string, ParsedDocument>();

  for (const file of discoverSpecFiles(path, options.extensions, fs)) {
    let doc: ParsedDocument;
    try {
      doc = parseSpecFile(fs.readFile(file), file, options.tag);
    } catch (err) {
      logger.warn('spec file dropped', { file, reason: describeError(err) });
      continue;
    }

    const existing = byPackage.get(doc.package);
    if (existing) {
      existing.entries.push(...doc.entries);
      existing.sources.push(file);
      logger.debug('spec file merged', { file, package: doc.package });
    } else {
      byPackage.set(doc.package, doc);
      logger.debug('spec file loaded', { file, package: doc.package, entries: doc.entries.length });
    }
  }

  return [...byPackage.keys()].sort().flatMap((name) => {
    const doc = byPackage.get(name);
    return doc ? [doc] : [];
  });
}

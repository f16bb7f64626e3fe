/**
 * Document runner: executes a document's entries in declaration order
 * against its Scope and collects the report.
 *
 * Entries run strictly one after another, since later features read what
 * earlier ones assigned. A fatal error (see FATAL_CODES) stops the
 * document; any other error from an assignment fails only its feature.
 */

import { ERROR, type ParsedDocument } from '../types/feature.js';
import { describeError, isPackcheckError } from '../types/errors.js';
import { executeFeature } from './executor.js';
import { createLogger } from './logger.js';
import { DocumentRecorder, type DocumentReport } from './reporter.js';
import type { Scope } from './scope.js';

const logger = createLogger('runner');

/** A parsed document with the Scope it runs against. */
export interface SpecDocument extends ParsedDocument {
  scope: Scope;
}

/** Run every entry of `doc` and return its report. */
export async function runDocument(doc: SpecDocument): Promise<DocumentReport> {
  const log = logger.withContext({ package: doc.package });
  const recorder = new DocumentRecorder(doc.package, doc.scope.ready);

  if (!doc.scope.ready) {
    log.warn('running against a package that did not load');
  }

  for (const entry of doc.entries) {
    if (entry.kind === 'comment') {
      recorder.recordComment(entry);
      continue;
    }

    try {
      const outcome = await executeFeature(entry, doc.scope);
      recorder.recordOutcome(outcome);
      log.debug('feature executed', { feature: entry.text, status: outcome.status });
    } catch (err) {
      if (isPackcheckError(err) && err.fatal) {
        log.error('document aborted', { feature: entry.text, reason: err.message });
        recorder.recordFatal(entry.text, err.message);
        break;
      }
      const message = describeError(err);
      log.warn('assignment failed', { feature: entry.text, reason: message });
      recorder.recordOutcome({
        status: 'failed',
        text: entry.text,
        result: ERROR,
        expected: entry.expected,
        error: message,
      });
    }
  }

  const report = recorder.finish();
  log.info('document finished', {
    success: report.success,
    passed: report.passed,
    features: report.stats.features,
  });
  return report;
}

/** Run documents one after another. */
export async function runDocuments(docs: readonly SpecDocument[]): Promise<DocumentReport[]> {
  const reports: DocumentReport[] = [];
  for (const doc of docs) {
    reports.push(await runDocument(doc));
  }
  return reports;
}

/**
 * Reporter/Aggregator: accumulates per-document statistics while the
 * runner walks the entries, and formats the text trace.
 *
 * Comments and skipped features count as passed, so a document succeeds
 * when every entry passed. The displayed ratio leaves comments and skipped
 * features out of both sides.
 */

import { emptyStats, type Comment, type Stats } from '../types/feature.js';
import type { FeatureOutcome } from './executor.js';
import { renderValue } from './render.js';

// ---------------------------------------------------------------------------
// Report model
// ---------------------------------------------------------------------------

/** One line of a document's trace. */
export type ReportLine =
  | { kind: 'feature'; outcome: FeatureOutcome }
  | { kind: 'comment'; text: string }
  | { kind: 'not-ready'; package: string }
  | { kind: 'fatal'; message: string };

/** Final state of one document. */
export interface DocumentReport {
  package: string;
  stats: Stats;
  /** Passed features plus comments and skipped features. */
  passed: number;
  ready: boolean;
  /** Message of the error that aborted the document, if any. */
  fatal?: string;
  success: boolean;
  lines: ReportLine[];
}

// ---------------------------------------------------------------------------
// DocumentRecorder
// ---------------------------------------------------------------------------

export class DocumentRecorder {
  private readonly pkg: string;
  private readonly ready: boolean;
  private readonly stats: Stats = emptyStats();
  private readonly lines: ReportLine[] = [];
  private passed = 0;
  private fatal: string | undefined;

  constructor(pkg: string, ready: boolean) {
    this.pkg = pkg;
    this.ready = ready;
    if (!ready) {
      this.lines.push({ kind: 'not-ready', package: pkg });
    }
  }

  recordComment(comment: Comment): void {
    this.stats.features += 1;
    this.stats.comments += 1;
    this.passed += 1;
    this.lines.push({ kind: 'comment', text: comment.commentText });
  }

  recordOutcome(outcome: FeatureOutcome): void {
    this.stats.features += 1;
    if (outcome.status === 'skipped') {
      this.stats.skipped += 1;
      this.passed += 1;
    } else {
      this.stats.tests += 1;
      if (outcome.status === 'passed') this.passed += 1;
    }
    this.lines.push({ kind: 'feature', outcome });
  }

  /** Record the feature whose assignment aborted the document. */
  recordFatal(text: string, message: string): void {
    this.stats.features += 1;
    this.stats.tests += 1;
    this.fatal = message;
    this.lines.push({
      kind: 'feature',
      outcome: { status: 'failed', text, expected: undefined, error: message },
    });
    this.lines.push({ kind: 'fatal', message });
  }

  finish(): DocumentReport {
    const report: DocumentReport = {
      package: this.pkg,
      stats: { ...this.stats },
      passed: this.passed,
      ready: this.ready,
      success: this.ready && this.fatal === undefined && this.passed === this.stats.features,
      lines: [...this.lines],
    };
    if (this.fatal !== undefined) report.fatal = this.fatal;
    return report;
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const MARKERS = {
  passed: '(+)',
  failed: '(-)',
  skipped: '(#)',
  comment: '(*)',
  alert: '(!)',
} as const;

function failureDetail(outcome: FeatureOutcome): string {
  if (outcome.error !== undefined) return outcome.error;
  return `${renderValue(outcome.result)} != ${renderValue(outcome.expected)}`;
}

/** Format one trace line (without indentation). */
export function formatReportLine(line: ReportLine): string {
  switch (line.kind) {
    case 'comment':
      return `${MARKERS.comment} ${line.text}`;
    case 'not-ready':
      return `${MARKERS.alert} package "${line.package}" could not be loaded`;
    case 'fatal':
      return `${MARKERS.alert} fatal: ${line.message}`;
    case 'feature': {
      const { outcome } = line;
      if (outcome.status === 'failed') {
        return `${MARKERS.failed} ${outcome.text} # ${failureDetail(outcome)}`;
      }
      return `${MARKERS[outcome.status]} ${outcome.text}`;
    }
  }
}

/** `executed passes / executed features`, comments and skips left out. */
export function formatRatio(report: DocumentReport): string {
  const { stats } = report;
  const executedPassed = report.passed - stats.comments - stats.skipped;
  return `${executedPassed}/${stats.tests}`;
}

/** Full trace for one document: header, one line per entry, summary. */
export function formatDocumentReport(report: DocumentReport): string[] {
  return [
    report.package,
    ...report.lines.map((line) => `  ${formatReportLine(line)}`),
    `${report.package}: ${formatRatio(report)}`,
  ];
}

/** A run succeeds when every document does. */
export function runSucceeded(reports: readonly DocumentReport[]): boolean {
  return reports.every((report) => report.success);
}

/**
 * Where assertion outcomes go. The harness only decides pass, fail or skip;
 * presenting them is the reporter's business.
 */
import type { Logger } from '../config/logger.js';

export type ReportStatus = 'pass' | 'fail' | 'skip';

export interface ReportEntry {
  status: ReportStatus;
  description: string;
  diagnostics: string[];
}

export interface Reporter {
  pass(description: string): void;
  fail(description: string, diagnostics?: string[]): void;
  skip(description: string, reason: string): void;
}

/**
 * Keeps every outcome in memory, in order.
 */
export class RecordingReporter implements Reporter {
  readonly entries: ReportEntry[] = [];

  pass(description: string): void {
    this.entries.push({ status: 'pass', description, diagnostics: [] });
  }

  fail(description: string, diagnostics: string[] = []): void {
    this.entries.push({ status: 'fail', description, diagnostics });
  }

  skip(description: string, reason: string): void {
    this.entries.push({ status: 'skip', description, diagnostics: [reason] });
  }

  get failures(): ReportEntry[] {
    return this.entries.filter((entry) => entry.status === 'fail');
  }

  get passed(): boolean {
    return this.failures.length === 0;
  }
}

/** Sends every outcome to each reporter in turn */
export function combineReporters(...reporters: Reporter[]): Reporter {
  return {
    pass(description) {
      reporters.forEach((reporter) => reporter.pass(description));
    },
    fail(description, diagnostics = []) {
      reporters.forEach((reporter) => reporter.fail(description, diagnostics));
    },
    skip(description, reason) {
      reporters.forEach((reporter) => reporter.skip(description, reason));
    },
  };
}

/**
 * Reporter writing every outcome to the structured log.
 */
export function createLogReporter(logger: Logger): Reporter {
  return {
    pass(description) {
      logger.info({ status: 'pass' }, description);
    },
    fail(description, diagnostics = []) {
      logger.error({ status: 'fail', diagnostics }, description);
    },
    skip(description, reason) {
      logger.info({ status: 'skip', reason }, description);
    },
  };
}

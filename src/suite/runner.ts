/**
 * Runs registered tests one at a time against a server adapter.
 */
import type { Logger } from '../config/logger.js';
import { ConformanceError } from '../errors.js';
import { combineReporters, createLogReporter, RecordingReporter, type ReportEntry } from '../harness/reporter.js';
import { isUnsupported, type AccountHandle, type ServerAdapter, type Unsupported } from './adapter.js';
import type { RegisteredTest, TestRegistry } from './registry.js';

export type TestStatus = 'pass' | 'fail' | 'skip';

export interface TestOutcome {
  name: string;
  status: TestStatus;
  /** Every assertion the test reported, in order */
  entries: ReportEntry[];
}

export interface RunSummary {
  outcomes: TestOutcome[];
  passed: number;
  failed: number;
  skipped: number;
}

export interface RunOptions {
  logger: Logger;
  /** Only run tests whose name contains this text (case-insensitive) */
  filter?: string;
}

function describeError(error: unknown): string[] {
  if (error instanceof ConformanceError) {
    return [error.message, `Fix: ${error.fix}`];
  }
  if (error instanceof Error) {
    return [error.stack ?? error.message];
  }
  return [String(error)];
}

async function acquireAccount(test: RegisteredTest, adapter: ServerAdapter): Promise<AccountHandle | Unsupported> {
  return test.pristine ? adapter.pristineAccount() : adapter.anyAccount();
}

async function runTest(test: RegisteredTest, adapter: ServerAdapter, logger: Logger): Promise<TestOutcome> {
  const testLogger = logger.child({ test: test.name });
  const recording = new RecordingReporter();
  const reporter = combineReporters(recording, createLogReporter(testLogger));

  let account: AccountHandle | Unsupported;
  try {
    account = await acquireAccount(test, adapter);
  } catch (error) {
    reporter.fail('could not obtain an account', describeError(error));
    return { name: test.name, status: 'fail', entries: recording.entries };
  }

  if (isUnsupported(account)) {
    reporter.skip(test.name, account.reason);
    return { name: test.name, status: 'skip', entries: recording.entries };
  }

  try {
    await test.run({
      name: test.name,
      account,
      reporter,
      logger: testLogger,
      assertion: account.assertionContext(reporter),
    });
  } catch (error) {
    testLogger.error({ err: error }, 'Test aborted');
    reporter.fail('test aborted', describeError(error));
  }

  return { name: test.name, status: recording.passed ? 'pass' : 'fail', entries: recording.entries };
}

/**
 * Run every registered test (optionally filtered by name), in registration
 * order. A failing or aborted test never stops the run.
 */
export async function runSuite(registry: TestRegistry, adapter: ServerAdapter, options: RunOptions): Promise<RunSummary> {
  const filter = options.filter?.toLowerCase();
  const selected = registry
    .list()
    .filter((test) => filter === undefined || test.name.toLowerCase().includes(filter));

  options.logger.info({ tests: selected.length, total: registry.size }, 'Running conformance suite');

  const outcomes: TestOutcome[] = [];
  for (const test of selected) {
    outcomes.push(await runTest(test, adapter, options.logger));
  }

  const count = (status: TestStatus) => outcomes.filter((outcome) => outcome.status === status).length;
  const summary: RunSummary = {
    outcomes,
    passed: count('pass'),
    failed: count('fail'),
    skipped: count('skip'),
  };

  options.logger.info(
    { passed: summary.passed, failed: summary.failed, skipped: summary.skipped },
    'Conformance suite finished'
  );

  return summary;
}

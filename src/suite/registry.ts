/**
 * Test registration. Test modules export a function that takes the registry
 * and declares their tests on it; the CLI assembles the registry at startup.
 */
import type { Logger } from '../config/logger.js';
import type { AssertionContext } from '../harness/assertions.js';
import type { Reporter } from '../harness/reporter.js';
import type { AccountHandle } from './adapter.js';

export interface TestContext {
  name: string;
  account: AccountHandle;
  reporter: Reporter;
  logger: Logger;
  /** Ready-made context for requestAndAssert against `account` */
  assertion: AssertionContext;
}

export type TestFn = (context: TestContext) => Promise<void>;

export interface RegisteredTest {
  name: string;
  /** Needs an account with no pre-existing data; skipped where none is available */
  pristine: boolean;
  run: TestFn;
}

export class TestRegistry {
  private readonly tests = new Map<string, RegisteredTest>();

  /**
   * @throws Error if a test with the same name is already registered
   */
  test(name: string, run: TestFn): this {
    return this.add({ name, pristine: false, run });
  }

  pristineTest(name: string, run: TestFn): this {
    return this.add({ name, pristine: true, run });
  }

  isPristine(name: string): boolean {
    return this.tests.get(name)?.pristine ?? false;
  }

  list(): RegisteredTest[] {
    return [...this.tests.values()];
  }

  get size(): number {
    return this.tests.size;
  }

  private add(test: RegisteredTest): this {
    if (this.tests.has(test.name)) {
      throw new Error(`Test "${test.name}" is already registered`);
    }
    this.tests.set(test.name, test);
    return this;
  }
}

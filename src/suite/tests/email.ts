/**
 * Email conformance tests (RFC 8621 Section 4).
 */
import { requestAndAssert } from '../../harness/assertions.js';
import { supersetOf } from '../../harness/matcher.js';
import type { TestRegistry } from '../registry.js';

export function registerEmailTests(registry: TestRegistry): void {
  registry.pristineTest('Email/query in a pristine account', async ({ account, assertion }) => {
    await requestAndAssert(
      assertion,
      { 'Email/query': { accountId: account.accountId } },
      supersetOf({ ids: [], position: 0 }),
      'Email/query finds no messages in a pristine account'
    );
  });
}

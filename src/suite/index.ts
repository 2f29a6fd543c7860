import { TestRegistry } from './registry.js';
import { registerEmailTests } from './tests/email.js';
import { registerMailboxTests } from './tests/mailbox.js';

/**
 * Assemble the full conformance suite.
 */
export function buildSuite(): TestRegistry {
  const registry = new TestRegistry();
  registerMailboxTests(registry);
  registerEmailTests(registry);
  return registry;
}

import { randomUUID } from 'node:crypto';

/**
 * A name no earlier run will have left behind, so tests can share an account.
 */
export function uniqueName(prefix: string): string {
  return `${prefix} ${randomUUID().slice(0, 8)}`;
}

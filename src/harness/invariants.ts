/**
 * Batch-level invariants every compliant server must satisfy.
 */
import type { Violation } from '../errors.js';
import { loadKnownProperties, objectTypeOf, type KnownProperties } from '../entities/known-properties.js';
import type { BatchResult } from './batch.js';

export interface InvariantOptions {
  strictProperties: boolean;
  /** Defaults to the allowlists shipped in data/known-properties.json */
  knownProperties?: KnownProperties;
}

/** Multiset difference: each id in `right` cancels one occurrence in `left` */
function difference(left: string[], right: string[]): string[] {
  const remaining = new Map<string, number>();
  for (const id of right) {
    remaining.set(id, (remaining.get(id) ?? 0) + 1);
  }
  return left.filter((id) => {
    const count = remaining.get(id) ?? 0;
    if (count === 0) {
      return true;
    }
    remaining.set(id, count - 1);
    return false;
  });
}

/**
 * Every creation id offered in a call must be answered exactly once across
 * `created` and `notCreated`, and nothing else may be answered. Calls whose
 * response is missing or a method-level error are skipped: the first is a
 * correlation problem, the second means no creation was attempted.
 */
function checkCreationIds(batch: BatchResult): Violation[] {
  const violations: Violation[] = [];

  for (const call of batch.calls) {
    const creationIds = batch.creationIdsFor(call.callId);
    if (creationIds.length === 0 || !batch.responseFor(call.callId) || batch.isError(call.callId)) {
      continue;
    }

    const resultIds = batch.resultIdsFor(call.callId);
    const missing = difference(creationIds, resultIds);
    const extra = difference(resultIds, creationIds);
    if (missing.length > 0 || extra.length > 0) {
      violations.push({
        kind: 'CreationIdMismatch',
        callId: call.callId,
        missing,
        extra,
        difference: [...missing, ...extra].sort(),
      });
    }
  }

  return violations;
}

/**
 * Report every created object carrying properties its type does not define.
 * `notCreated` entries are SetErrors, not objects of the type, and are not scanned.
 */
function checkUnknownProperties(batch: BatchResult, known: KnownProperties): Violation[] {
  const violations: Violation[] = [];

  for (const call of batch.calls) {
    const allowed = known.get(objectTypeOf(call.name));
    const creation = batch.creationFor(call.callId);
    if (!allowed || !creation) {
      continue;
    }

    for (const [creationId, result] of creation.createdEntries()) {
      const unknown = Object.keys(result.properties).filter((property) => !allowed.has(property));
      if (unknown.length > 0) {
        violations.push({ kind: 'UnknownProperty', callId: call.callId, creationId, properties: unknown.sort() });
      }
    }
  }

  return violations;
}

export function checkBatchInvariants(batch: BatchResult, options: InvariantOptions): Violation[] {
  const violations = checkCreationIds(batch);
  if (options.strictProperties) {
    violations.push(...checkUnknownProperties(batch, options.knownProperties ?? loadKnownProperties()));
  }
  return violations;
}

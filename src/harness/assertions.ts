/**
 * The "make a request and assert the response" surface tests are written against.
 */
import type { Logger } from '../config/logger.js';
import type { KnownProperties } from '../entities/known-properties.js';
import { ConformanceError, describeViolation, type Violation } from '../errors.js';
import type { BatchResult } from './batch.js';
import type { CreationResolver } from './creation.js';
import { checkBatchInvariants } from './invariants.js';
import { formatMismatch, matches, type Expected } from './matcher.js';
import type { Reporter } from './reporter.js';
import {
  isShorthand,
  sendBatch,
  type BatchRequest,
  type FullCall,
  type ShorthandRequest,
  type Transport,
} from './request.js';

export interface AssertionContext {
  transport: Transport;
  reporter: Reporter;
  logger?: Logger;
  using?: string[];
  strictProperties?: boolean;
  knownProperties?: KnownProperties;
  /** Resolve `#creationId` references in the request against an earlier batch */
  references?: CreationResolver;
}

export interface AssertionOutcome {
  ok: boolean;
  /** Absent when the round trip itself failed */
  batch?: BatchResult;
  violations: Violation[];
}

export interface BatchOkOptions {
  strictProperties?: boolean;
  knownProperties?: KnownProperties;
}

/** Errors that mean the test itself cannot go on, rather than a failed round trip */
const ABORTING_ERRORS = new Set(['malformedResponse', 'invalidRequest', 'unresolvedCreationReference']);

/**
 * Report the batch-level checks for a batch: correlation problems (only when
 * there are any), creation-id coverage (when the batch creates anything) and,
 * in strict mode, unknown properties on created results.
 * @returns true when every reported check passed
 */
export function batchOk(batch: BatchResult, reporter: Reporter, options: BatchOkOptions = {}): boolean {
  let ok = true;

  const correlation = batch.violations.filter((violation) => violation.kind === 'CorrelationMismatch');
  if (correlation.length > 0) {
    ok = false;
    reporter.fail('batch responses correlate one-to-one with calls', correlation.map(describeViolation));
  }

  const invariants = checkBatchInvariants(batch, {
    strictProperties: options.strictProperties ?? false,
    knownProperties: options.knownProperties,
  });

  if (batch.hasCreateSpec()) {
    const mismatches = invariants.filter((violation) => violation.kind === 'CreationIdMismatch');
    if (mismatches.length > 0) {
      ok = false;
      reporter.fail('batch has results for every creation id and nothing more', [
        `creation ids: ${batch.creationIds().join(', ')}`,
        `result ids: ${batch.resultIds().join(', ')}`,
        ...mismatches.map(describeViolation),
      ]);
    } else {
      reporter.pass('batch has results for every creation id and nothing more');
    }
  }

  if (options.strictProperties) {
    const unknown = invariants.filter((violation) => violation.kind === 'UnknownProperty');
    if (unknown.length > 0) {
      ok = false;
      reporter.fail(
        'some batch results have unknown properties',
        unknown.map((violation) => `  ${describeViolation(violation)}`)
      );
    } else {
      reporter.pass('no unknown properties in batch results');
    }
  }

  return ok;
}

/**
 * Send a request and compare each response's arguments with a template.
 *
 * The shorthand form takes one template; the full form takes one per call, by
 * call position, paired with responses through their call ids. A failed round
 * trip is one failed assertion. Malformed responses, badly built requests and
 * references to creations that never happened are thrown, ending the test case.
 */
export async function requestAndAssert(
  context: AssertionContext,
  request: ShorthandRequest,
  expected: Expected,
  description: string
): Promise<AssertionOutcome>;
export async function requestAndAssert(
  context: AssertionContext,
  request: FullCall[],
  expected: Expected[],
  description: string
): Promise<AssertionOutcome>;
export async function requestAndAssert(
  context: AssertionContext,
  request: BatchRequest,
  expected: Expected | Expected[],
  description: string
): Promise<AssertionOutcome> {
  const { reporter } = context;

  let batch: BatchResult;
  try {
    batch = await sendBatch(context.transport, request, {
      using: context.using,
      strictProperties: context.strictProperties,
      knownProperties: context.knownProperties,
      references: context.references,
      logger: context.logger,
    });
  } catch (error) {
    if (error instanceof ConformanceError && !ABORTING_ERRORS.has(error.type)) {
      reporter.fail(description, [error.message, `Fix: ${error.fix}`]);
      return { ok: false, violations: [] };
    }
    throw error;
  }

  const templates: Expected[] = isShorthand(request) ? [expected] : Array.isArray(expected) ? expected : [];
  if (templates.length !== batch.calls.length) {
    throw ConformanceError.invalidRequest(
      `${batch.calls.length} calls were sent but ${templates.length} expected templates were given`
    );
  }

  const violations: Violation[] = [];
  const diagnostics: string[] = [];

  batch.calls.forEach((call, index) => {
    const response = batch.responseFor(call.callId);
    if (!response) {
      violations.push({ kind: 'CorrelationMismatch', reason: 'missing', callId: call.callId });
      diagnostics.push(`${call.name} (${call.callId}): no matching response`);
      return;
    }

    const result = matches(response.arguments, templates[index]);
    if (!result.ok) {
      violations.push({
        kind: 'StructuralMismatch',
        callId: call.callId,
        path: result.path,
        reason: result.reason,
        expected: result.expected,
        actual: result.actual,
      });
      diagnostics.push(`${call.name} (${call.callId}) answered ${response.name}: ${formatMismatch(result)}`);
    }
  });

  if (diagnostics.length > 0) {
    reporter.fail(description, [...diagnostics, 'decoded batch:', batch.dump()]);
  } else {
    reporter.pass(description);
  }

  const invariantsOk = batchOk(batch, reporter, {
    strictProperties: context.strictProperties,
    knownProperties: context.knownProperties,
  });

  const batchViolations = batch.violations.filter(
    (violation) => !(violation.kind === 'CorrelationMismatch' && violation.reason === 'missing')
  );

  return {
    ok: diagnostics.length === 0 && invariantsOk,
    batch,
    violations: [...violations, ...batchViolations],
  };
}

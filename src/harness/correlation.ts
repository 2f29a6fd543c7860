/**
 * Pairs the calls of a batch with their responses by call id.
 *
 * Servers may answer out of order, so position is never used. Whatever cannot
 * be paired is reported rather than thrown: a missing or duplicated response is
 * exactly the kind of non-conformance a test run exists to surface.
 */
import type { Violation } from '../errors.js';
import type { MethodCall, MethodResponse } from '../types/jmap.js';

export interface CorrelationReport {
  /** First response seen for each call id that was sent */
  byCallId: Map<string, MethodResponse>;
  /** Call ids with no response, in call order */
  missing: string[];
  /** Response call ids that match no call, in response order */
  extra: string[];
  /** Call ids answered more than once, in response order */
  duplicates: string[];
}

export function resolveCorrelation(
  calls: readonly MethodCall[],
  responses: readonly MethodResponse[]
): CorrelationReport {
  const seen = new Map<string, MethodResponse>();
  const duplicates: string[] = [];

  for (const response of responses) {
    if (seen.has(response.callId)) {
      if (!duplicates.includes(response.callId)) {
        duplicates.push(response.callId);
      }
      continue;
    }
    seen.set(response.callId, response);
  }

  const sentIds = new Set(calls.map((call) => call.callId));
  const byCallId = new Map<string, MethodResponse>();
  const missing: string[] = [];

  for (const call of calls) {
    const response = seen.get(call.callId);
    if (response) {
      byCallId.set(call.callId, response);
    } else {
      missing.push(call.callId);
    }
  }

  const extra = [...seen.keys()].filter((callId) => !sentIds.has(callId));

  return { byCallId, missing, extra, duplicates };
}

export function correlationViolations(report: CorrelationReport): Violation[] {
  return [
    ...report.missing.map((callId): Violation => ({ kind: 'CorrelationMismatch', reason: 'missing', callId })),
    ...report.duplicates.map((callId): Violation => ({ kind: 'CorrelationMismatch', reason: 'duplicate', callId })),
    ...report.extra.map((callId): Violation => ({ kind: 'CorrelationMismatch', reason: 'extra', callId })),
  ];
}

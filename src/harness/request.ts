/**
 * Request orchestration: normalise the request forms tests write, send the
 * batch through a transport, and check what comes back.
 */
import { z } from 'zod';
import type { Logger } from '../config/logger.js';
import type { KnownProperties } from '../entities/known-properties.js';
import { ConformanceError, describeViolation } from '../errors.js';
import type { JMAPArguments, JMAPMethodCall, MethodCall, MethodResponse } from '../types/jmap.js';
import { BatchResult } from './batch.js';
import { substituteCreationReferences, type CreationResolver } from './creation.js';
import { isPlainObject } from './matcher.js';

/** Default JMAP capabilities for mail operations */
export const DEFAULT_USING = ['urn:ietf:params:jmap:core', 'urn:ietf:params:jmap:mail'];

/** Call id given to the only call of a shorthand request */
export const SHORTHAND_CALL_ID = 'single';

/** `{ 'Mailbox/get': { accountId, ids } }`: exactly one method, call id assigned */
export type ShorthandRequest = { [methodName: string]: JMAPArguments };

/** `[name, arguments, callId?]`; omitted call ids are assigned `c0`, `c1`, ... */
export type FullCall = [methodName: string, args: JMAPArguments, callId?: string];

export type BatchRequest = ShorthandRequest | FullCall[];

/**
 * Anything that can carry a batch to the server under test and bring back the
 * decoded response body. Transports throw on failure; they never retry.
 */
export interface Transport {
  send(methodCalls: JMAPMethodCall[], using: string[]): Promise<unknown>;
}

export interface SendOptions {
  using?: string[];
  /** Also run the unknown-property scan on created results */
  strictProperties?: boolean;
  knownProperties?: KnownProperties;
  /** Replace `#creationId` references with ids created by an earlier batch */
  references?: CreationResolver;
  logger?: Logger;
}

const responseEnvelopeSchema = z.object({
  methodResponses: z.array(z.tuple([z.string(), z.record(z.string(), z.unknown()), z.string()])),
  sessionState: z.string().optional(),
});

export function isShorthand(request: BatchRequest): request is ShorthandRequest {
  return !Array.isArray(request);
}

function freezeCall(name: string, args: JMAPArguments, callId: string): MethodCall {
  return Object.freeze({ name, arguments: Object.freeze({ ...args }), callId });
}

/**
 * Turn either request form into calls with settled call ids.
 * @throws ConformanceError (type `invalidRequest`) for empty requests, duplicate
 * call ids and arguments that are not objects
 */
export function normalizeRequest(request: BatchRequest): MethodCall[] {
  if (isShorthand(request)) {
    const methods = Object.keys(request);
    if (methods.length !== 1) {
      throw ConformanceError.invalidRequest(`shorthand form takes exactly one method, got ${methods.length}`);
    }
    const [name] = methods;
    const args = request[name];
    if (!isPlainObject(args)) {
      throw ConformanceError.invalidRequest(`arguments for ${name} must be an object`);
    }
    return [freezeCall(name, args, SHORTHAND_CALL_ID)];
  }

  if (request.length === 0) {
    throw ConformanceError.invalidRequest('a batch needs at least one call');
  }

  const used = new Set<string>();
  for (const [name, , callId] of request) {
    if (callId === undefined) {
      continue;
    }
    if (used.has(callId)) {
      throw ConformanceError.invalidRequest(`call id "${callId}" is used by more than one call (${name})`);
    }
    used.add(callId);
  }

  let next = 0;
  const assignId = (): string => {
    while (used.has(`c${next}`)) {
      next++;
    }
    const callId = `c${next}`;
    used.add(callId);
    return callId;
  };

  return request.map(([name, args, callId]) => {
    if (!isPlainObject(args)) {
      throw ConformanceError.invalidRequest(`arguments for ${name} must be an object`);
    }
    return freezeCall(name, args, callId ?? assignId());
  });
}

/**
 * Rewrite creation references in every call against an earlier batch's results.
 * @throws ConformanceError (type `unresolvedCreationReference`) for a reference
 * to a creation the earlier batch did not complete
 */
export function applyCreationReferences(calls: MethodCall[], references: CreationResolver): MethodCall[] {
  return calls.map((call) => {
    const { args, unresolved } = substituteCreationReferences(call.arguments, references);
    for (const creationId of unresolved) {
      const result = references.resolve(creationId);
      if (!result.success) {
        throw result.error;
      }
    }
    return freezeCall(call.name, args, call.callId);
  });
}

/**
 * Check a decoded response body and turn it into method responses.
 * @throws ConformanceError (type `malformedResponse`) when the body is not a JMAP response
 */
export function parseResponseEnvelope(body: unknown): { responses: MethodResponse[]; sessionState?: string } {
  const parsed = responseEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(body)'}: ${issue.message}`)
      .join('; ');
    throw ConformanceError.malformedResponse(detail);
  }

  const responses = parsed.data.methodResponses.map(
    ([name, args, callId]): MethodResponse => Object.freeze({ name, arguments: Object.freeze(args), callId })
  );
  return { responses, sessionState: parsed.data.sessionState };
}

/**
 * Send one batch and check it.
 *
 * Transport failures, malformed bodies and unresolvable creation references are
 * thrown as ConformanceErrors; every other problem ends up in `BatchResult.violations`.
 */
export async function sendBatch(
  transport: Transport,
  request: BatchRequest,
  options: SendOptions = {}
): Promise<BatchResult> {
  const normalized = normalizeRequest(request);
  const calls = options.references ? applyCreationReferences(normalized, options.references) : normalized;
  const methodCalls = calls.map((call): JMAPMethodCall => [call.name, { ...call.arguments }, call.callId]);

  options.logger?.debug(
    { methodCount: calls.length, methods: calls.map((call) => call.name) },
    'Sending JMAP batch'
  );

  let body: unknown;
  try {
    body = await transport.send(methodCalls, options.using ?? DEFAULT_USING);
  } catch (error) {
    throw ConformanceError.transportFailure(error);
  }

  const { responses, sessionState } = parseResponseEnvelope(body);
  const batch = new BatchResult(calls, responses, {
    sessionState,
    strictProperties: options.strictProperties,
    knownProperties: options.knownProperties,
  });

  if (batch.violations.length > 0) {
    options.logger?.debug(
      { violations: batch.violations.map(describeViolation) },
      'Batch violates protocol invariants'
    );
  }

  return batch;
}

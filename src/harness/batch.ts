/**
 * A sent batch together with everything the harness learned from its responses.
 */
import { type Violation } from '../errors.js';
import type { KnownProperties } from '../entities/known-properties.js';
import type { MethodCall, MethodResponse } from '../types/jmap.js';
import { correlationViolations, resolveCorrelation, type CorrelationReport } from './correlation.js';
import { CreationResolver, extractCreateSpec, extractResultIds, type ResolveResult } from './creation.js';
import { checkBatchInvariants } from './invariants.js';

export interface BatchResultOptions {
  sessionState?: string;
  /** Scan created results for properties outside the known-property allowlists */
  strictProperties?: boolean;
  knownProperties?: KnownProperties;
}

export class BatchResult {
  readonly calls: readonly MethodCall[];
  readonly responses: readonly MethodResponse[];
  readonly sessionState: string | undefined;
  readonly correlation: CorrelationReport;
  /** Correlation problems first, then batch invariant violations */
  readonly violations: readonly Violation[];

  private readonly creations = new Map<string, CreationResolver>();
  private readonly resolver = new CreationResolver();

  constructor(calls: readonly MethodCall[], responses: readonly MethodResponse[], options: BatchResultOptions = {}) {
    this.calls = calls;
    this.responses = responses;
    this.sessionState = options.sessionState;
    this.correlation = resolveCorrelation(calls, responses);

    for (const call of calls) {
      const response = this.correlation.byCallId.get(call.callId);
      if (response && response.name !== 'error') {
        const creation = new CreationResolver().add(response.arguments);
        this.creations.set(call.callId, creation);
        this.resolver.add(response.arguments);
      }
    }

    this.violations = [
      ...correlationViolations(this.correlation),
      ...checkBatchInvariants(this, {
        strictProperties: options.strictProperties ?? false,
        knownProperties: options.knownProperties,
      }),
    ];
  }

  get ok(): boolean {
    return this.violations.length === 0;
  }

  responseFor(callId: string): MethodResponse | undefined {
    return this.correlation.byCallId.get(callId);
  }

  /** True when the call was answered with a method-level `error` response */
  isError(callId: string): boolean {
    return this.responseFor(callId)?.name === 'error';
  }

  callFor(callId: string): MethodCall | undefined {
    return this.calls.find((call) => call.callId === callId);
  }

  /** Creation ids offered in one call's `create` argument, sorted */
  creationIdsFor(callId: string): string[] {
    const call = this.callFor(callId);
    return call ? [...extractCreateSpec(call.arguments).keys()].sort() : [];
  }

  /**
   * Creation ids answered in one response's `created` or `notCreated`, sorted.
   * An id answered in both maps is listed twice.
   */
  resultIdsFor(callId: string): string[] {
    const response = this.responseFor(callId);
    return response && response.name !== 'error' ? extractResultIds(response.arguments).sort() : [];
  }

  hasCreateSpec(): boolean {
    return this.calls.some((call) => extractCreateSpec(call.arguments).size > 0);
  }

  /** Creation ids offered anywhere in the batch, sorted */
  creationIds(): string[] {
    return this.calls.flatMap((call) => this.creationIdsFor(call.callId)).sort();
  }

  /** Creation ids answered anywhere in the batch, sorted */
  resultIds(): string[] {
    return this.calls.flatMap((call) => this.resultIdsFor(call.callId)).sort();
  }

  /** Creation results of one call, when it was answered without a method error */
  creationFor(callId: string): CreationResolver | undefined {
    return this.creations.get(callId);
  }

  /** Batch-wide resolver; the first response answering a creation id wins */
  get creation(): CreationResolver {
    return this.resolver;
  }

  resolveCreatedId(creationId: string): ResolveResult {
    return this.resolver.resolve(creationId);
  }

  /**
   * Server id assigned to a creation id anywhere in the batch.
   * @throws ConformanceError (type `unresolvedCreationReference`) when the creation did not succeed
   */
  createdId(creationId: string): string {
    return this.resolver.createdId(creationId);
  }

  /**
   * The decoded batch, pretty-printed for diagnostics.
   */
  dump(): string {
    return JSON.stringify(
      {
        methodCalls: this.calls.map((call) => [call.name, call.arguments, call.callId]),
        methodResponses: this.responses.map((response) => [response.name, response.arguments, response.callId]),
      },
      null,
      2
    );
  }
}

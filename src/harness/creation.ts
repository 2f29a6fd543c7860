/**
 * Creation-id resolution for `/set` calls.
 *
 * A `/set` call offers objects under client-chosen creation ids; the response
 * answers each one in `created` (with the server-assigned id) or `notCreated`
 * (with a SetError). The resolver makes those answers available right after the
 * round trip, for assertions and for building the next batch.
 */
import { ConformanceError } from '../errors.js';
import type { JMAPArguments, SetError } from '../types/jmap.js';
import { isPlainObject } from './matcher.js';

export interface CreatedResult {
  /** The created object's `id`, or null when the server did not return a string id */
  serverId: string | null;
  /** Everything the server returned for the created object, `id` included */
  properties: Readonly<Record<string, unknown>>;
}

export type ResolveResult = { success: true; id: string } | { success: false; error: ConformanceError };

function objectEntries(args: Readonly<JMAPArguments>, key: string): [string, unknown][] {
  const value = args[key];
  return isPlainObject(value) ? Object.entries(value) : [];
}

/**
 * Extract the creation spec (`create` argument) of a `/set` call.
 */
export function extractCreateSpec(args: Readonly<JMAPArguments>): Map<string, Record<string, unknown>> {
  const spec = new Map<string, Record<string, unknown>>();
  for (const [creationId, properties] of objectEntries(args, 'create')) {
    spec.set(creationId, isPlainObject(properties) ? properties : {});
  }
  return spec;
}

/**
 * Extract the `created` map of a `/set` response.
 */
export function extractCreated(args: Readonly<JMAPArguments>): Map<string, CreatedResult> {
  const created = new Map<string, CreatedResult>();
  for (const [creationId, value] of objectEntries(args, 'created')) {
    // A server may answer `null` when it has nothing beyond the id to report,
    // which is itself a conformance problem, surfaced as a null serverId
    const properties = isPlainObject(value) ? value : {};
    const id = properties.id;
    created.set(creationId, {
      serverId: typeof id === 'string' ? id : null,
      properties,
    });
  }
  return created;
}

/**
 * Extract the `notCreated` map of a `/set` response.
 */
export function extractNotCreated(args: Readonly<JMAPArguments>): Map<string, SetError> {
  const notCreated = new Map<string, SetError>();
  for (const [creationId, value] of objectEntries(args, 'notCreated')) {
    const detail = isPlainObject(value) ? value : {};
    const error: SetError = { type: typeof detail.type === 'string' ? detail.type : 'unknown' };
    if (typeof detail.description === 'string') {
      error.description = detail.description;
    }
    if (Array.isArray(detail.properties)) {
      error.properties = detail.properties.filter((property): property is string => typeof property === 'string');
    }
    notCreated.set(creationId, error);
  }
  return notCreated;
}

/**
 * Keys of `created` followed by keys of `notCreated`, as the response lists
 * them. An id answered in both maps appears twice.
 */
export function extractResultIds(args: Readonly<JMAPArguments>): string[] {
  return [...objectEntries(args, 'created'), ...objectEntries(args, 'notCreated')].map(([creationId]) => creationId);
}

export class CreationResolver {
  private readonly created = new Map<string, CreatedResult>();
  private readonly notCreated = new Map<string, SetError>();

  /**
   * Record the answers of one `/set` response. When two responses answer the
   * same creation id, the first one recorded wins.
   */
  add(args: Readonly<JMAPArguments>): this {
    for (const [creationId, result] of extractCreated(args)) {
      if (!this.knows(creationId)) {
        this.created.set(creationId, result);
      }
    }
    for (const [creationId, error] of extractNotCreated(args)) {
      if (!this.knows(creationId)) {
        this.notCreated.set(creationId, error);
      }
    }
    return this;
  }

  knows(creationId: string): boolean {
    return this.created.has(creationId) || this.notCreated.has(creationId);
  }

  /** Created results in the order the server listed them */
  createdEntries(): [string, CreatedResult][] {
    return [...this.created.entries()];
  }

  createdResult(creationId: string): CreatedResult | undefined {
    return this.created.get(creationId);
  }

  notCreatedError(creationId: string): SetError | undefined {
    return this.notCreated.get(creationId);
  }

  /**
   * Look up the server id assigned to a creation id.
   * Callers must check `success` before using the id.
   */
  resolve(creationId: string): ResolveResult {
    const result = this.created.get(creationId);
    if (result) {
      if (result.serverId === null) {
        return {
          success: false,
          error: ConformanceError.unresolvedCreationReference(creationId, 'the server returned no string id'),
        };
      }
      return { success: true, id: result.serverId };
    }

    const error = this.notCreated.get(creationId);
    if (error) {
      const reason = error.description
        ? `the server rejected it (${error.type}: ${error.description})`
        : `the server rejected it (${error.type})`;
      return { success: false, error: ConformanceError.unresolvedCreationReference(creationId, reason) };
    }

    return {
      success: false,
      error: ConformanceError.unresolvedCreationReference(creationId, 'no response in this batch mentions it'),
    };
  }

  /**
   * Server id assigned to a creation id.
   * @throws ConformanceError (type `unresolvedCreationReference`) when the creation did not succeed
   */
  createdId(creationId: string): string {
    const result = this.resolve(creationId);
    if (!result.success) {
      throw result.error;
    }
    return result.id;
  }

}

export interface SubstitutionResult {
  args: JMAPArguments;
  /** Creation ids referenced with `#` that this resolver knows but could not resolve */
  unresolved: string[];
}

/**
 * Replace `#creationId` references with server ids, in values and in object
 * keys (as in `mailboxIds: { "#new": true }`), for use in a later batch.
 * Strings naming a creation id the resolver has never seen are left alone.
 */
export function substituteCreationReferences(
  args: Readonly<JMAPArguments>,
  resolver: CreationResolver
): SubstitutionResult {
  const unresolved: string[] = [];

  const substitute = (text: string): string => {
    if (!text.startsWith('#') || text.length < 2) {
      return text;
    }
    const creationId = text.slice(1);
    if (!resolver.knows(creationId)) {
      return text;
    }
    const result = resolver.resolve(creationId);
    if (result.success) {
      return result.id;
    }
    if (!unresolved.includes(creationId)) {
      unresolved.push(creationId);
    }
    return text;
  };

  const walkObject = (value: Readonly<Record<string, unknown>>): Record<string, unknown> => {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[substitute(key)] = walk(entry);
    }
    return out;
  };

  const walk = (value: unknown): unknown => {
    if (typeof value === 'string') {
      return substitute(value);
    }
    if (Array.isArray(value)) {
      return value.map(walk);
    }
    if (isPlainObject(value)) {
      return walkObject(value);
    }
    return value;
  };

  return { args: walkObject(args), unresolved };
}

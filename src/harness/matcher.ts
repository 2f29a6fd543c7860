/**
 * Structural matcher for JMAP response arguments.
 *
 * A template is either plain JSON (compared exactly, recursively) or one of a
 * small set of tagged nodes that loosen or tighten the comparison at that point:
 * typed literals assert the JSON type as well as the value, superset nodes
 * accept extra keys, and sequence nodes compare arrays in or out of order.
 */
import { formatPath, type PathSegment } from '../errors.js';
import type { JSONValue } from '../types/jmap.js';

const TEMPLATE: unique symbol = Symbol('jmap-conformance.template');

/** JSON types a typed literal can assert */
export type JSONKind = 'string' | 'number' | 'bool' | 'null';

/** JSON types an actual value can have, plus `undefined` for an absent value */
export type ActualKind = JSONKind | 'array' | 'object' | 'undefined';

export interface LiteralTemplate {
  readonly [TEMPLATE]: true;
  readonly match: 'literal';
  readonly value: JSONValue;
}

export interface TypedLiteralTemplate {
  readonly [TEMPLATE]: true;
  readonly match: 'typed';
  readonly kind: JSONKind;
  readonly hasValue: boolean;
  readonly value?: string | number | boolean | null;
}

export interface SupersetOfTemplate {
  readonly [TEMPLATE]: true;
  readonly match: 'superset';
  readonly required: { [key: string]: Expected };
}

export interface SequenceTemplate {
  readonly [TEMPLATE]: true;
  readonly match: 'sequence';
  readonly items: Expected[];
  readonly ordered: boolean;
}

export type TemplateNode = LiteralTemplate | TypedLiteralTemplate | SupersetOfTemplate | SequenceTemplate;

/** An expected shape: plain JSON with template nodes allowed at any depth */
export type Expected = TemplateNode | null | boolean | number | string | Expected[] | { [key: string]: Expected };

export interface MatchFailure {
  ok: false;
  path: PathSegment[];
  reason: string;
  /** Description of what the template wanted at `path` */
  expected: string;
  actual: unknown;
}

export type MatchResult = { ok: true } | MatchFailure;

const OK: MatchResult = { ok: true };

export function literal(value: JSONValue): LiteralTemplate {
  return { [TEMPLATE]: true, match: 'literal', value };
}

function typed(kind: JSONKind, args: unknown[]): TypedLiteralTemplate {
  if (args.length === 0) {
    return { [TEMPLATE]: true, match: 'typed', kind, hasValue: false };
  }
  const [value] = args;
  if (
    value !== null &&
    typeof value !== 'string' &&
    typeof value !== 'number' &&
    typeof value !== 'boolean'
  ) {
    throw new TypeError(`typed literal value must be a scalar, got ${typeof value}`);
  }
  return { [TEMPLATE]: true, match: 'typed', kind, hasValue: true, value };
}

/** Any JSON string, or exactly `value` as a JSON string */
export function jstr(...value: [] | [string]): TypedLiteralTemplate {
  return typed('string', value);
}

/** Any JSON number, or exactly `value` as a JSON number */
export function jnum(...value: [] | [number]): TypedLiteralTemplate {
  return typed('number', value);
}

/** Any JSON boolean, or exactly `value` as a JSON boolean */
export function jbool(...value: [] | [boolean]): TypedLiteralTemplate {
  return typed('bool', value);
}

export function jtrue(): TypedLiteralTemplate {
  return jbool(true);
}

export function jfalse(): TypedLiteralTemplate {
  return jbool(false);
}

export function jnull(): TypedLiteralTemplate {
  return typed('null', []);
}

/** An object holding at least `required`; other keys are ignored */
export function supersetOf(required: { [key: string]: Expected }): SupersetOfTemplate {
  return { [TEMPLATE]: true, match: 'superset', required };
}

/** An array matching `items` element by element */
export function sequence(items: Expected[]): SequenceTemplate {
  return { [TEMPLATE]: true, match: 'sequence', items, ordered: true };
}

/** An array of the same length whose elements match `items` in any order */
export function bagOf(items: Expected[]): SequenceTemplate {
  return { [TEMPLATE]: true, match: 'sequence', items, ordered: false };
}

export function isTemplateNode(value: unknown): value is TemplateNode {
  return typeof value === 'object' && value !== null && TEMPLATE in value;
}

export function kindOf(value: unknown): ActualKind {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'bool';
    default:
      return 'object';
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return kindOf(value) === 'object';
}

function show(value: unknown): string {
  if (value === undefined) {
    return 'nothing';
  }
  return JSON.stringify(value);
}

/**
 * Human-readable description of a template, used in mismatch reports.
 */
export function describeExpected(expected: Expected): string {
  if (!isTemplateNode(expected)) {
    return show(expected);
  }
  switch (expected.match) {
    case 'literal':
      return show(expected.value);
    case 'typed':
      return expected.hasValue ? `${expected.kind} ${show(expected.value)}` : `any ${expected.kind}`;
    case 'superset':
      return `object with at least {${Object.keys(expected.required).join(', ')}}`;
    case 'sequence':
      return `${expected.ordered ? 'sequence' : 'bag'} of ${expected.items.length} elements`;
  }
}

function fail(path: PathSegment[], reason: string, expected: string, actual: unknown): MatchFailure {
  return { ok: false, path, reason, expected, actual };
}

/** Checks the JSON type of `actual`, then its value when one is given */
function matchScalar(
  actual: unknown,
  kind: JSONKind,
  hasValue: boolean,
  value: string | number | boolean | null | undefined,
  path: PathSegment[],
  description: string
): MatchResult {
  if (kindOf(actual) !== kind) {
    return fail(path, 'type mismatch', description, actual);
  }
  if (hasValue && actual !== value) {
    return fail(path, 'value mismatch', description, actual);
  }
  return OK;
}

function scalarKind(value: string | number | boolean | null): JSONKind {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'bool';
  return typeof value === 'string' ? 'string' : 'number';
}

function matchObject(
  actual: unknown,
  expected: { [key: string]: Expected },
  allowExtra: boolean,
  path: PathSegment[],
  description: string
): MatchResult {
  if (!isPlainObject(actual)) {
    return fail(path, 'type mismatch', description, actual);
  }

  for (const [key, value] of Object.entries(expected)) {
    if (!Object.hasOwn(actual, key)) {
      return fail([...path, key], 'missing key', describeExpected(value), undefined);
    }
    const result = matchAt(actual[key], value, [...path, key]);
    if (!result.ok) {
      return result;
    }
  }

  if (!allowExtra) {
    for (const key of Object.keys(actual)) {
      if (!Object.hasOwn(expected, key)) {
        return fail([...path, key], 'unexpected key', 'nothing', actual[key]);
      }
    }
  }

  return OK;
}

function matchSequence(
  actual: unknown,
  items: Expected[],
  ordered: boolean,
  path: PathSegment[],
  description: string
): MatchResult {
  if (!Array.isArray(actual)) {
    return fail(path, 'type mismatch', description, actual);
  }
  if (actual.length !== items.length) {
    return fail(
      path,
      `length mismatch: expected ${items.length} elements, got ${actual.length}`,
      description,
      actual
    );
  }

  if (ordered) {
    for (let i = 0; i < items.length; i++) {
      const result = matchAt(actual[i], items[i], [...path, i]);
      if (!result.ok) {
        return result;
      }
    }
    return OK;
  }

  const unmatched = assignElements(actual, items);
  if (unmatched !== undefined) {
    return fail([...path, unmatched], 'no remaining element matches', describeExpected(items[unmatched]), actual);
  }
  return OK;
}

/**
 * Pairs every template with a distinct element it matches, using augmenting
 * paths so an early broad template never starves a later narrow one.
 * Returns the index of the first template left without an element.
 */
function assignElements(actual: unknown[], items: Expected[]): number | undefined {
  const candidates = items.map((item) =>
    actual.flatMap((element, index) => (matchAt(element, item, []).ok ? [index] : []))
  );
  const owner = new Map<number, number>();

  const augment = (item: number, visited: Set<number>): boolean => {
    for (const element of candidates[item]) {
      if (visited.has(element)) {
        continue;
      }
      visited.add(element);
      const current = owner.get(element);
      if (current === undefined || augment(current, visited)) {
        owner.set(element, item);
        return true;
      }
    }
    return false;
  };

  for (let i = 0; i < items.length; i++) {
    if (!augment(i, new Set())) {
      return i;
    }
  }
  return undefined;
}

function matchAt(actual: unknown, expected: Expected, path: PathSegment[]): MatchResult {
  const description = describeExpected(expected);

  if (isTemplateNode(expected)) {
    switch (expected.match) {
      case 'literal':
        return matchAt(actual, expected.value, path);
      case 'typed':
        return matchScalar(actual, expected.kind, expected.hasValue, expected.value, path, description);
      case 'superset':
        return matchObject(actual, expected.required, true, path, description);
      case 'sequence':
        return matchSequence(actual, expected.items, expected.ordered, path, description);
    }
  }

  if (expected === null || typeof expected !== 'object') {
    return matchScalar(actual, scalarKind(expected), true, expected, path, description);
  }
  if (Array.isArray(expected)) {
    return matchSequence(actual, expected, true, path, description);
  }
  return matchObject(actual, expected, false, path, description);
}

/**
 * Compare a decoded JSON value against an expected template.
 * Stops at the first mismatch and reports where it happened.
 */
export function matches(actual: unknown, expected: Expected): MatchResult {
  return matchAt(actual, expected, []);
}

/**
 * Render a failed match as one diagnostic line.
 * @example `$.created.new.id: type mismatch (expected any string, got 42)`
 */
export function formatMismatch(failure: MatchFailure): string {
  return `${formatPath(failure.path)}: ${failure.reason} (expected ${failure.expected}, got ${show(failure.actual)})`;
}

/**
 * Known-property allowlists per JMAP object type (RFC 8621), used by the
 * strict-mode scan for properties a server returns but the protocol does not define.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';

const knownPropertiesSchema = z.record(z.string(), z.array(z.string()));

export type KnownProperties = ReadonlyMap<string, ReadonlySet<string>>;

/** Lives at the package root so both src/ and dist/ resolve it the same way */
const DATA_URL = new URL('../../data/known-properties.json', import.meta.url);

let cached: KnownProperties | null = null;

/**
 * Parse an allowlist document: an object mapping type names to property names.
 * @throws ZodError if the document has the wrong shape
 */
export function parseKnownProperties(document: unknown): KnownProperties {
  const parsed = knownPropertiesSchema.parse(document);
  return new Map(Object.entries(parsed).map(([type, properties]) => [type, new Set(properties)]));
}

/**
 * Allowlists shipped with the harness, loaded once.
 */
export function loadKnownProperties(): KnownProperties {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(DATA_URL, 'utf-8'));
    cached = parseKnownProperties(raw);
  }
  return cached;
}

/**
 * Allowlist for one object type, or undefined when the harness has none.
 */
export function knownProperties(type: string): ReadonlySet<string> | undefined {
  return loadKnownProperties().get(type);
}

/** `Mailbox/set` -> `Mailbox` */
export function objectTypeOf(methodName: string): string {
  const slash = methodName.indexOf('/');
  return slash === -1 ? methodName : methodName.slice(0, slash);
}

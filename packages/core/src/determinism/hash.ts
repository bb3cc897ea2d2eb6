import { createHash } from 'node:crypto';
import { InvalidInput } from '../errors.js';

/**
 * Identifies the hash construction. Bump when the algorithm or the canonical
 * encoding changes, since snapshot ids and evidence ids depend on both.
 */
export const HASH_VERSION = 'sha256-v1';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue | undefined };

/** SHA-256 hex digest of a string (UTF-8) or raw bytes. */
export function stableHash(input: string | Uint8Array): string {
  return createHash('sha256').update(input).digest('hex');
}

/** First 64 bits of the digest as an unsigned integer. */
export function stableHash64(input: string | Uint8Array): bigint {
  return BigInt(`0x${stableHash(input).slice(0, 16)}`);
}

/** Map input to [0, 1) using 52 bits of the digest. */
export function hashToUnit(input: string | Uint8Array): number {
  const bits = parseInt(stableHash(input).slice(0, 13), 16);
  return bits / 2 ** 52;
}

/**
 * JSON with object keys sorted by code unit and no whitespace.
 * Undefined object members are omitted; non-finite numbers are rejected.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidInput('nan/inf value in canonical input');
    }
    return JSON.stringify(value);
  }
  if (isJsonArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  const members: string[] = [];
  for (const key of keys) {
    const member = value[key];
    if (member === undefined) continue;
    members.push(`${JSON.stringify(key)}:${canonicalJson(member)}`);
  }
  return `{${members.join(',')}}`;
}

export function canonicalHash(value: JsonValue): string {
  return stableHash(canonicalJson(value));
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

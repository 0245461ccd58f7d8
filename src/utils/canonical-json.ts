/**
 * Canonical JSON
 *
 * Flow documents and archive manifests are hashed and compared byte for byte,
 * so their serialization must not depend on key insertion order. Keys are
 * emitted in code-unit order at every depth.
 */

import type { JsonObject, JsonValue } from '../types/index.js';
import { isJsonObject } from '../types/index.js';

/**
 * Convert a parsed YAML/JSON value into a plain JSON value.
 * Dates become ISO strings, undefined object members are dropped,
 * and non-finite numbers become null (matching JSON.stringify).
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item));
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, member] of Object.entries(value)) {
      if (member === undefined || typeof member === 'function' || typeof member === 'symbol') continue;
      result[key] = toJsonValue(member);
    }
    return result;
  }
  throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
}

/**
 * Deep copy with object keys sorted
 */
export function canonicalizeJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(item => canonicalizeJson(item));
  }
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      result[key] = canonicalizeJson(value[key]);
    }
    return result;
  }
  return value;
}

/**
 * Serialize with sorted keys and no insignificant whitespace.
 * Written out by hand because JS objects always enumerate integer-like keys
 * first, whatever order they were inserted in.
 */
export function stringifyCanonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => stringifyCanonicalJson(item)).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const members = Object.keys(value)
      .sort()
      .map(key => `${JSON.stringify(key)}:${stringifyCanonicalJson(value[key])}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Escape one JSON pointer reference token (RFC 6901)
 */
export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function jsonPointer(...tokens: string[]): string {
  return tokens.map(token => `/${escapePointerToken(token)}`).join('');
}

/**
 * Hash Utilities Module
 * Content hashing for artifacts, flow documents and archive manifests
 */

import { blake3 } from 'hash-wasm';
import { HASH_SCHEME } from '../constants/index.js';

/**
 * blake3 digest of the given bytes or text, as lower-case hex
 */
export async function blake3Hex(content: string | Uint8Array): Promise<string> {
  return blake3(content);
}

/**
 * Prefixed digest as stored in component manifests (`blake3:<hex>`)
 */
export async function contentHash(content: string | Uint8Array): Promise<string> {
  return `${HASH_SCHEME}:${await blake3Hex(content)}`;
}

/**
 * Strip a hash-scheme prefix such as `blake3:` and lower-case the digest
 */
export function normalizeHashHex(hash: string): string {
  const separator = hash.indexOf(':');
  const digest = separator === -1 ? hash : hash.slice(separator + 1);
  return digest.trim().toLowerCase();
}

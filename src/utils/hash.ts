/**
 * SHA3-256 Hashing Utilities
 * @module utils/hash
 */

import sha3 from 'js-sha3';
const { sha3_256 } = sha3;
import type { SHA3Hash } from '../types/index.js';

/**
 * Compute SHA3-256 hash of a string
 * @returns 64-character hex hash string
 */
export function hash(data: string): SHA3Hash {
  return sha3_256(data);
}

/**
 * JSON with object keys sorted at every depth. Undefined fields are dropped,
 * as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(v => (v === undefined ? 'null' : canonicalJson(v))).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Hash of the canonical JSON form; independent of key order
 */
export function hashObject(obj: unknown): SHA3Hash {
  return hash(canonicalJson(obj));
}

/**
 * Verify an object against an expected hash
 */
export function verifyObjectHash(obj: unknown, expectedHash: SHA3Hash): boolean {
  return hashObject(obj) === expectedHash;
}

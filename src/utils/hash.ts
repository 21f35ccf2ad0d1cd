/**
 * Hashing utilities for run fingerprints
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const keys = Object.keys(obj).sort();
  const pairs = keys.map(
    (key) => JSON.stringify(key) + ':' + stableStringify(Reflect.get(obj, key))
  );
  return '{' + pairs.join(',') + '}';
}

export function contentHash(content: unknown): string {
  return sha256(stableStringify(content));
}

/**
 * Clinical Rules - Hash Utilities
 *
 * Deterministic hashing for catalog content.
 */

import { createHash } from 'crypto';

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    // Array order is meaningful (declaration order), only keys are sorted
    return value.map(sortKeys);
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    )) {
      if (nested === undefined) continue;
      sorted[key] = sortKeys(nested);
    }
    return sorted;
  }

  return value;
}

/**
 * Canonical JSON serialization
 *
 * Sorts object keys recursively for stable hashing.
 *
 * @param obj - Object to serialize
 * @returns Canonical JSON string
 */
export function canonicalJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj)) ?? 'null';
}

/**
 * Calculate SHA-256 hash of canonical JSON
 *
 * @param obj - Object to hash
 * @returns SHA-256 hash (hex string)
 */
export function hashContent(obj: unknown): string {
  return createHash('sha256').update(canonicalJson(obj)).digest('hex');
}

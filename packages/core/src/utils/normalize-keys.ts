import type { DataRecord } from '../types/index.js';

const BOM = /\uFEFF/g;

/**
 * Canonicalize a header key: trim, drop byte-order marks, lowercase
 */
export function normalizeKey(key: string): string {
  return key.trim().replace(BOM, '').trim().toLowerCase();
}

/**
 * Return a copy of the record whose keys are normalized; values are untouched
 */
export function normalizeKeys(record: DataRecord): DataRecord {
  const normalized: DataRecord = Object.create(null);
  for (const [key, value] of Object.entries(record)) {
    normalized[normalizeKey(key)] = value;
  }
  return normalized;
}

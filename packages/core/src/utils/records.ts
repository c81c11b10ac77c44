/**
 * Utility functions for working with records
 */

import type { DataRecord } from '../types/index.js';

/**
 * Column order for a report: the first row's keys, in iteration order
 */
export function firstRowColumns(records: readonly DataRecord[]): string[] {
  const first = records[0];
  return first ? Object.keys(first) : [];
}

/**
 * Split rows into those a parser accepts and a count of the rejected ones
 */
export function partitionRows<T>(
  records: readonly DataRecord[],
  parse: (record: DataRecord) => T | undefined
): { accepted: T[]; rejected: number } {
  const accepted: T[] = [];
  let rejected = 0;
  for (const record of records) {
    const value = parse(record);
    if (value === undefined) {
      rejected++;
    } else {
      accepted.push(value);
    }
  }
  return { accepted, rejected };
}

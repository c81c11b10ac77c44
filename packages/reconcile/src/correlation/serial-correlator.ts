/**
 * Serial Correlator
 *
 * Joins uniquely matched asset rows to inventory rows on the trailing
 * characters of the serial number.
 */

import type { InventoryRow } from '@mac-enroll/core';
import type { CorrelatedPair, MatchResultRow } from '../types/index.js';

export const SERIAL_SUFFIX_LENGTH = 6;

/**
 * Last `length` characters of a serial number, or all of it when shorter
 */
export function serialSuffix(serial: string, length = SERIAL_SUFFIX_LENGTH): string {
  return serial.length <= length ? serial : serial.slice(-length);
}

/**
 * Index inventory rows by serial suffix, keeping file order per suffix
 */
export function buildSerialIndex(
  inventory: readonly InventoryRow[],
  length = SERIAL_SUFFIX_LENGTH
): Map<string, InventoryRow[]> {
  const index = new Map<string, InventoryRow[]>();
  for (const row of inventory) {
    const key = serialSuffix(row.serialNumber, length);
    const rows = index.get(key);
    if (rows) {
      rows.push(row);
    } else {
      index.set(key, [row]);
    }
  }
  return index;
}

/**
 * Pair each result whose roster name matched exactly once with every
 * inventory row sharing its serial suffix (case-sensitive, no tolerance).
 */
export function correlateSerials(
  results: readonly MatchResultRow[],
  inventory: readonly InventoryRow[],
  uniqueNames: ReadonlySet<string>
): { pairs: CorrelatedPair[]; uncorrelated: MatchResultRow[] } {
  const index = buildSerialIndex(inventory);
  const pairs: CorrelatedPair[] = [];
  const uncorrelated: MatchResultRow[] = [];

  for (const result of results) {
    if (!uniqueNames.has(result.matchedName)) continue;

    const matching = index.get(serialSuffix(result.serialnumber)) ?? [];
    if (matching.length === 0) {
      uncorrelated.push(result);
      continue;
    }

    for (const row of matching) {
      pairs.push({ result, inventory: row });
    }
  }

  return { pairs, uncorrelated };
}

/**
 * Name Matcher
 *
 * Finds the asset rows whose computer name carries a roster name.
 */

import type { AssetExportRow, RosterEntry } from '@mac-enroll/core';
import type { NameMatchMode, NameMatchOutcome } from '../types/index.js';

export interface NameMatchOptions {
  /** Default: 'subsequence' */
  mode?: NameMatchMode;
}

/**
 * True when every character of `needle` occurs in `haystack` in the same
 * order, ignoring case. Equivalent to testing the pattern `n.*e.*e.*d...`.
 */
export function isSubsequenceMatch(needle: string, haystack: string): boolean {
  const wanted = Array.from(needle.toLowerCase());
  if (wanted.length === 0) return true;

  let next = 0;
  for (const char of haystack.toLowerCase()) {
    if (char === wanted[next]) {
      next++;
      if (next === wanted.length) return true;
    }
  }
  return false;
}

/** Case-insensitive containment */
export function isSubstringMatch(needle: string, haystack: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function nameMatcherFor(mode: NameMatchMode): (needle: string, haystack: string) => boolean {
  switch (mode) {
    case 'subsequence':
      return isSubsequenceMatch;
    case 'substring':
      return isSubstringMatch;
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported name match mode: ${String(exhaustive)}`);
    }
  }
}

/**
 * Test every (asset row, roster entry) pair.
 *
 * A match adds the computer name to the roster name's bucket and adds a
 * result row. One computer name can satisfy several roster names, and a
 * name listed twice in the roster collects every match twice.
 */
export function matchNames(
  roster: readonly RosterEntry[],
  assets: readonly AssetExportRow[],
  options: NameMatchOptions = {}
): NameMatchOutcome {
  const matches = nameMatcherFor(options.mode ?? 'subsequence');
  const outcome: NameMatchOutcome = { buckets: new Map(), results: [] };

  for (const asset of assets) {
    for (const { name } of roster) {
      if (!matches(name, asset.computerName)) continue;

      const bucket = outcome.buckets.get(name);
      if (bucket) {
        bucket.push(asset.computerName);
      } else {
        outcome.buckets.set(name, [asset.computerName]);
      }

      outcome.results.push({
        computername: asset.computerName,
        username: asset.userName,
        serialnumber: asset.serialNumber,
        matchedName: name,
      });
    }
  }

  return outcome;
}

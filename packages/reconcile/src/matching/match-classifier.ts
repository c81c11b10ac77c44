/**
 * Duplicate/Missing Detector
 *
 * Sorts matcher buckets into names matched once, more than once, or never.
 */

import type { DuplicateRow, MissingRow, RosterEntry } from '@mac-enroll/core';
import type { MatchClassification, NameBuckets } from '../types/index.js';

/**
 * Classify buckets by their computer-name count.
 *
 * Missing names come from two passes: empty buckets, then roster names
 * with no bucket at all. The passes are concatenated as they are, so a
 * name listed twice in the roster is reported twice.
 */
export function classifyMatches(
  buckets: NameBuckets,
  roster: readonly RosterEntry[]
): MatchClassification {
  const duplicates: DuplicateRow[] = [];
  const missing: MissingRow[] = [];
  const uniqueNames = new Set<string>();

  for (const [name, computerNames] of buckets) {
    if (computerNames.length > 1) {
      for (const computername of computerNames) {
        duplicates.push({ computername, name });
      }
    } else if (computerNames.length === 0) {
      missing.push({ name });
    } else {
      uniqueNames.add(name);
    }
  }

  for (const { name } of roster) {
    if (!buckets.has(name)) {
      missing.push({ name });
    }
  }

  return { duplicates, missing, uniqueNames };
}

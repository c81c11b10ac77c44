/**
 * Reconciliation Types
 *
 * Intermediate results of matching roster names against the asset export
 * and of joining matches to the inventory export.
 */

import type {
  DuplicateRow,
  EnrollError,
  EnrollmentRecord,
  InventoryRow,
  MissingRow,
} from '@mac-enroll/core';

/** How roster names are compared with computer names */
export type NameMatchMode =
  | 'subsequence' // every character of the name, in order, anywhere in the computer name
  | 'substring'; // the name as a contiguous part of the computer name

/**
 * One asset row matched by a roster name
 */
export interface MatchResultRow {
  computername: string;
  username: string;
  serialnumber: string;
  /** Roster name whose pattern matched this row */
  matchedName: string;
}

/** Roster name → computer names it matched, in match order */
export type NameBuckets = Map<string, string[]>;

export interface NameMatchOutcome {
  buckets: NameBuckets;
  results: MatchResultRow[];
}

export interface MatchClassification {
  /** One row per computer name of every name matched more than once */
  duplicates: DuplicateRow[];
  /** Names without a match; may list a name twice */
  missing: MissingRow[];
  /** Names matched exactly once */
  uniqueNames: Set<string>;
}

/**
 * A uniquely matched asset row joined to one inventory row
 */
export interface CorrelatedPair {
  result: MatchResultRow;
  inventory: InventoryRow;
}

/** Rows dropped per table (wrong field count or missing required column) */
export interface SkippedRows {
  roster: number;
  assets: number;
  inventory: number;
}

export interface ImportSummary {
  rosterCount: number;
  assetCount: number;
  inventoryCount: number;
  skippedRows: SkippedRows;
  /** Matched result rows, duplicates included */
  matchCount: number;
  uniqueNameCount: number;
  duplicateCount: number;
  missingCount: number;
  /** Unique matches without an inventory row */
  uncorrelatedCount: number;
  recordCount: number;
}

export interface ReconcileOutcome {
  records: EnrollmentRecord[];
  matches: MatchResultRow[];
  duplicates: DuplicateRow[];
  missing: MissingRow[];
  summary: ImportSummary;
}

export interface ImportResult extends ReconcileOutcome {
  /** Report files written */
  reportsWritten: string[];
  /** Report writes that failed; the import still completed */
  reportErrors: EnrollError[];
  processingTimeMs: number;
}

/**
 * Type exports for @mac-enroll/reconcile
 */

export type {
  NameMatchMode,
  MatchResultRow,
  NameBuckets,
  NameMatchOutcome,
  MatchClassification,
  CorrelatedPair,
  SkippedRows,
  ImportSummary,
  ReconcileOutcome,
  ImportResult,
} from './reconciliation.js';

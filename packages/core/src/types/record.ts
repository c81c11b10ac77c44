/**
 * Record types for tabular data read from CSV files
 */

/** One parsed row: header token → field value */
export type DataRecord = {
  [key: string]: string;
};

/** A discrepancy row written to doublons.csv */
export type DuplicateRow = {
  computername: string;
  name: string;
};

/** A discrepancy row written to missing.csv */
export type MissingRow = {
  name: string;
};

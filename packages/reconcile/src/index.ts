/**
 * @mac-enroll/reconcile
 *
 * Matches a name roster against an asset export, reports duplicates and
 * missing names, joins the matches to the inventory export and builds the
 * enrollment records.
 */

// Types
export * from './types/index.js';

// Matching
export {
  isSubsequenceMatch,
  isSubstringMatch,
  nameMatcherFor,
  matchNames,
  classifyMatches,
} from './matching/index.js';
export type { NameMatchOptions } from './matching/index.js';

// Correlation
export {
  SERIAL_SUFFIX_LENGTH,
  serialSuffix,
  buildSerialIndex,
  correlateSerials,
} from './correlation/index.js';

// Assembly
export {
  assembleRecord,
  createManualRecord,
  defaultIdGenerator,
  LOCATION_GROUP_BY_DEVICE_TYPE,
  FALLBACK_DEVICE_TYPE,
  isDeviceType,
  locationGroupForDeviceType,
} from './assembly/index.js';
export type { IdGenerator } from './assembly/index.js';

// Payloads
export {
  encodePayload,
  serializePayload,
  payloadFileName,
  decodePayload,
} from './payload/index.js';
export type { BooleanEncoding, PayloadOptions, EnrollmentPayload } from './payload/index.js';

// Import pipeline
export { EnrollmentImporter, createEnrollmentImporter } from './import/index.js';
export type {
  ReconcileTables,
  ImportPaths,
  EnrollmentImporterOptions,
} from './import/index.js';

// Pending list
export { MachineList } from './machines/index.js';

// Formatters
export { formatImportReport } from './formatters/index.js';

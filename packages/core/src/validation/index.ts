export {
  rosterEntrySchema,
  assetExportRowSchema,
  inventoryRowSchema,
  manualEnrollmentSchema,
  deviceTypeSchema,
  formatZodIssues,
} from './schemas.js';
export type {
  RosterEntry,
  AssetExportRow,
  InventoryRow,
  ManualEnrollmentInput,
  ManualEnrollment,
} from './schemas.js';

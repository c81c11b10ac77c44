/**
 * Type exports for @mac-enroll/core
 */

export type { DataRecord, DuplicateRow, MissingRow } from './record.js';
export {
  EMPLOYEE_TYPES,
  DEVICE_TYPES,
  VPN_OPTIONS,
  FILEMAKER_OPTIONS,
  TABLEAU_OPTIONS,
  DEFAULT_ENROLLMENT_CONFIG,
} from './enrollment.js';
export type {
  EmployeeType,
  DeviceType,
  VpnOption,
  FileMakerOption,
  TableauOption,
  EnrollmentRecord,
  EnrollmentConfig,
  MachineSortKey,
  SortOrder,
} from './enrollment.js';

/**
 * Enrollment Types
 *
 * The per-machine record produced by the import pipeline (or entered by hand)
 * and the configuration constants merged into it.
 */

/** Employee categories offered for manual entry */
export const EMPLOYEE_TYPES = ['Personnel', 'Hôte', 'Hors-EPFL'] as const;
export type EmployeeType = (typeof EMPLOYEE_TYPES)[number];

/** Device categories; each maps to a location group */
export const DEVICE_TYPES = ['Laptop', 'Workstation', 'Mobile'] as const;
export type DeviceType = (typeof DEVICE_TYPES)[number];

export const VPN_OPTIONS = ['SSC', 'AGA'] as const;
export type VpnOption = (typeof VPN_OPTIONS)[number];

export const FILEMAKER_OPTIONS = ['TTO-AJ', 'OHSPR-DSE', 'Autres'] as const;
export type FileMakerOption = (typeof FILEMAKER_OPTIONS)[number];

export const TABLEAU_OPTIONS = ['Desktop', 'Prep'] as const;
export type TableauOption = (typeof TABLEAU_OPTIONS)[number];

/**
 * A machine waiting to be enrolled.
 *
 * `id` only identifies the record inside the pending list and never
 * leaves the process.
 */
export interface EnrollmentRecord {
  id: string;
  endUserName: string;
  assetNumber: string;
  locationGroupId: string;
  messageType: number;
  serialNumber: string;
  platformId: number;
  friendlyName: string;
  ownership: string;
  /** Extended fields; empty or false for bulk imports */
  employeeType: string;
  vpnSelect: string;
  tableauDesktop: boolean;
  tableauPrep: boolean;
  filemaker: string;
  mindmanager: boolean;
  linaException: boolean;
  acrobatReaderException: boolean;
  deviceType: string;
  sciper: string;
}

/** Constant fields merged into every assembled record */
export interface EnrollmentConfig {
  locationGroupId: string;
  platformId: number;
  messageType: number;
  ownership: string;
}

export const DEFAULT_ENROLLMENT_CONFIG: Readonly<EnrollmentConfig> = Object.freeze({
  locationGroupId: 'DefaultGroup',
  platformId: 12,
  messageType: 0,
  ownership: 'C',
});

/** Keys the pending list can be sorted by */
export type MachineSortKey =
  | 'friendlyName'
  | 'endUserName'
  | 'assetNumber'
  | 'locationGroupId'
  | 'serialNumber';

export type SortOrder = 'ascending' | 'descending';

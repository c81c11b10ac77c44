/**
 * Record Assembler
 *
 * Builds enrollment records from correlated rows (bulk import) or from an
 * operator's manual entry.
 */

import { randomUUID } from 'node:crypto';
import {
  EnrollError,
  formatZodIssues,
  manualEnrollmentSchema,
} from '@mac-enroll/core';
import type {
  EnrollmentConfig,
  EnrollmentRecord,
  ManualEnrollmentInput,
} from '@mac-enroll/core';
import type { CorrelatedPair } from '../types/index.js';
import { locationGroupForDeviceType } from './device-type.js';

export type IdGenerator = () => string;

export const defaultIdGenerator: IdGenerator = () => randomUUID();

/** Extended fields as a bulk import leaves them */
const EMPTY_EXTENDED_FIELDS = {
  employeeType: '',
  vpnSelect: '',
  tableauDesktop: false,
  tableauPrep: false,
  filemaker: '',
  mindmanager: false,
  linaException: false,
  acrobatReaderException: false,
  deviceType: '',
  sciper: '',
} as const satisfies Partial<EnrollmentRecord>;

/**
 * One record per (matched asset row, inventory row) pair. The serial number
 * is copied in full, not the suffix used for the join.
 */
export function assembleRecord(
  pair: CorrelatedPair,
  config: EnrollmentConfig,
  createId: IdGenerator = defaultIdGenerator
): EnrollmentRecord {
  return {
    id: createId(),
    endUserName: pair.result.username,
    assetNumber: pair.inventory.inventoryNumber,
    locationGroupId: config.locationGroupId,
    messageType: config.messageType,
    serialNumber: pair.result.serialnumber,
    platformId: config.platformId,
    friendlyName: pair.result.computername,
    ownership: config.ownership,
    ...EMPTY_EXTENDED_FIELDS,
  };
}

/**
 * Validate a manual entry and turn it into a record.
 *
 * The location group comes from the device type rather than the
 * configuration. The Acrobat exception does not apply to staff members
 * (employee type "Personnel").
 *
 * @throws EnrollError (VALIDATION_ERROR) listing every invalid field
 */
export function createManualRecord(
  input: ManualEnrollmentInput,
  config: EnrollmentConfig,
  createId: IdGenerator = defaultIdGenerator
): EnrollmentRecord {
  const parsed = manualEnrollmentSchema.safeParse(input);
  if (!parsed.success) {
    throw new EnrollError({
      code: 'VALIDATION_ERROR',
      message: formatZodIssues('Invalid machine entry', parsed.error),
      suggestion: 'Fill in every required field and pick an employee and device type.',
    });
  }

  const entry = parsed.data;

  return {
    id: createId(),
    endUserName: entry.endUserName,
    assetNumber: entry.assetNumber,
    locationGroupId: locationGroupForDeviceType(entry.deviceType),
    messageType: config.messageType,
    serialNumber: entry.serialNumber,
    platformId: config.platformId,
    friendlyName: entry.friendlyName,
    ownership: config.ownership,
    employeeType: entry.employeeType,
    vpnSelect: entry.vpn ?? '',
    tableauDesktop: entry.tableau.includes('Desktop'),
    tableauPrep: entry.tableau.includes('Prep'),
    filemaker: entry.filemaker ?? '',
    mindmanager: entry.mindmanager,
    linaException: entry.linaException,
    acrobatReaderException: entry.employeeType === 'Personnel' ? false : entry.acrobatReaderException,
    deviceType: entry.deviceType,
    sciper: entry.sciper,
  };
}

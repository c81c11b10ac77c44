/**
 * Payload Encoder
 *
 * Wire format of one enrollment record as consumed by the device
 * management import. Key names are fixed; the in-memory id is never sent.
 */

import { z } from 'zod';
import { EnrollError, formatZodIssues } from '@mac-enroll/core';
import type { EnrollmentRecord } from '@mac-enroll/core';
import { defaultIdGenerator, type IdGenerator } from '../assembly/index.js';

/**
 * How flag fields are written. The downstream import reads 0/1, so
 * 'integer' is the default; 'boolean' writes JSON true/false.
 */
export type BooleanEncoding = 'integer' | 'boolean';

export interface PayloadOptions {
  booleanEncoding?: BooleanEncoding;
  /** JSON indentation; 0 for a single line (default: 2) */
  indent?: number;
}

type EncodedFlag = number | boolean;

export interface EnrollmentPayload {
  EndUserName: string;
  AssetNumber: string;
  LocationGroupId: string;
  MessageType: number;
  SerialNumber: string;
  PlatformId: number;
  FriendlyName: string;
  Ownership: string;
  employeetypemacssc: string;
  vpnguestmacssc: string;
  tableauDesktopmacssc: EncodedFlag;
  tableauPrepmacssc: EncodedFlag;
  filemakermacssc: string;
  mindmanagermacssc: EncodedFlag;
  linaexceptionssc: EncodedFlag;
  acrobatreaderexceptionssc: EncodedFlag;
  devicetypemacssc: string;
  SCIPER: string;
}

function encodeFlag(value: boolean, encoding: BooleanEncoding): EncodedFlag {
  if (encoding === 'boolean') return value;
  return value ? 1 : 0;
}

/**
 * Map a record to its wire object. Key order is the order the downstream
 * import documents.
 */
export function encodePayload(
  record: EnrollmentRecord,
  options: PayloadOptions = {}
): EnrollmentPayload {
  const encoding = options.booleanEncoding ?? 'integer';

  return {
    EndUserName: record.endUserName,
    AssetNumber: record.assetNumber,
    LocationGroupId: record.locationGroupId,
    MessageType: record.messageType,
    SerialNumber: record.serialNumber,
    PlatformId: record.platformId,
    FriendlyName: record.friendlyName,
    Ownership: record.ownership,
    employeetypemacssc: record.employeeType,
    vpnguestmacssc: record.vpnSelect,
    tableauDesktopmacssc: encodeFlag(record.tableauDesktop, encoding),
    tableauPrepmacssc: encodeFlag(record.tableauPrep, encoding),
    filemakermacssc: record.filemaker,
    mindmanagermacssc: encodeFlag(record.mindmanager, encoding),
    linaexceptionssc: encodeFlag(record.linaException, encoding),
    acrobatreaderexceptionssc: encodeFlag(record.acrobatReaderException, encoding),
    devicetypemacssc: record.deviceType,
    SCIPER: record.sciper,
  };
}

export function serializePayload(record: EnrollmentRecord, options: PayloadOptions = {}): string {
  return JSON.stringify(encodePayload(record, options), null, options.indent ?? 2);
}

/**
 * Upload file name: scx-<assetNumber>.json. Path separators in the asset
 * number are replaced so the name stays a single path segment.
 */
export function payloadFileName(record: Pick<EnrollmentRecord, 'assetNumber'>): string {
  return `scx-${record.assetNumber.replace(/[\\/]/g, '_')}.json`;
}

const flagSchema = z
  .union([z.boolean(), z.number().int()])
  .transform((value) => (typeof value === 'boolean' ? value : value !== 0));

const optionalText = z.string().default('');
const optionalFlag = flagSchema.default(false);

const payloadSchema = z.object({
  EndUserName: z.string(),
  AssetNumber: z.string(),
  LocationGroupId: z.string(),
  MessageType: z.number().int(),
  SerialNumber: z.string(),
  PlatformId: z.number().int(),
  FriendlyName: z.string(),
  Ownership: z.string(),
  employeetypemacssc: optionalText,
  vpnguestmacssc: optionalText,
  tableauDesktopmacssc: optionalFlag,
  tableauPrepmacssc: optionalFlag,
  filemakermacssc: optionalText,
  mindmanagermacssc: optionalFlag,
  linaexceptionssc: optionalFlag,
  acrobatreaderexceptionssc: optionalFlag,
  devicetypemacssc: optionalText,
  SCIPER: optionalText,
});

/**
 * Read a wire object back into a record with an id from `createId`. Flags are
 * accepted in either encoding; extended keys may be absent.
 *
 * @throws EnrollError (VALIDATION_ERROR) for a malformed payload
 */
export function decodePayload(
  value: unknown,
  createId: IdGenerator = defaultIdGenerator
): EnrollmentRecord {
  const parsed = payloadSchema.safeParse(value);
  if (!parsed.success) {
    throw new EnrollError({
      code: 'VALIDATION_ERROR',
      message: formatZodIssues('Invalid enrollment payload', parsed.error),
    });
  }

  const p = parsed.data;
  return {
    id: createId(),
    endUserName: p.EndUserName,
    assetNumber: p.AssetNumber,
    locationGroupId: p.LocationGroupId,
    messageType: p.MessageType,
    serialNumber: p.SerialNumber,
    platformId: p.PlatformId,
    friendlyName: p.FriendlyName,
    ownership: p.Ownership,
    employeeType: p.employeetypemacssc,
    vpnSelect: p.vpnguestmacssc,
    tableauDesktop: p.tableauDesktopmacssc,
    tableauPrep: p.tableauPrepmacssc,
    filemaker: p.filemakermacssc,
    mindmanager: p.mindmanagermacssc,
    linaException: p.linaexceptionssc,
    acrobatReaderException: p.acrobatreaderexceptionssc,
    deviceType: p.devicetypemacssc,
    sciper: p.SCIPER,
  };
}

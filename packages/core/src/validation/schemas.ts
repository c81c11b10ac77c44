/**
 * Zod schemas for the three input tables and for manual entries
 *
 * Table schemas run on rows whose keys were already normalized
 * (trimmed, BOM stripped, lowercased).
 */

import { z } from 'zod';
import {
  DEVICE_TYPES,
  EMPLOYEE_TYPES,
  FILEMAKER_OPTIONS,
  TABLEAU_OPTIONS,
  VPN_OPTIONS,
} from '../types/enrollment.js';

/** Roster row: the short name to look for in computer names */
export const rosterEntrySchema = z
  .object({
    name: z.string(),
  })
  .transform((row) => ({ name: row.name }));

/** Asset-management export row */
export const assetExportRowSchema = z
  .object({
    computername: z.string(),
    serialnumber: z.string(),
    username: z.string(),
  })
  .transform((row) => ({
    computerName: row.computername,
    serialNumber: row.serialnumber,
    userName: row.username,
  }));

/** Inventory export row; unused columns are kept as they are */
export const inventoryRowSchema = z
  .object({
    serialnumber: z.string(),
    inventorynumber: z.string(),
  })
  .catchall(z.string())
  .transform(({ serialnumber, inventorynumber, ...extra }) => ({
    serialNumber: serialnumber,
    inventoryNumber: inventorynumber,
    extra,
  }));

export type RosterEntry = z.output<typeof rosterEntrySchema>;
export type AssetExportRow = z.output<typeof assetExportRowSchema>;
export type InventoryRow = z.output<typeof inventoryRowSchema>;

const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);

/** A single machine typed in by an operator */
export const manualEnrollmentSchema = z.object({
  endUserName: requiredText('End user name'),
  sciper: requiredText('SCIPER'),
  assetNumber: requiredText('Asset number'),
  serialNumber: requiredText('Serial number'),
  friendlyName: requiredText('Friendly name'),
  employeeType: z.enum(EMPLOYEE_TYPES),
  // Unknown device labels are accepted and fall back to the laptop group
  deviceType: requiredText('Device type'),
  vpn: z.enum(VPN_OPTIONS).optional(),
  filemaker: z.enum(FILEMAKER_OPTIONS).optional(),
  tableau: z.array(z.enum(TABLEAU_OPTIONS)).default([]),
  mindmanager: z.boolean().default(false),
  linaException: z.boolean().default(false),
  acrobatReaderException: z.boolean().default(false),
});

export type ManualEnrollmentInput = z.input<typeof manualEnrollmentSchema>;
export type ManualEnrollment = z.output<typeof manualEnrollmentSchema>;

/** Known device labels, for callers that want to offer a picker */
export const deviceTypeSchema = z.enum(DEVICE_TYPES);

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

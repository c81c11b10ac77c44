/**
 * CSV Report Writer
 *
 * Serializes discrepancy rows (missing names, duplicate machines) to CSV.
 * Columns follow the first row's key order; values are written unquoted.
 */

import { stringify } from 'csv-stringify/sync';
import { EnrollError, firstRowColumns } from '@mac-enroll/core';
import type { DataRecord } from '@mac-enroll/core';
import { writeTextFile } from './text-file.js';
import { serializeReportWorkbook } from './xlsx-report-writer.js';

export interface ReportOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /**
   * Prefix values starting with =, +, - or @ so spreadsheet apps do not
   * evaluate them. Default: false (values are written verbatim).
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'") */
  formulaEscapePrefix?: string;
}

function sanitizeFormulaValue(value: string, prefix: string): string {
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

/**
 * Serialize report rows to CSV text (lines joined by "\n", no trailing newline)
 * @throws EnrollError (EXPORT_ERROR) when there is nothing to export
 */
export function serializeReport(
  rows: readonly DataRecord[],
  options: ReportOptions = {}
): string {
  if (rows.length === 0) {
    throw new EnrollError({
      code: 'EXPORT_ERROR',
      message: 'No data to export',
      suggestion: 'Only write a report when it has at least one row.',
    });
  }

  const columns = firstRowColumns(rows);
  const prefix = options.formulaEscapePrefix ?? "'";

  const records = rows.map((row) =>
    columns.map((column) => {
      const value = row[column] ?? '';
      return options.sanitizeFormulas ? sanitizeFormulaValue(value, prefix) : value;
    })
  );

  return stringify([columns, ...records], {
    delimiter: options.delimiter ?? ',',
    quote: false,
    record_delimiter: 'unix',
    eof: false,
  });
}

/**
 * Serialize report rows and write them to a file: a workbook when the
 * path ends in .xlsx, UTF-8 CSV otherwise
 * @throws EnrollError (EXPORT_ERROR) when rows are empty or the write fails
 */
export async function writeReport(
  rows: readonly DataRecord[],
  filePath: string,
  options: ReportOptions = {}
): Promise<void> {
  const content = filePath.toLowerCase().endsWith('.xlsx')
    ? await serializeReportWorkbook(rows)
    : serializeReport(rows, options);
  await writeTextFile(filePath, content, 'EXPORT_ERROR');
}

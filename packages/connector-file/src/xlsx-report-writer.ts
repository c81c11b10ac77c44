/**
 * XLSX Report Writer
 *
 * Same rows and column order as the CSV report, as a one-sheet workbook.
 */

import ExcelJS from 'exceljs';
import { EnrollError, firstRowColumns } from '@mac-enroll/core';
import type { DataRecord } from '@mac-enroll/core';

export interface WorkbookReportOptions {
  /** Default: 'Report' */
  sheetName?: string;
}

/**
 * @throws EnrollError (EXPORT_ERROR) when there is nothing to export
 */
export async function serializeReportWorkbook(
  rows: readonly DataRecord[],
  options: WorkbookReportOptions = {}
): Promise<Buffer> {
  if (rows.length === 0) {
    throw new EnrollError({
      code: 'EXPORT_ERROR',
      message: 'No data to export',
      suggestion: 'Only write a report when it has at least one row.',
    });
  }

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName ?? 'Report');
  const headers = firstRowColumns(rows);

  const headerRow = sheet.addRow(headers);
  headerRow.font = { bold: true };

  for (const row of rows) {
    sheet.addRow(headers.map((header) => row[header] ?? ''));
  }

  sheet.columns.forEach((column) => {
    column.width = 20;
  });

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}

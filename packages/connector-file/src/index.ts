/**
 * @mac-enroll/connector-file
 *
 * File access for the import pipeline: CSV tables in, CSV reports and JSON out
 */

export { parseCsvTable, readCsvTable } from './csv-table-reader.js';
export type { CsvTable, CsvTableOptions } from './csv-table-reader.js';

export { serializeReport, writeReport } from './csv-report-writer.js';
export type { ReportOptions } from './csv-report-writer.js';

export { serializeReportWorkbook } from './xlsx-report-writer.js';
export type { WorkbookReportOptions } from './xlsx-report-writer.js';

export { readJsonFile, writeJsonFile } from './json-file.js';
export { readTextFile, writeTextFile } from './text-file.js';

// Re-export core types for convenience
export type { DataRecord } from '@mac-enroll/core';

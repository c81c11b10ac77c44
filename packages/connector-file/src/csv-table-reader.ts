/**
 * CSV Table Reader
 *
 * Reads comma-separated exports into rows keyed by header token.
 * Quoted fields and embedded newlines are not supported: a quote is an
 * ordinary character and every line is one row. Lines end at `\n` whatever
 * the line ending of the first line; a trailing `\r` is trimmed with the
 * field. Only empty lines are dropped, so a whitespace-only line is a row
 * of empty fields.
 */

import { parse } from 'csv-parse/sync';
import type { DataRecord } from '@mac-enroll/core';
import { readTextFile } from './text-file.js';

export interface CsvTableOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

export interface CsvTable {
  /** Header tokens, trimmed, in file order */
  headers: string[];
  /** Rows whose field count equals the header count */
  rows: DataRecord[];
  /** Number of data lines dropped for a field-count mismatch */
  skipped: number;
}

/**
 * Parse CSV text. The first line of the trimmed document is the header;
 * a data line with a different number of fields is dropped.
 */
export function parseCsvTable(content: string, options: CsvTableOptions = {}): CsvTable {
  const cleaned = content.trim();
  if (cleaned.length === 0) {
    return { headers: [], rows: [], skipped: 0 };
  }

  const lines = parse(cleaned, {
    columns: false,
    delimiter: options.delimiter ?? ',',
    quote: false,
    record_delimiter: '\n',
    relax_column_count: true,
    skip_empty_lines: true,
  }) as string[][];

  const [headerLine, ...dataLines] = lines;
  if (!headerLine) {
    return { headers: [], rows: [], skipped: 0 };
  }

  const headers = headerLine.map((h) => h.trim());
  const rows: DataRecord[] = [];
  let skipped = 0;

  for (const line of dataLines) {
    if (line.length !== headers.length) {
      skipped++;
      continue;
    }

    // Null prototype so a header such as "__proto__" stays an ordinary key
    const record: DataRecord = Object.create(null);
    headers.forEach((header, i) => {
      record[header] = (line[i] ?? '').trim();
    });
    rows.push(record);
  }

  return { headers, rows, skipped };
}

/**
 * Read and parse a CSV file
 * @throws EnrollError (PARSE_ERROR) if the file cannot be read or decoded
 */
export async function readCsvTable(
  filePath: string,
  options: CsvTableOptions = {}
): Promise<CsvTable> {
  const content = await readTextFile(filePath, 'PARSE_ERROR');
  return parseCsvTable(content, options);
}

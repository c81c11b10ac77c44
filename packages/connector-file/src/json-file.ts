/**
 * JSON file helpers for configuration records and stored payloads
 */

import { EnrollError, errorMessage, type EnrollErrorCode } from '@mac-enroll/core';
import { readTextFile, writeTextFile } from './text-file.js';

/**
 * Read and parse a JSON file. A leading UTF-8 BOM is ignored.
 */
export async function readJsonFile(
  filePath: string,
  code: EnrollErrorCode = 'PARSE_ERROR'
): Promise<unknown> {
  const content = await readTextFile(filePath, code);

  try {
    return JSON.parse(content.replace(/^\uFEFF/, '')) as unknown;
  } catch (error) {
    throw new EnrollError({
      code,
      message: `Invalid JSON in ${filePath}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }
}

/**
 * Write a value as JSON (pretty-printed with `indent` spaces, 0 for compact)
 */
export async function writeJsonFile(
  filePath: string,
  value: unknown,
  indent = 2,
  code: EnrollErrorCode = 'EXPORT_ERROR'
): Promise<void> {
  await writeTextFile(filePath, `${JSON.stringify(value, null, indent)}\n`, code);
}

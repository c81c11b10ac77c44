/**
 * Text file access shared by the CSV reader, the report writer and the JSON helpers
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TextDecoder } from 'node:util';
import { EnrollError, type EnrollErrorCode } from '@mac-enroll/core';

const decoder = new TextDecoder('utf-8', { fatal: true });

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Read a UTF-8 file. Any failure (missing, unreadable, not valid UTF-8)
 * is raised with the given code.
 */
export async function readTextFile(
  filePath: string,
  code: EnrollErrorCode = 'PARSE_ERROR'
): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    const errno = errnoCode(error);

    if (errno === 'ENOENT') {
      throw new EnrollError({
        code,
        message: `File not found: ${filePath}`,
        suggestion: 'Check that the file path is correct and the file exists.',
        context: { filePath },
      });
    }

    if (errno === 'EACCES') {
      throw new EnrollError({
        code,
        message: `Cannot read file: ${filePath}`,
        suggestion: 'Check file permissions.',
        context: { filePath },
      });
    }

    throw new EnrollError({
      code,
      message: `Failed to read file: ${filePath}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new EnrollError({
      code,
      message: `File is not valid UTF-8 text: ${filePath}`,
      suggestion: 'Export the file again as UTF-8 CSV.',
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }
}

/**
 * Write a UTF-8 text file (or raw bytes), creating the parent directory
 * when needed
 */
export async function writeTextFile(
  filePath: string,
  content: string | Uint8Array,
  code: EnrollErrorCode = 'EXPORT_ERROR'
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, typeof content === 'string' ? 'utf-8' : undefined);
  } catch (error) {
    throw new EnrollError({
      code,
      message: `Failed to write file: ${filePath}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }
}

/**
 * Local File Transport
 *
 * Test-mode delivery: files land in a local directory instead of a share.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, relative, resolve, isAbsolute } from 'node:path';
import { EnrollError } from '@mac-enroll/core';
import type { FileTransport, ShareCredentials } from './types.js';

/**
 * Resolve `path` under `rootDir`, refusing anything that would escape it
 */
export function resolveInside(rootDir: string, path: string): string {
  const root = resolve(rootDir);
  const target = resolve(root, path);
  const rel = relative(root, target);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new EnrollError({
      code: 'TRANSPORT_ERROR',
      message: `Refusing to write outside ${root}: ${path}`,
    });
  }
  return target;
}

/** Write bytes, creating parent directories */
export async function writeBytes(
  filePath: string,
  bytes: Uint8Array,
  signal?: AbortSignal
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, bytes, { signal });
  } catch (error) {
    throw new EnrollError({
      code: 'TRANSPORT_ERROR',
      message: `Failed to write file: ${filePath}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }
}

export class LocalFileTransport implements FileTransport {
  constructor(readonly rootDir: string) {}

  async connect(_host: string, _credentials: ShareCredentials): Promise<void> {}

  async selectShare(_name: string): Promise<void> {}

  async upload(bytes: Uint8Array, path: string, signal?: AbortSignal): Promise<void> {
    await writeBytes(this.pathFor(path), bytes, signal);
  }

  async disconnect(): Promise<void> {}

  /** Absolute path a file is written to */
  pathFor(path: string): string {
    return resolveInside(this.rootDir, path);
  }
}

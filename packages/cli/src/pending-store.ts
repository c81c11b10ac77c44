/**
 * Pending Directory
 *
 * Machines waiting to be sent are kept between runs as payload files in
 * one directory, one file per record: pending-<recordId>.json. Two records
 * may share an asset number; the scx-<assetNumber>.json name is only used
 * on upload.
 */

import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { wrapError } from '@mac-enroll/core';
import type { EnrollError, EnrollmentRecord } from '@mac-enroll/core';
import { readJsonFile, writeTextFile } from '@mac-enroll/connector-file';
import { MachineList, decodePayload, serializePayload } from '@mac-enroll/reconcile';
import type { PayloadOptions } from '@mac-enroll/reconcile';

const PENDING_FILE = /^pending-(.+)\.json$/;

export function pendingFileName(record: Pick<EnrollmentRecord, 'id'>): string {
  return `pending-${record.id}.json`;
}

export interface LoadedPending {
  list: MachineList;
  /** Record id → payload file */
  files: Map<string, string>;
  /** Files that could not be read back */
  rejected: Array<{ filePath: string; error: EnrollError }>;
}

export class PendingDirectory {
  constructor(
    readonly dir: string,
    private readonly payload: PayloadOptions = {}
  ) {}

  /** Write one payload file per record; returns the paths written */
  async save(records: readonly EnrollmentRecord[]): Promise<string[]> {
    const written: string[] = [];
    for (const record of records) {
      const filePath = join(this.dir, pendingFileName(record));
      await writeTextFile(filePath, `${serializePayload(record, this.payload)}\n`);
      written.push(filePath);
    }
    return written;
  }

  /** Read every pending file back; records keep the id their file is named after */
  async load(): Promise<LoadedPending> {
    const loaded: LoadedPending = { list: new MachineList(), files: new Map(), rejected: [] };

    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return loaded;
      throw wrapError(error, 'PARSE_ERROR', { dir: this.dir });
    }

    for (const name of names.sort()) {
      const id = PENDING_FILE.exec(name)?.[1];
      if (!id) continue;

      const filePath = join(this.dir, name);
      try {
        const record = decodePayload(await readJsonFile(filePath), () => id);
        loaded.list.add(record);
        loaded.files.set(record.id, filePath);
      } catch (error) {
        loaded.rejected.push({ filePath, error: wrapError(error, 'PARSE_ERROR', { filePath }) });
      }
    }

    return loaded;
  }

  async remove(filePaths: Iterable<string>): Promise<void> {
    for (const filePath of filePaths) {
      await rm(filePath, { force: true });
    }
  }
}

/**
 * Config Store
 *
 * Operator settings saved between runs: the enrollment constants and the
 * share path. Credentials live in a SecretStore instead.
 */

import { access, rm } from 'node:fs/promises';
import { z } from 'zod';
import { EnrollError, formatZodIssues } from '@mac-enroll/core';
import type { EnrollmentConfig } from '@mac-enroll/core';
import { readJsonFile, writeJsonFile } from '@mac-enroll/connector-file';

export const storedSettingsSchema = z
  .object({
    locationGroupId: z.string().min(1),
    platformId: z.number().int(),
    messageType: z.number().int(),
    ownership: z.string().min(1),
    sharePath: z.string().min(1).optional(),
  })
  .strict();

export type StoredSettings = z.output<typeof storedSettingsSchema>;

export interface ConfigStore {
  get(): Promise<StoredSettings | undefined>;
  save(settings: StoredSettings): Promise<void>;
  clear(): Promise<void>;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Settings kept in a JSON file
 */
export class FileConfigStore implements ConfigStore {
  constructor(readonly filePath: string) {}

  async get(): Promise<StoredSettings | undefined> {
    if (!(await fileExists(this.filePath))) return undefined;

    const raw = await readJsonFile(this.filePath, 'PARSE_ERROR');

    const parsed = storedSettingsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EnrollError({
        code: 'VALIDATION_ERROR',
        message: formatZodIssues(`Invalid settings in ${this.filePath}`, parsed.error),
        suggestion: 'Save the settings again or clear them.',
      });
    }
    return parsed.data;
  }

  async save(settings: StoredSettings): Promise<void> {
    const parsed = storedSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      throw new EnrollError({
        code: 'VALIDATION_ERROR',
        message: formatZodIssues('Invalid settings', parsed.error),
      });
    }
    await writeJsonFile(this.filePath, parsed.data);
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

export class MemoryConfigStore implements ConfigStore {
  private settings: StoredSettings | undefined;

  async get(): Promise<StoredSettings | undefined> {
    return this.settings ? { ...this.settings } : undefined;
  }

  async save(settings: StoredSettings): Promise<void> {
    this.settings = { ...settings };
  }

  async clear(): Promise<void> {
    this.settings = undefined;
  }
}

/**
 * Read-only snapshot handed to the record assembler. Saved settings win
 * over the config file.
 */
export function enrollmentSnapshot(
  fileDefaults: EnrollmentConfig,
  stored: StoredSettings | undefined
): Readonly<EnrollmentConfig> {
  return Object.freeze({
    locationGroupId: stored?.locationGroupId ?? fileDefaults.locationGroupId,
    platformId: stored?.platformId ?? fileDefaults.platformId,
    messageType: stored?.messageType ?? fileDefaults.messageType,
    ownership: stored?.ownership ?? fileDefaults.ownership,
  });
}

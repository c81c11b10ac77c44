/**
 * Config file (mac-enroll.json)
 *
 * Validated with zod after `${VAR}` / `${VAR:-default}` expansion.
 */

import { access } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_ENROLLMENT_CONFIG, EnrollError, formatZodIssues } from '@mac-enroll/core';
import { readJsonFile } from '@mac-enroll/connector-file';

export const DEFAULT_CONFIG_FILE = 'mac-enroll.json';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Default: process.env */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new EnrollError({
      code: 'CONFIG_MISSING',
      message: `Missing required environment variable: ${name}`,
    });
  });
}

export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

/** `~/x` → `<home>/x` */
export function expandHome(filePath: string): string {
  if (filePath === '~') return homedir();
  if (filePath.startsWith('~/')) return join(homedir(), filePath.slice(2));
  return filePath;
}

const enrollmentSchema = z
  .object({
    locationGroupId: z.string().min(1).default(DEFAULT_ENROLLMENT_CONFIG.locationGroupId),
    platformId: z.number().int().default(DEFAULT_ENROLLMENT_CONFIG.platformId),
    messageType: z.number().int().default(DEFAULT_ENROLLMENT_CONFIG.messageType),
    ownership: z.string().min(1).default(DEFAULT_ENROLLMENT_CONFIG.ownership),
  })
  .strict();

const retrySchema = z
  .object({
    attempts: z.number().int().min(1).max(10).optional(),
    baseDelayMs: z.number().int().min(0).max(60_000).optional(),
    maxDelayMs: z.number().int().min(0).max(300_000).optional(),
  })
  .strict();

const deliverySchema = z
  .object({
    sharePath: z.string().min(1).optional(),
    testMode: z.boolean().default(true),
    testStorageDir: z.string().min(1).default('~/Downloads/TestStorage'),
    /** Where the operating system mounts shares */
    mountRoot: z.string().min(1).default('/Volumes'),
    concurrency: z.number().int().min(1).max(64).default(4),
    timeoutMs: z.number().int().min(1).max(600_000).optional(),
    retry: retrySchema.optional(),
  })
  .strict();

const payloadSchema = z
  .object({
    booleanEncoding: z.enum(['integer', 'boolean']).default('integer'),
    pretty: z.boolean().default(true),
  })
  .strict();

const matchingSchema = z
  .object({
    mode: z.enum(['subsequence', 'substring']).default('subsequence'),
  })
  .strict();

const reportSchema = z
  .object({
    sanitizeFormulas: z.boolean().default(false),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  })
  .strict();

export const configFileSchema = z
  .object({
    enrollment: enrollmentSchema.default({}),
    delivery: deliverySchema.default({}),
    payload: payloadSchema.default({}),
    matching: matchingSchema.default({}),
    report: reportSchema.default({}),
    logging: loggingSchema.default({}),
    /** Directory for the delivery log; no log when absent */
    auditLogDir: z.string().min(1).optional(),
    /** Where `config save` keeps operator settings */
    settingsPath: z.string().min(1).default('~/.mac-enroll/settings.json'),
  })
  .strict();

export type ConfigFile = z.output<typeof configFileSchema>;

/**
 * Validate an already parsed config value
 * @throws EnrollError (VALIDATION_ERROR) listing every invalid field
 */
export function parseConfig(value: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(value, options));
  if (!result.success) {
    throw new EnrollError({
      code: 'VALIDATION_ERROR',
      message: formatZodIssues('Invalid config', result.error),
    });
  }
  return result.data;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load the config file. When `configPath` is not given and the default file
 * is absent, the built-in defaults apply.
 */
export async function loadConfig(
  configPath: string | undefined,
  options?: EnvExpansionOptions & { cwd?: string }
): Promise<ConfigFile> {
  const cwd = options?.cwd ?? process.cwd();
  const absolutePath = resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!configPath && !(await exists(absolutePath))) {
    return parseConfig({}, options);
  }

  return parseConfig(await readJsonFile(absolutePath, 'CONFIG_MISSING'), options);
}

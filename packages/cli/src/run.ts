/**
 * Command runner
 *
 * Usage:
 *   mac-enroll import --roster name.csv --assets ocs.csv --inventory inventory.csv \
 *     --missing missing.csv --duplicates doublons.csv [--out ./pending]
 *   mac-enroll add --end-user "Jane Roe" --sciper 100001 --asset INV7 --serial C02X... \
 *     --name MBP-JROE --employee-type Hôte --device-type Laptop [--out ./pending]
 *   mac-enroll list [--from ./pending] [--sort friendlyName]
 *   mac-enroll show <asset...> [--from ./pending]
 *   mac-enroll remove <asset...> | --at 1,3 [--sort friendlyName] | --all [--from ./pending]
 *   mac-enroll send [--from ./pending] [--yes]
 *   mac-enroll log [--date 2024-05-02] [--failed]
 *   mac-enroll config show|save|clear
 *
 * Every command takes --config <mac-enroll.json>.
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import {
  EMPLOYEE_TYPES,
  EnrollError,
  FILEMAKER_OPTIONS,
  Logger,
  TABLEAU_OPTIONS,
  VPN_OPTIONS,
  wrapError,
} from '@mac-enroll/core';
import type {
  EnrollmentConfig,
  EnrollmentRecord,
  LogSink,
  MachineSortKey,
  ManualEnrollmentInput,
} from '@mac-enroll/core';
import {
  createEnrollmentImporter,
  createManualRecord,
  formatImportReport,
  payloadFileName,
} from '@mac-enroll/reconcile';
import {
  DeliveryLog,
  MountedShareClient,
  ShareTransport,
  sendMachines,
} from '@mac-enroll/transport';
import type { AuthGate, SecretStore, ShareClientFactory } from '@mac-enroll/transport';
import { expandHome, loadConfig, type ConfigFile } from './config.js';
import { FileConfigStore, enrollmentSnapshot, type ConfigStore } from './config-store.js';
import { EnvSecretStore, SHARE_SECRET_SERVICE } from './secret-store.js';
import { PromptAuthGate, StaticAuthGate } from './auth-gate.js';
import { PendingDirectory, type LoadedPending } from './pending-store.js';

export const USAGE = `Usage: mac-enroll <command> [options]

Commands:
  import   Match the roster against the asset and inventory exports
  add      Add one machine by hand
  list     Show the machines waiting to be sent
  show     Show every field of the waiting machines with the given asset numbers
  remove   Drop waiting machines by asset number, by list position (--at) or all (--all)
  send     Send the waiting machines
  log      Show the deliveries recorded for a day (--date, --failed)
  config   show | save | clear the saved settings

Common options:
  --config <file>   Config file (default: ./mac-enroll.json)`;

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Log lines (default: stderr) */
  logSink?: LogSink;
  authGate?: AuthGate;
  secrets?: SecretStore;
  configStore?: ConfigStore;
  shareClientFactory?: ShareClientFactory;
}

const OPTIONS = {
  config: { type: 'string' },
  roster: { type: 'string' },
  assets: { type: 'string' },
  inventory: { type: 'string' },
  missing: { type: 'string' },
  duplicates: { type: 'string' },
  out: { type: 'string' },
  from: { type: 'string' },
  sort: { type: 'string' },
  'end-user': { type: 'string' },
  sciper: { type: 'string' },
  asset: { type: 'string' },
  serial: { type: 'string' },
  name: { type: 'string' },
  'employee-type': { type: 'string' },
  'device-type': { type: 'string' },
  vpn: { type: 'string' },
  filemaker: { type: 'string' },
  tableau: { type: 'string' },
  mindmanager: { type: 'boolean' },
  'no-lina': { type: 'boolean' },
  'acrobat-exception': { type: 'boolean' },
  yes: { type: 'boolean', short: 'y' },
  'location-group': { type: 'string' },
  'platform-id': { type: 'string' },
  'message-type': { type: 'string' },
  ownership: { type: 'string' },
  'share-path': { type: 'string' },
  all: { type: 'boolean' },
  at: { type: 'string' },
  date: { type: 'string' },
  failed: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
}

type Values = ReturnType<typeof parseCommandLine>['values'];

const SORT_KEYS: readonly MachineSortKey[] = [
  'friendlyName',
  'endUserName',
  'assetNumber',
  'locationGroupId',
  'serialNumber',
];

const DEFAULT_PENDING_DIR = 'pending';

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function required(values: Values, key: 'roster' | 'assets' | 'inventory' | 'missing' | 'duplicates'): string {
  const value = values[key];
  if (!value) throw new UsageError(`Missing --${key}`);
  return value;
}

function parseInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new UsageError(`--${flag} must be an integer`);
  return parsed;
}

function parsePositions(value: string): number[] {
  return value.split(',').map((token) => {
    const position = parseInteger('at', token.trim());
    if (position === undefined || position < 1) throw new UsageError('--at takes list positions starting at 1');
    return position;
  });
}

function parseDay(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const day = /^\d{4}-\d{2}-\d{2}$/.test(value) ? new Date(`${value}T00:00:00Z`) : undefined;
  if (!day || Number.isNaN(day.getTime())) throw new UsageError('--date must be YYYY-MM-DD');
  return day;
}

function pickOption<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined || value === '') return undefined;
  const match = allowed.find((option) => option === value);
  if (!match) throw new UsageError(`--${flag} must be one of: ${allowed.join(', ')}`);
  return match;
}

interface Session {
  io: CliIO;
  config: ConfigFile;
  logger: Logger;
  store: ConfigStore;
  secrets: SecretStore;
  values: Values;
  /** Positionals after the command */
  args: string[];
}

function pendingDir(session: Session, value: string | undefined): PendingDirectory {
  const { config, io } = session;
  return new PendingDirectory(resolve(io.cwd, value ?? DEFAULT_PENDING_DIR), {
    booleanEncoding: config.payload.booleanEncoding,
    indent: config.payload.pretty ? 2 : 0,
  });
}

async function loadPending(session: Session, pending: PendingDirectory): Promise<LoadedPending> {
  const loaded = await pending.load();
  for (const { filePath, error } of loaded.rejected) {
    session.logger.warn('Payload file skipped', { filePath, error });
  }
  return loaded;
}

/** Asset numbers held by more than one record */
function sharedAssetNumbers(records: readonly EnrollmentRecord[]): string[] {
  const seen = new Set<string>();
  const shared = new Set<string>();
  for (const { assetNumber } of records) {
    if (seen.has(assetNumber)) shared.add(assetNumber);
    seen.add(assetNumber);
  }
  return [...shared];
}

function deliveryLog(session: Session): DeliveryLog | undefined {
  const { config, io } = session;
  return config.auditLogDir ? new DeliveryLog(resolve(io.cwd, expandHome(config.auditLogDir))) : undefined;
}

async function enrollmentConfig(session: Session): Promise<Readonly<EnrollmentConfig>> {
  return enrollmentSnapshot(session.config.enrollment, await session.store.get());
}

async function runImport(session: Session): Promise<number> {
  const { values, io, config, logger } = session;
  const path = (p: string) => resolve(io.cwd, p);

  const importer = createEnrollmentImporter({
    matchMode: config.matching.mode,
    logger,
    report: { sanitizeFormulas: config.report.sanitizeFormulas },
  });

  const result = await importer.import(
    {
      rosterPath: path(required(values, 'roster')),
      assetPath: path(required(values, 'assets')),
      inventoryPath: path(required(values, 'inventory')),
      missingPath: path(required(values, 'missing')),
      duplicatesPath: path(required(values, 'duplicates')),
    },
    await enrollmentConfig(session)
  );

  const pending = pendingDir(session, values.out);
  const written = await pending.save(result.records);

  for (const assetNumber of sharedAssetNumbers(result.records)) {
    logger.warn('Several records share an asset number', { assetNumber });
  }

  io.out(formatImportReport(result));
  io.out(`\n${written.length} payload file(s) written to ${pending.dir}`);
  return result.reportErrors.length > 0 ? 1 : 0;
}

async function runAdd(session: Session): Promise<number> {
  const { values, io } = session;

  const tableau = (values.tableau ?? '')
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    .map((t) => {
      const option = pickOption('tableau', t, TABLEAU_OPTIONS);
      if (!option) throw new UsageError('--tableau must not be empty');
      return option;
    });

  const employeeType = pickOption('employee-type', values['employee-type'], EMPLOYEE_TYPES);
  if (!employeeType) throw new UsageError('Missing --employee-type');

  const input: ManualEnrollmentInput = {
    endUserName: values['end-user'] ?? '',
    sciper: values.sciper ?? '',
    assetNumber: values.asset ?? '',
    serialNumber: values.serial ?? '',
    friendlyName: values.name ?? '',
    employeeType,
    deviceType: values['device-type'] ?? '',
    vpn: pickOption('vpn', values.vpn, VPN_OPTIONS),
    filemaker: pickOption('filemaker', values.filemaker, FILEMAKER_OPTIONS),
    tableau,
    mindmanager: values.mindmanager ?? false,
    linaException: values['no-lina'] ?? false,
    acrobatReaderException: values['acrobat-exception'] ?? false,
  };

  const record = createManualRecord(input, await enrollmentConfig(session));
  const pending = pendingDir(session, values.out);
  const { list } = await loadPending(session, pending);
  const [filePath] = await pending.save([record]);

  io.out(`Added ${record.friendlyName} (location group ${record.locationGroupId}) to ${filePath ?? ''}`);
  if (list.toArray().some((r) => r.assetNumber === record.assetNumber)) {
    io.out(`Asset ${record.assetNumber} was already waiting; both machines upload as ${payloadFileName(record)}.`);
  }
  return 0;
}

async function runList(session: Session): Promise<number> {
  const { values, io } = session;
  const { list } = await loadPending(session, pendingDir(session, values.from));

  const sortKey = pickOption('sort', values.sort, SORT_KEYS);
  if (sortKey) list.sortBy(sortKey);

  if (list.isEmpty) {
    io.out('No machines waiting.');
    return 0;
  }

  list.toArray().forEach((r, i) => {
    io.out([i + 1, r.friendlyName, r.endUserName, r.assetNumber, r.locationGroupId, r.serialNumber].join('\t'));
  });
  io.out(`${list.size} machine(s) waiting.`);
  return 0;
}

function describeMachine(record: EnrollmentRecord): string {
  const text = (value: string) => (value === '' ? '-' : value);
  const flag = (value: boolean) => (value ? 'yes' : 'no');
  const tableau = [record.tableauDesktop ? 'Desktop' : '', record.tableauPrep ? 'Prep' : '']
    .filter((t) => t.length > 0)
    .join(', ');

  return [
    `Friendly name: ${text(record.friendlyName)}`,
    `End user: ${text(record.endUserName)}`,
    `SCIPER: ${text(record.sciper)}`,
    `Asset number: ${text(record.assetNumber)}`,
    `Serial number: ${text(record.serialNumber)}`,
    `Location group: ${text(record.locationGroupId)}`,
    `Employee type: ${text(record.employeeType)}`,
    `Device type: ${text(record.deviceType)}`,
    `VPN: ${text(record.vpnSelect)}`,
    `FileMaker: ${text(record.filemaker)}`,
    `Tableau: ${text(tableau)}`,
    `MindManager: ${flag(record.mindmanager)}`,
    `Lina exception: ${flag(record.linaException)}`,
    `Acrobat Reader exception: ${flag(record.acrobatReaderException)}`,
  ].join('\n');
}

async function runShow(session: Session): Promise<number> {
  const { values, io, args } = session;
  if (args.length === 0) throw new UsageError('Usage: mac-enroll show <asset...>');

  const { list } = await loadPending(session, pendingDir(session, values.from));
  const matches = list.toArray().filter((r) => args.includes(r.assetNumber));

  if (matches.length === 0) {
    io.out(`No waiting machine with asset ${args.join(', ')}.`);
    return 1;
  }

  io.out(matches.map(describeMachine).join('\n\n'));
  return 0;
}

async function runRemove(session: Session): Promise<number> {
  const { values, io, args } = session;
  const modes = [values.all === true, values.at !== undefined, args.length > 0].filter(Boolean);
  if (modes.length !== 1) {
    throw new UsageError('Usage: mac-enroll remove <asset...> | --at <positions> | --all');
  }

  const pending = pendingDir(session, values.from);
  const { list, files } = await loadPending(session, pending);
  const before = list.toArray();

  if (values.all) {
    list.removeAll();
  } else if (values.at !== undefined) {
    // Positions refer to `list` output, so the same --sort applies
    const sortKey = pickOption('sort', values.sort, SORT_KEYS);
    if (sortKey) list.sortBy(sortKey);
    list.removeAt(parsePositions(values.at).map((position) => position - 1));
  } else {
    for (const record of before) {
      if (args.includes(record.assetNumber)) list.select(record.id);
    }
    list.removeSelected();
  }

  const kept = new Set(list.toArray().map((r) => r.id));
  const removed = before.filter((r) => !kept.has(r.id));
  await pending.remove(
    removed.map((r) => files.get(r.id)).filter((filePath): filePath is string => filePath !== undefined)
  );

  io.out(`${removed.length} machine(s) removed, ${list.size} waiting.`);
  return removed.length > 0 || values.all === true ? 0 : 1;
}

async function runLog(session: Session): Promise<number> {
  const { values, io } = session;
  const log = deliveryLog(session);
  if (!log) {
    throw new EnrollError({
      code: 'CONFIG_MISSING',
      message: 'No delivery log configured',
      suggestion: 'Set auditLogDir in mac-enroll.json.',
    });
  }

  const date = parseDay(values.date) ?? new Date();
  const entries = values.failed ? await log.failures(date) : await log.readDay(date);

  if (entries.length === 0) {
    io.out(`No deliveries recorded on ${date.toISOString().slice(0, 10)}.`);
    return 0;
  }

  for (const entry of entries) {
    io.out(
      [
        entry.timestamp.toISOString(),
        entry.success ? 'sent' : 'failed',
        entry.testMode ? 'test' : 'share',
        entry.filename,
        entry.message,
      ].join('\t')
    );
  }
  return 0;
}

async function runSend(session: Session): Promise<number> {
  const { values, io, config, logger, store, secrets } = session;
  const pending = pendingDir(session, values.from);
  const { list, files } = await loadPending(session, pending);

  const stored = await store.get();
  const delivery = config.delivery;
  const createClient: ShareClientFactory =
    io.shareClientFactory ?? (() => new MountedShareClient(expandHome(delivery.mountRoot)));

  const outcome = await sendMachines(list, {
    testMode: delivery.testMode,
    testStorageDir: expandHome(delivery.testStorageDir),
    sharePath: stored?.sharePath ?? delivery.sharePath,
    credentials: () => secrets.get(SHARE_SECRET_SERVICE),
    createTransport: (host) => new ShareTransport(createClient(host)),
    timeoutMs: delivery.timeoutMs,
    authGate: io.authGate ?? (values.yes ? new StaticAuthGate(true) : new PromptAuthGate()),
    concurrency: delivery.concurrency,
    retry: delivery.retry,
    payload: { booleanEncoding: config.payload.booleanEncoding, indent: config.payload.pretty ? 2 : 0 },
    logger,
    deliveryLog: deliveryLog(session),
  });

  const delivered = outcome.deliveries
    .filter((d) => d.result.success)
    .map((d) => files.get(d.record.id))
    .filter((filePath): filePath is string => filePath !== undefined);
  await pending.remove(delivered);

  io.out(outcome.summary);
  return outcome.status === 'completed' && outcome.sent === outcome.total ? 0 : 1;
}

async function runConfig(session: Session, action: string | undefined): Promise<number> {
  const { values, io, config, store, secrets } = session;

  switch (action) {
    case 'show': {
      const stored = await store.get();
      const snapshot = enrollmentSnapshot(config.enrollment, stored);
      const credentials = await secrets.get(SHARE_SECRET_SERVICE);
      io.out(
        JSON.stringify(
          {
            ...snapshot,
            sharePath: stored?.sharePath ?? config.delivery.sharePath ?? null,
            testMode: config.delivery.testMode,
            credentials: credentials ? `set for ${credentials.username}` : 'not set',
          },
          null,
          2
        )
      );
      return 0;
    }

    case 'save': {
      const stored = await store.get();
      const current = enrollmentSnapshot(config.enrollment, stored);
      await store.save({
        locationGroupId: values['location-group'] ?? current.locationGroupId,
        platformId: parseInteger('platform-id', values['platform-id']) ?? current.platformId,
        messageType: parseInteger('message-type', values['message-type']) ?? current.messageType,
        ownership: values.ownership ?? current.ownership,
        sharePath: values['share-path'] ?? stored?.sharePath,
      });
      io.out('Settings saved.');
      return 0;
    }

    case 'clear':
      await store.clear();
      await secrets.clear(SHARE_SECRET_SERVICE);
      io.out('Settings cleared.');
      return 0;

    default:
      throw new UsageError('Usage: mac-enroll config show|save|clear');
  }
}

/**
 * Run one command. Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    io.err(`${wrapError(error).message}\n\n${USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  if (values.help || !command) {
    io.out(USAGE);
    return command || values.help ? 0 : 2;
  }

  let logger = new Logger({ sink: io.logSink });

  try {
    const config = await loadConfig(values.config, { env: io.env, cwd: io.cwd });
    logger = new Logger({ level: config.logging.level, format: config.logging.format, sink: io.logSink });

    const session: Session = {
      io,
      config,
      logger,
      values,
      args,
      store: io.configStore ?? new FileConfigStore(resolve(io.cwd, expandHome(config.settingsPath))),
      secrets: io.secrets ?? new EnvSecretStore(io.env),
    };

    switch (command) {
      case 'import':
        return await runImport(session);
      case 'add':
        return await runAdd(session);
      case 'list':
        return await runList(session);
      case 'show':
        return await runShow(session);
      case 'remove':
        return await runRemove(session);
      case 'send':
        return await runSend(session);
      case 'log':
        return await runLog(session);
      case 'config':
        return await runConfig(session, args[0]);
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    const wrapped = error instanceof EnrollError ? error : wrapError(error);
    logger.debug('Command failed', { command, error: wrapped });
    io.err(wrapped.toActionableMessage());
    return 1;
  }
}

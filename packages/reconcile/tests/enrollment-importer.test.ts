import { describe, expect, it, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_ENROLLMENT_CONFIG, EnrollError, Logger } from '@mac-enroll/core';
import type { ImportPaths } from '../src/index.js';
import { createEnrollmentImporter, formatImportReport } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function writeInputs(files: { roster: string; assets: string; inventory: string }): ImportPaths {
  tmpDir = mkdtempSync(join(tmpdir(), 'reconcile-'));
  const paths: ImportPaths = {
    rosterPath: join(tmpDir, 'roster.csv'),
    assetPath: join(tmpDir, 'assets.csv'),
    inventoryPath: join(tmpDir, 'inventory.csv'),
    missingPath: join(tmpDir, 'out', 'missing.csv'),
    duplicatesPath: join(tmpDir, 'out', 'doublons.csv'),
  };
  writeFileSync(paths.rosterPath, files.roster);
  writeFileSync(paths.assetPath, files.assets);
  writeFileSync(paths.inventoryPath, files.inventory);
  return paths;
}

function sequentialIds(): () => string {
  let n = 0;
  return () => `rec-${++n}`;
}

describe('EnrollmentImporter.reconcile', () => {
  it('drops rows missing a required column and counts them', () => {
    const importer = createEnrollmentImporter({ createId: sequentialIds() });

    const outcome = importer.reconcile(
      {
        roster: [{ Name: 'jdoe' }, { nickname: 'x' }],
        assets: [{ ComputerName: 'WS-JDOE-01', SerialNumber: 'SN000123456', UserName: 'John Doe' }],
        inventory: [{ SerialNumber: 'AA123456', InventoryNumber: 'INV9', Room: 'B12' }],
      },
      DEFAULT_ENROLLMENT_CONFIG
    );

    expect(outcome.summary.skippedRows).toEqual({ roster: 1, assets: 0, inventory: 0 });
    expect(outcome.records.map((r) => r.assetNumber)).toEqual(['INV9']);
  });
});

describe('EnrollmentImporter.import', () => {
  it('builds one record per unique match and writes no empty reports', async () => {
    const paths = writeInputs({
      roster: 'name\njdoe\n',
      assets: 'computername,serialnumber,username\nWS-JDOE-01,SN000123456,John Doe\n',
      inventory: 'serialnumber,inventorynumber\nSN000123456,INV42\n',
    });
    const importer = createEnrollmentImporter({ createId: sequentialIds() });

    const result = await importer.import(paths, DEFAULT_ENROLLMENT_CONFIG);

    expect(result.records).toEqual([
      {
        id: 'rec-1',
        endUserName: 'John Doe',
        assetNumber: 'INV42',
        locationGroupId: 'DefaultGroup',
        messageType: 0,
        serialNumber: 'SN000123456',
        platformId: 12,
        friendlyName: 'WS-JDOE-01',
        ownership: 'C',
        employeeType: '',
        vpnSelect: '',
        tableauDesktop: false,
        tableauPrep: false,
        filemaker: '',
        mindmanager: false,
        linaException: false,
        acrobatReaderException: false,
        deviceType: '',
        sciper: '',
      },
    ]);
    expect(result.reportsWritten).toEqual([]);
    expect(existsSync(paths.missingPath)).toBe(false);
    expect(existsSync(paths.duplicatesPath)).toBe(false);
  });

  it('reports duplicate matches and builds no record for them', async () => {
    const paths = writeInputs({
      roster: 'name\ndoe\n',
      assets:
        'computername,serialnumber,username\n' +
        'WS-DOE-01,SN000000001,Jo Doe\n' +
        'WS-DOE-02,SN000000002,Jo Doe\n',
      inventory: 'serialnumber,inventorynumber\nSN000000001,INV1\nSN000000002,INV2\n',
    });

    const result = await createEnrollmentImporter().import(paths, DEFAULT_ENROLLMENT_CONFIG);

    expect(result.records).toEqual([]);
    expect(result.reportsWritten).toEqual([paths.duplicatesPath]);
    expect(readFileSync(paths.duplicatesPath, 'utf-8')).toBe(
      'computername,name\nWS-DOE-01,doe\nWS-DOE-02,doe'
    );
  });

  it('writes the missing names report', async () => {
    const paths = writeInputs({
      roster: 'name\njdoe\nnobody\n',
      assets: 'computername,serialnumber,username\nWS-JDOE-01,SN000123456,John Doe\n',
      inventory: 'serialnumber,inventorynumber\nSN000123456,INV42\n',
    });

    const result = await createEnrollmentImporter().import(paths, DEFAULT_ENROLLMENT_CONFIG);

    expect(result.records).toHaveLength(1);
    expect(readFileSync(paths.missingPath, 'utf-8')).toBe('name\nnobody');
  });

  it('ignores a malformed row', async () => {
    const paths = writeInputs({
      roster: 'name\njdoe\n',
      assets:
        'computername,serialnumber,username\n' +
        'WS-JDOE-01,SN000123456\n' +
        'WS-JDOE-02,SN000654321,John Doe\n',
      inventory: 'serialnumber,inventorynumber\nSN000654321,INV7\n',
    });

    const result = await createEnrollmentImporter().import(paths, DEFAULT_ENROLLMENT_CONFIG);

    expect(result.records.map((r) => r.friendlyName)).toEqual(['WS-JDOE-02']);
    expect(result.summary.skippedRows.assets).toBe(1);
    expect(result.duplicates).toEqual([]);
  });

  it('completes when a report cannot be written', async () => {
    const paths = writeInputs({
      roster: 'name\nnobody\n',
      assets: 'computername,serialnumber,username\nWS-1,SN1,A\n',
      inventory: 'serialnumber,inventorynumber\nSN1,INV1\n',
    });
    // A file where the report directory should be
    const blocker = join(tmpDir, 'blocker');
    writeFileSync(blocker, '');
    const lines: string[] = [];
    const importer = createEnrollmentImporter({
      logger: new Logger({ format: 'json', sink: (line) => lines.push(line) }),
    });

    const result = await importer.import(
      { ...paths, missingPath: join(blocker, 'missing.csv') },
      DEFAULT_ENROLLMENT_CONFIG
    );

    expect(result.reportsWritten).toEqual([]);
    expect(result.reportErrors).toHaveLength(1);
    expect(result.reportErrors[0]?.code).toBe('EXPORT_ERROR');
    expect(lines.map((line) => JSON.parse(line).msg)).toEqual([
      'Report not written',
      'Import finished',
    ]);
  });

  it('still writes the duplicates report when the missing report fails', async () => {
    const paths = writeInputs({
      roster: 'name\ndoe\nnobody\n',
      assets:
        'computername,serialnumber,username\n' +
        'WS-DOE-01,SN000000001,A\n' +
        'WS-DOE-02,SN000000002,B\n',
      inventory: 'serialnumber,inventorynumber\nSN000000001,INV1\n',
    });
    const blocker = join(tmpDir, 'blocker');
    writeFileSync(blocker, '');

    const result = await createEnrollmentImporter().import(
      { ...paths, missingPath: join(blocker, 'missing.csv') },
      DEFAULT_ENROLLMENT_CONFIG
    );

    expect(result.reportErrors.map((e) => e.code)).toEqual(['EXPORT_ERROR']);
    expect(result.reportsWritten).toEqual([paths.duplicatesPath]);
    expect(readFileSync(paths.duplicatesPath, 'utf-8')).toBe(
      'computername,name\nWS-DOE-01,doe\nWS-DOE-02,doe'
    );
  });

  it('aborts when an input cannot be read', async () => {
    const paths = writeInputs({ roster: 'name\njdoe\n', assets: '', inventory: '' });

    await expect(
      createEnrollmentImporter().import(
        { ...paths, inventoryPath: join(tmpDir, 'absent.csv') },
        DEFAULT_ENROLLMENT_CONFIG
      )
    ).rejects.toMatchObject({ code: 'PARSE_ERROR' });
    await expect(
      createEnrollmentImporter().import(
        { ...paths, inventoryPath: join(tmpDir, 'absent.csv') },
        DEFAULT_ENROLLMENT_CONFIG
      )
    ).rejects.toBeInstanceOf(EnrollError);
  });
});

describe('formatImportReport', () => {
  it('summarizes counts and lists duplicates', () => {
    const outcome = createEnrollmentImporter().reconcile(
      {
        roster: [{ name: 'doe' }],
        assets: [
          { computername: 'WS-DOE-01', serialnumber: 'S1', username: 'A' },
          { computername: 'WS-DOE-02', serialnumber: 'S2', username: 'B' },
        ],
        inventory: [],
      },
      DEFAULT_ENROLLMENT_CONFIG
    );

    const lines = formatImportReport(outcome).split('\n');

    expect(lines).toContain('- Duplicate rows: 2');
    expect(lines).toContain('- Enrollment records: 0');
    expect(lines.slice(-3)).toEqual(['### Duplicates (2)', '- doe → WS-DOE-01', '- doe → WS-DOE-02']);
  });
});

/**
 * Enrollment Importer
 *
 * Runs the whole import: read the three exports, match roster names to
 * computer names, report duplicates and missing names, join unique matches
 * to the inventory and assemble one record per join.
 */

import {
  assetExportRowSchema,
  inventoryRowSchema,
  normalizeKeys,
  partitionRows,
  rosterEntrySchema,
  silentLogger,
  wrapError,
} from '@mac-enroll/core';
import type { DataRecord, EnrollError, EnrollmentConfig, Logger } from '@mac-enroll/core';
import { readCsvTable, writeReport } from '@mac-enroll/connector-file';
import type { ReportOptions } from '@mac-enroll/connector-file';
import type { z } from 'zod';
import type {
  ImportResult,
  NameMatchMode,
  ReconcileOutcome,
} from '../types/index.js';
import { classifyMatches, matchNames } from '../matching/index.js';
import { correlateSerials } from '../correlation/index.js';
import { assembleRecord, defaultIdGenerator, type IdGenerator } from '../assembly/index.js';

/** Raw rows of the three input tables */
export interface ReconcileTables {
  roster: readonly DataRecord[];
  assets: readonly DataRecord[];
  inventory: readonly DataRecord[];
}

export interface ImportPaths {
  rosterPath: string;
  assetPath: string;
  inventoryPath: string;
  /** Where missing names are written, if there are any */
  missingPath: string;
  /** Where duplicate matches are written, if there are any */
  duplicatesPath: string;
}

export interface EnrollmentImporterOptions {
  /** Default: 'subsequence' */
  matchMode?: NameMatchMode;
  createId?: IdGenerator;
  logger?: Logger;
  report?: ReportOptions;
}

function parseTable<S extends z.ZodTypeAny>(
  rows: readonly DataRecord[],
  schema: S
): { accepted: z.output<S>[]; rejected: number } {
  return partitionRows(rows, (row) => {
    const parsed = schema.safeParse(normalizeKeys(row));
    return parsed.success ? parsed.data : undefined;
  });
}

export class EnrollmentImporter {
  private readonly matchMode: NameMatchMode;
  private readonly createId: IdGenerator;
  private readonly logger: Logger;
  private readonly reportOptions: ReportOptions;

  constructor(options: EnrollmentImporterOptions = {}) {
    this.matchMode = options.matchMode ?? 'subsequence';
    this.createId = options.createId ?? defaultIdGenerator;
    this.logger = options.logger ?? silentLogger;
    this.reportOptions = options.report ?? {};
  }

  /**
   * In-memory reconciliation of already parsed tables. Rows missing a
   * required column are dropped and counted.
   */
  reconcile(tables: ReconcileTables, config: EnrollmentConfig): ReconcileOutcome {
    const roster = parseTable(tables.roster, rosterEntrySchema);
    const assets = parseTable(tables.assets, assetExportRowSchema);
    const inventory = parseTable(tables.inventory, inventoryRowSchema);

    const { buckets, results } = matchNames(roster.accepted, assets.accepted, {
      mode: this.matchMode,
    });
    const { duplicates, missing, uniqueNames } = classifyMatches(buckets, roster.accepted);
    const { pairs, uncorrelated } = correlateSerials(results, inventory.accepted, uniqueNames);

    const records = pairs.map((pair) => assembleRecord(pair, config, this.createId));

    return {
      records,
      matches: results,
      duplicates,
      missing,
      summary: {
        rosterCount: roster.accepted.length,
        assetCount: assets.accepted.length,
        inventoryCount: inventory.accepted.length,
        skippedRows: {
          roster: roster.rejected,
          assets: assets.rejected,
          inventory: inventory.rejected,
        },
        matchCount: results.length,
        uniqueNameCount: uniqueNames.size,
        duplicateCount: duplicates.length,
        missingCount: missing.length,
        uncorrelatedCount: uncorrelated.length,
        recordCount: records.length,
      },
    };
  }

  /**
   * Import from files.
   *
   * @throws EnrollError (PARSE_ERROR) if any input cannot be read; nothing
   * is imported in that case. Report write failures are logged and returned
   * in `reportErrors` instead.
   */
  async import(paths: ImportPaths, config: EnrollmentConfig): Promise<ImportResult> {
    const startTime = Date.now();

    const [roster, assets, inventory] = await Promise.all([
      readCsvTable(paths.rosterPath),
      readCsvTable(paths.assetPath),
      readCsvTable(paths.inventoryPath),
    ]);

    const outcome = this.reconcile(
      { roster: roster.rows, assets: assets.rows, inventory: inventory.rows },
      config
    );

    const { skippedRows } = outcome.summary;
    skippedRows.roster += roster.skipped;
    skippedRows.assets += assets.skipped;
    skippedRows.inventory += inventory.skipped;

    const reportsWritten: string[] = [];
    const reportErrors: EnrollError[] = [];

    const reports: Array<{ rows: readonly DataRecord[]; filePath: string }> = [
      { rows: outcome.missing, filePath: paths.missingPath },
      { rows: outcome.duplicates, filePath: paths.duplicatesPath },
    ];

    for (const { rows, filePath } of reports) {
      if (rows.length === 0) continue;

      try {
        await writeReport(rows, filePath, this.reportOptions);
        reportsWritten.push(filePath);
      } catch (error) {
        const wrapped = wrapError(error, 'EXPORT_ERROR', { filePath });
        reportErrors.push(wrapped);
        this.logger.warn('Report not written', { filePath, error: wrapped });
      }
    }

    this.logger.info('Import finished', {
      records: outcome.summary.recordCount,
      duplicates: outcome.summary.duplicateCount,
      missing: outcome.summary.missingCount,
    });

    return {
      ...outcome,
      reportsWritten,
      reportErrors,
      processingTimeMs: Date.now() - startTime,
    };
  }
}

/**
 * Factory function to create an EnrollmentImporter
 */
export function createEnrollmentImporter(
  options?: EnrollmentImporterOptions
): EnrollmentImporter {
  return new EnrollmentImporter(options);
}

/**
 * Import Report Formatter
 *
 * Plain-text summary of an import, for the command line.
 */

import type { ImportResult, ReconcileOutcome } from '../types/index.js';

const SAMPLE_SIZE = 10;

function pushSample<T>(lines: string[], items: readonly T[], render: (item: T) => string): void {
  for (const item of items.slice(0, SAMPLE_SIZE)) {
    lines.push(`- ${render(item)}`);
  }
  if (items.length > SAMPLE_SIZE) {
    lines.push(`... and ${items.length - SAMPLE_SIZE} more`);
  }
}

/**
 * Format an import result as plain text
 */
export function formatImportReport(result: ReconcileOutcome | ImportResult): string {
  const lines: string[] = [];
  const { summary } = result;
  const skipped = summary.skippedRows;

  lines.push('## Import Report');
  lines.push('');

  lines.push('### Inputs');
  lines.push(`- Roster names: ${summary.rosterCount} (skipped rows: ${skipped.roster})`);
  lines.push(`- Asset rows: ${summary.assetCount} (skipped rows: ${skipped.assets})`);
  lines.push(`- Inventory rows: ${summary.inventoryCount} (skipped rows: ${skipped.inventory})`);
  lines.push('');

  lines.push('### Matching');
  lines.push(`- Matches: ${summary.matchCount}`);
  lines.push(`- Names matched once: ${summary.uniqueNameCount}`);
  lines.push(`- Duplicate rows: ${summary.duplicateCount}`);
  lines.push(`- Missing names: ${summary.missingCount}`);
  lines.push(`- Unique matches without inventory: ${summary.uncorrelatedCount}`);
  lines.push(`- Enrollment records: ${summary.recordCount}`);

  if (result.duplicates.length > 0) {
    lines.push('');
    lines.push(`### Duplicates (${result.duplicates.length})`);
    pushSample(lines, result.duplicates, (row) => `${row.name} → ${row.computername}`);
  }

  if (result.missing.length > 0) {
    lines.push('');
    lines.push(`### Missing (${result.missing.length})`);
    pushSample(lines, result.missing, (row) => row.name);
  }

  if ('reportsWritten' in result) {
    if (result.reportsWritten.length > 0) {
      lines.push('');
      lines.push('### Reports');
      for (const filePath of result.reportsWritten) {
        lines.push(`- ${filePath}`);
      }
    }

    if (result.reportErrors.length > 0) {
      lines.push('');
      lines.push('### Report Errors');
      for (const error of result.reportErrors) {
        lines.push(`- ${error.message}`);
      }
    }
  }

  return lines.join('\n');
}

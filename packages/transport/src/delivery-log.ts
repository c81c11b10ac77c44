/**
 * Delivery Log
 *
 * Append-only record of upload outcomes.
 * Format: {baseDir}/{YYYY-MM-DD}.ndjson (one JSON object per line)
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { EnrollError } from '@mac-enroll/core';

export interface DeliveryLogEntry {
  timestamp: Date;
  filename: string;
  assetNumber: string;
  serialNumber: string;
  success: boolean;
  message: string;
  testMode: boolean;
}

const entrySchema = z.object({
  timestamp: z.coerce.date(),
  filename: z.string(),
  assetNumber: z.string(),
  serialNumber: z.string(),
  success: z.boolean(),
  message: z.string(),
  testMode: z.boolean(),
});

function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10); // YYYY-MM-DD
}

export class DeliveryLog {
  /** Appends to one day file run one at a time, in call order */
  private readonly writeQueue = new Map<string, Promise<void>>();

  constructor(private readonly baseDir: string) {}

  private getFilePath(date: Date): string {
    return path.join(this.baseDir, `${dayOf(date)}.ndjson`);
  }

  /**
   * Append an entry to the day file of its timestamp
   */
  async append(entry: DeliveryLogEntry): Promise<void> {
    const filePath = this.getFilePath(entry.timestamp);
    const line = `${JSON.stringify(entry)}\n`;

    try {
      await this.enqueueWrite(filePath, async () => {
        await fs.mkdir(this.baseDir, { recursive: true, mode: 0o700 });
        await fs.appendFile(filePath, line, { encoding: 'utf-8', mode: 0o600 });
      });
    } catch (err) {
      throw new EnrollError({
        code: 'EXPORT_ERROR',
        message: `Failed to write delivery log entry to ${filePath}`,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  /**
   * Entries of one UTC day, oldest first. Lines that do not parse are skipped.
   */
  async readDay(date: Date): Promise<DeliveryLogEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.getFilePath(date), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw new EnrollError({
        code: 'PARSE_ERROR',
        message: `Failed to read delivery log for ${dayOf(date)}`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const entries: DeliveryLogEntry[] = [];
    for (const line of content.split('\n')) {
      if (line.trim().length === 0) continue;
      const parsed = entrySchema.safeParse(safeJsonParse(line));
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }
    return entries;
  }

  /** Failed deliveries of one day */
  async failures(date: Date): Promise<DeliveryLogEntry[]> {
    const entries = await this.readDay(date);
    return entries.filter((entry) => !entry.success);
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = this.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (this.writeQueue.get(filePath) === wrapped) {
        this.writeQueue.delete(filePath);
      }
    });
    this.writeQueue.set(filePath, wrapped);
    return wrapped;
  }
}

function safeJsonParse(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

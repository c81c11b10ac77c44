/**
 * Upload Dispatcher
 *
 * Sends every pending record as one payload file. Uploads run
 * concurrently up to a limit; results are aggregated after all of them
 * have settled. Delivered records leave the list, failed ones stay.
 */

import { silentLogger, wrapError } from '@mac-enroll/core';
import type { EnrollmentRecord, Logger } from '@mac-enroll/core';
import { payloadFileName, serializePayload } from '@mac-enroll/reconcile';
import type { MachineList, PayloadOptions } from '@mac-enroll/reconcile';
import type { AuthGate, DeliveryResult } from './types.js';
import { deliveryFailure, uploadFile, type DeliveryContext } from './deliver-file.js';
import type { DeliveryLog } from './delivery-log.js';
import { UploadSlots } from './upload-slots.js';
import { retryDelivery, type RetryConfig } from './retry.js';

export const DEFAULT_CONCURRENCY = 4;

export interface SendContext extends DeliveryContext {
  authGate: AuthGate;
  /** Maximum uploads in flight (default: 4) */
  concurrency?: number;
  retry?: RetryConfig;
  payload?: PayloadOptions;
  /** Called once per settled upload */
  onProgress?: (done: number, total: number) => void;
  deliveryLog?: DeliveryLog;
}

export interface RecordDelivery {
  record: EnrollmentRecord;
  filename: string;
  result: DeliveryResult;
}

export type SendStatus = 'empty' | 'unauthenticated' | 'completed';

export interface SendOutcome {
  status: SendStatus;
  total: number;
  sent: number;
  deliveries: RecordDelivery[];
  /** Status line for the operator */
  summary: string;
}

const encoder = new TextEncoder();

async function passesGate(gate: AuthGate, logger: Logger): Promise<boolean> {
  try {
    return await gate.challenge('Confirm to send the machines');
  } catch (error) {
    logger.warn('Authentication check failed', { error: wrapError(error, 'AUTHENTICATION_FAILED') });
    return false;
  }
}

/**
 * Deliver one record. Resolves with a failure result instead of rejecting.
 */
async function deliverRecord(
  record: EnrollmentRecord,
  ctx: SendContext
): Promise<RecordDelivery> {
  const filename = payloadFileName(record);

  let bytes: Uint8Array;
  try {
    bytes = encoder.encode(serializePayload(record, ctx.payload));
  } catch (error) {
    return { record, filename, result: deliveryFailure(wrapError(error, 'VALIDATION_ERROR')) };
  }

  try {
    const message = await retryDelivery(
      filename,
      () => uploadFile(filename, bytes, ctx),
      ctx.retry,
      ctx.logger
    );
    return { record, filename, result: { success: true, message } };
  } catch (error) {
    return { record, filename, result: deliveryFailure(error) };
  }
}

export function summarizeDeliveries(sent: number, total: number, lastMessage?: string): string {
  const head = `${sent} file(s) saved out of ${total}.`;
  return lastMessage ? `${head}\n${lastMessage}` : head;
}

/**
 * Send the machines in `list`.
 *
 * Nothing is sent when the list is empty or the operator does not pass
 * the auth gate. Otherwise every record is dispatched, and once all
 * uploads have settled the list keeps only the records that failed.
 */
export async function sendMachines(list: MachineList, ctx: SendContext): Promise<SendOutcome> {
  const logger = ctx.logger ?? silentLogger;
  const records = list.toArray();
  const total = records.length;

  if (total === 0) {
    return { status: 'empty', total, sent: 0, deliveries: [], summary: 'No machines to send.' };
  }

  if (!(await passesGate(ctx.authGate, logger))) {
    return {
      status: 'unauthenticated',
      total,
      sent: 0,
      deliveries: [],
      summary: 'Authentication failed.',
    };
  }

  const slots = new UploadSlots(ctx.concurrency ?? DEFAULT_CONCURRENCY);
  let done = 0;
  let lastMessage: string | undefined;

  const deliveries = await Promise.all(
    records.map(async (record) => {
      const delivery = await slots.run(() => deliverRecord(record, ctx));

      done++;
      lastMessage = delivery.result.message;
      ctx.onProgress?.(done, total);

      if (!delivery.result.success) {
        logger.warn('Upload failed', {
          file: delivery.filename,
          code: delivery.result.code,
          message: delivery.result.message,
        });
      }

      await appendToLog(ctx, delivery, logger);
      return delivery;
    })
  );

  const failedIds = deliveries.filter((d) => !d.result.success).map((d) => d.record.id);
  list.retainOnly(failedIds);

  const sent = total - failedIds.length;
  logger.info('Send finished', { sent, total, testMode: ctx.testMode });

  return {
    status: 'completed',
    total,
    sent,
    deliveries,
    summary: summarizeDeliveries(sent, total, lastMessage),
  };
}

async function appendToLog(ctx: SendContext, delivery: RecordDelivery, logger: Logger): Promise<void> {
  if (!ctx.deliveryLog) return;

  try {
    await ctx.deliveryLog.append({
      timestamp: new Date(),
      filename: delivery.filename,
      assetNumber: delivery.record.assetNumber,
      serialNumber: delivery.record.serialNumber,
      success: delivery.result.success,
      message: delivery.result.message,
      testMode: ctx.testMode,
    });
  } catch (error) {
    logger.warn('Delivery log entry not written', { error: wrapError(error, 'EXPORT_ERROR') });
  }
}

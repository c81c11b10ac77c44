/**
 * File Delivery
 *
 * Writes one payload file either to local test storage or to the
 * configured share.
 */

import { EnrollError, errorMessage, silentLogger, wrapError } from '@mac-enroll/core';
import type { Logger } from '@mac-enroll/core';
import type { DeliveryResult, FileTransport, ShareCredentials } from './types.js';
import { LocalFileTransport } from './local-transport.js';
import { parseSharePath, remoteFilePath } from './share-path.js';
import { withTimeout } from './retry.js';

export interface DeliveryContext {
  /** Redirect uploads to `testStorageDir` */
  testMode: boolean;
  testStorageDir: string;
  /** smb://host/share/dir; required outside test mode */
  sharePath?: string;
  /** Looked up per delivery; required outside test mode */
  credentials: () => Promise<ShareCredentials | undefined>;
  /** Builds the transport for a share host */
  createTransport: (host: string) => FileTransport;
  /** Per-upload timeout in ms (default: none); aborts the session */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Deliver one file, throwing on failure.
 *
 * @returns the success message
 * @throws EnrollError CONFIG_MISSING, INVALID_SHARE_PATH or TRANSPORT_ERROR
 */
export async function uploadFile(
  filename: string,
  bytes: Uint8Array,
  ctx: DeliveryContext
): Promise<string> {
  if (ctx.testMode) {
    const local = new LocalFileTransport(ctx.testStorageDir);
    await withTimeout((signal) => local.upload(bytes, filename, signal), ctx.timeoutMs);
    return `File saved locally to ${local.pathFor(filename)}`;
  }

  const credentials = await ctx.credentials();
  if (!ctx.sharePath || !credentials) {
    throw new EnrollError({
      code: 'CONFIG_MISSING',
      message: 'Configuration missing',
      suggestion: 'Save a share path and share credentials before sending.',
    });
  }

  const location = parseSharePath(ctx.sharePath);
  const transport = ctx.createTransport(location.host);
  const logger = ctx.logger ?? silentLogger;

  const session = async (signal: AbortSignal): Promise<void> => {
    try {
      await transport.connect(location.host, credentials);
      signal.throwIfAborted();
      await transport.selectShare(location.share);
      signal.throwIfAborted();
      await transport.upload(bytes, remoteFilePath(location, filename), signal);
    } catch (error) {
      // The upload error is the one reported
      await transport.disconnect().catch((disconnectError: unknown) => {
        logger.warn('Disconnect after failed upload failed', {
          file: filename,
          error: errorMessage(disconnectError),
        });
      });
      throw error;
    }
    await transport.disconnect();
  };

  await withTimeout(session, ctx.timeoutMs);
  return `File saved to ${ctx.sharePath}`;
}

/**
 * Deliver one file. Never throws; failures come back as `success: false`.
 */
export async function deliverFile(
  filename: string,
  bytes: Uint8Array,
  ctx: DeliveryContext
): Promise<DeliveryResult> {
  try {
    const message = await uploadFile(filename, bytes, ctx);
    return { success: true, message };
  } catch (error) {
    return deliveryFailure(error);
  }
}

export function deliveryFailure(error: unknown): DeliveryResult {
  const wrapped = wrapError(error, 'TRANSPORT_ERROR');
  const prefix = wrapped.code === 'TRANSPORT_ERROR' ? 'Error sending file: ' : '';
  return { success: false, message: `${prefix}${wrapped.message}`, code: wrapped.code };
}

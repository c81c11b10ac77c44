/**
 * Retry and timeout policy for share uploads
 */

import { setTimeout as delay } from 'node:timers/promises';
import { EnrollError, errorMessage, silentLogger } from '@mac-enroll/core';
import type { Logger } from '@mac-enroll/core';

export interface RetryConfig {
  /** Total attempts including the first (default: 1, i.e. no retries) */
  attempts?: number;
  /** Delay before the second attempt; doubles after that (default: 200ms) */
  baseDelayMs?: number;
  /** Max delay between attempts (default: 5000ms) */
  maxDelayMs?: number;
}

/** Wait before attempt `attempt` (2, 3, ...) */
export function retryDelayMs(cfg: RetryConfig, attempt: number): number {
  const base = cfg.baseDelayMs ?? 200;
  const max = cfg.maxDelayMs ?? 5000;
  return Math.min(max, base * 2 ** (attempt - 2));
}

export function isTimeout(err: unknown): boolean {
  return err instanceof EnrollError && err.context?.timedOut === true;
}

/**
 * Share failures get another attempt. Timeouts do not: the aborted upload
 * may still have landed. Missing configuration or credentials will not fix
 * themselves.
 */
export function isRetryableDelivery(err: unknown): boolean {
  return err instanceof EnrollError && err.code === 'TRANSPORT_ERROR' && !isTimeout(err);
}

/**
 * Upload `filename`, retrying retryable failures with exponential backoff.
 * Each retry is logged at info.
 */
export async function retryDelivery<T>(
  filename: string,
  upload: () => Promise<T>,
  cfg: RetryConfig = {},
  logger: Logger = silentLogger
): Promise<T> {
  const attempts = Math.max(1, cfg.attempts ?? 1);

  for (let attempt = 1; ; attempt++) {
    try {
      return await upload();
    } catch (err) {
      if (attempt >= attempts || !isRetryableDelivery(err)) {
        throw err;
      }

      const delayMs = retryDelayMs(cfg, attempt + 1);
      logger.info('Retrying upload', {
        file: filename,
        attempt: attempt + 1,
        attempts,
        delayMs,
        error: errorMessage(err),
      });
      await delay(delayMs);
    }
  }
}

/**
 * Run `task` with a signal that aborts after `timeoutMs`.
 *
 * The task is awaited even once aborted, so nothing it started outlives
 * the call; a client that ignores the signal is waited for. A task that
 * fails after the abort fails with a timeout error.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task(controller.signal);
  }

  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await task(controller.signal);
  } catch (err) {
    if (!controller.signal.aborted) throw err;
    throw new EnrollError({
      code: 'TRANSPORT_ERROR',
      message: `Upload timed out after ${timeoutMs} ms`,
      suggestion: 'Check the share connection, or raise delivery.timeoutMs.',
      cause: err instanceof Error ? err : undefined,
      context: { timedOut: true },
    });
  } finally {
    clearTimeout(timer);
  }
}

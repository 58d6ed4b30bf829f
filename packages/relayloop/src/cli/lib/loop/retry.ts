/**
 * Bounded retry with a fixed delay between attempts.
 *
 * No exponential backoff: a human watching the log sees the same pause
 * every time. The last attempt is flagged so the caller can hand control
 * to a human before giving up.
 */

import { setTimeout as sleepMs } from 'node:timers/promises';

import { LoopError, errorMessage } from '../errors.js';

export const RETRY_DELAY_MS = 2_000;

export interface AttemptContext {
  attempt: number;
  isFinalAttempt: boolean;
}

export interface RetryOptions {
  maxAttempts: number;
  /** Runs before every attempt, including the first. */
  onAttempt?: (attempt: number) => void;
  /** Runs after a failed attempt. */
  onFailure?: (attempt: number, message: string, willRetry: boolean) => void;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: string; attempts: number };

/**
 * Run `operation` up to `maxAttempts` times. Never throws for a failed
 * attempt; non-retryable LoopErrors (state files, validation, blocked)
 * propagate immediately.
 */
export async function retry<T>(
  operation: (ctx: AttemptContext) => Promise<T>,
  opts: RetryOptions,
): Promise<RetryResult<T>> {
  if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${opts.maxAttempts}`);
  }
  const delayMs = opts.delayMs ?? RETRY_DELAY_MS;
  const sleep = opts.sleep ?? ((ms: number) => sleepMs(ms));

  let lastError = '';
  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    opts.onAttempt?.(attempt);
    const isFinalAttempt = attempt === opts.maxAttempts;
    try {
      const value = await operation({ attempt, isFinalAttempt });
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (error instanceof LoopError && !error.retryable) throw error;
      lastError = errorMessage(error);
      opts.onFailure?.(attempt, lastError, !isFinalAttempt);
      if (!isFinalAttempt) {
        await sleep(delayMs);
      }
    }
  }

  return { ok: false, error: lastError, attempts: opts.maxAttempts };
}

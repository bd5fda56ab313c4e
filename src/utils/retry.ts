import { logger } from './logger.js';
import { toError } from './errors.js';

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export interface RetryOptions {
  /** Maximum number of attempts, including the first */
  limit: number;
  /** Fixed pause between attempts */
  delayMs: number;
  /** Shown in log lines */
  label?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function randomBetween(minMs: number, maxMs: number): number {
  return Math.round(minMs + Math.random() * (maxMs - minMs));
}

/**
 * Run fn up to `limit` times with a fixed delay between attempts.
 * Never throws: exhaustion is reported through the result so the caller
 * can skip the item and carry on.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const limit = Math.max(1, options.limit);
  let lastError: Error = new Error('No attempt made');

  for (let attempt = 1; attempt <= limit; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = toError(error);

      logger.warn('Attempt failed', {
        label: options.label,
        attempt,
        limit,
        error: lastError.message,
      });

      if (attempt < limit) {
        await sleep(options.delayMs);
      }
    }
  }

  logger.warn('All attempts failed, skipping', {
    label: options.label,
    attempts: limit,
    error: lastError.message,
  });

  return { ok: false, error: lastError, attempts: limit };
}

/**
 * Retry logic with exponential backoff
 */

import { logger } from './logger.js';

const log = logger.child('retry');

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Decides whether a failed attempt may be retried. Defaults to always. */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Called before the delay that precedes the next attempt. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  label?: string;
}

/**
 * Retry with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const initialDelayMs = options.initialDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 30000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;
  const shouldRetry = options.shouldRetry ?? (() => true);

  let lastError: Error = new Error('retryWithBackoff: no attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts || !shouldRetry(lastError, attempt)) {
        throw lastError;
      }

      // Exponential backoff with up to 30% jitter
      const baseDelay = Math.min(
        initialDelayMs * Math.pow(backoffMultiplier, attempt - 1),
        maxDelayMs
      );
      const jitter = Math.random() * 0.3 * baseDelay;
      const delay = baseDelay + jitter;

      log.warn('Retrying after error', {
        label: options.label,
        attempt,
        maxAttempts,
        delayMs: Math.round(delay),
        error: lastError.message,
      });
      options.onRetry?.(lastError, attempt, delay);

      await sleep(delay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @fileOverview: Exponential backoff retry for calls to remote services
 * @module: Retry
 * @keyFunctions:
 *   - withRetry(): Retry an async operation while the error is transient
 *   - backoffDelay(): Delay for a given attempt, capped
 *   - sleep(): Abortable delay
 */

import { logger } from './logger';
import { getErrorMessage, isTransientError } from './errorHandler';

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Defaults to isTransientError */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  /** Label used in log lines */
  operation?: string;
}

const DEFAULT_MAX_DELAY_MS = 30000;

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number = DEFAULT_MAX_DELAY_MS): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 && !signal?.aborted) return Promise.resolve();

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? ((error: unknown) => isTransientError(error));
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const isLast = attempt + 1 >= maxAttempts;
      if (isLast || options.signal?.aborted || !shouldRetry(error, attempt)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, maxDelayMs);
      logger.warn(`⏳ Retrying ${options.operation ?? 'operation'} in ${delayMs}ms`, {
        attempt: attempt + 1,
        maxAttempts,
        error: getErrorMessage(error),
      });
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}

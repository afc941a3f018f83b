import type { Logger } from '../types/logger.js';
import { errorMessage, isRetryable } from './errors.js';

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Total attempts including the first one (default: 3) */
  attempts?: number;
  /** Delay before the first retry in ms (default: 200) */
  baseDelayMs?: number;
  /** Upper bound for a single delay in ms (default: 2000) */
  maxDelayMs?: number;
  /** Decide whether an error is worth another attempt (default: BotError.retryable) */
  shouldRetry?: (error: unknown) => boolean;
  /** Abort pending retries (e.g. the user cancelled) */
  signal?: AbortSignal;
  /** Operation name for logs */
  operation?: string;
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

/**
 * Thrown when retries stop because the signal was aborted.
 */
export class RetryAbortedError extends Error {
  constructor(operation: string) {
    super(`Retry aborted: ${operation}`);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Delay for a given retry (exponential, capped).
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

/**
 * Run an operation with bounded exponential backoff.
 *
 * Non-retryable errors are rethrown immediately; after the last attempt the
 * last error is rethrown unchanged.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_OPTIONS.attempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const name = options.operation ?? 'operation';

  let lastError: unknown = null;

  for (let attempt = 0; attempt < attempts; attempt++) {
    if (options.signal?.aborted) {
      throw new RetryAbortedError(name);
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt === attempts - 1) {
        throw error;
      }

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      options.logger?.warn(
        { operation: name, attempt: attempt + 1, attempts, delayMs: delay, error: errorMessage(error) },
        'Retrying after error'
      );
      await sleep(delay, options.signal);
    }
  }

  throw lastError;
}

/**
 * Sleep that wakes early when the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

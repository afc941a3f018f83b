import { describe, it, expect, vi } from 'vitest';
import { RetryAbortedError, backoffDelay, withRetry } from '../../../src/core/retry.js';
import { PersistenceError, ValidationError } from '../../../src/core/errors.js';
import { createMockLogger } from '../../helpers/factories.js';

const transient = (): PersistenceError => new PersistenceError('connection reset', { retryable: true });

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect([0, 1, 2, 3, 4].map((attempt) => backoffDelay(attempt, 100, 500))).toEqual([100, 200, 400, 500, 500]);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const operation = vi.fn().mockRejectedValueOnce(transient()).mockResolvedValue('ok');

    await expect(withRetry(operation, { baseDelayMs: 0 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('rethrows the last error after the final attempt', async () => {
    const last = new PersistenceError('still down', { retryable: true });
    const operation = vi.fn().mockRejectedValueOnce(transient()).mockRejectedValueOnce(transient()).mockRejectedValue(last);

    await expect(withRetry(operation, { attempts: 3, baseDelayMs: 0 })).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors that are not retryable', async () => {
    const operation = vi.fn().mockRejectedValue(new ValidationError('bad input'));

    await expect(withRetry(operation, { baseDelayMs: 0 })).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('accepts a custom retry predicate', async () => {
    const operation = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue(1);

    await expect(withRetry(operation, { baseDelayMs: 0, shouldRetry: () => true })).resolves.toBe(1);
  });

  it('logs each retry', async () => {
    const logger = createMockLogger();
    const operation = vi.fn().mockRejectedValueOnce(transient()).mockResolvedValue('ok');

    await withRetry(operation, { baseDelayMs: 0, operation: 'saveEntry', logger });

    expect(logger.calls.warn).toEqual([
      [
        { operation: 'saveEntry', attempt: 1, attempts: 3, delayMs: 0, error: 'connection reset' },
        'Retrying after error',
      ],
    ]);
  });

  it('stops when the signal aborts during a backoff', async () => {
    const controller = new AbortController();
    const operation = vi.fn().mockRejectedValue(transient());

    const result = withRetry(operation, { baseDelayMs: 60_000, signal: controller.signal, operation: 'saveEntry' });
    await vi.waitFor(() => {
      expect(operation).toHaveBeenCalledTimes(1);
    });
    controller.abort();

    await expect(result).rejects.toBeInstanceOf(RetryAbortedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(operation, { signal: controller.signal })).rejects.toThrow('Retry aborted: operation');
    expect(operation).not.toHaveBeenCalled();
  });
});

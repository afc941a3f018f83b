/**
 * Bot Error Types
 *
 * Typed error classes for the dialogue core.
 * The `retryable` flag drives the retry helper; `code` is what gets logged.
 */

/**
 * Error codes for classification.
 */
export type BotErrorCode =
  | 'VALIDATION_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'DELIVERY_FAILED'
  | 'STATE_CONFLICT'
  | 'CONFIG_INVALID';

/**
 * Base bot error class.
 */
export class BotError extends Error {
  readonly code: BotErrorCode;
  readonly retryable: boolean;

  constructor(message: string, code: BotErrorCode, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'BotError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Bad user input. Always recoverable: the dialogue re-prompts.
 */
export class ValidationError extends BotError {
  /** Field that failed validation, if any */
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Persistence adapter I/O failure.
 * Retryable failures (connection loss, serialization conflicts) go through withRetry().
 */
export class PersistenceError extends BotError {
  constructor(message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, 'PERSISTENCE_FAILED', options);
    this.name = 'PersistenceError';
  }
}

/**
 * Gateway send failure.
 * Reminders retry on the next tick; direct replies are logged and dropped.
 */
export class DeliveryError extends BotError {
  readonly userId: string;

  constructor(userId: string, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, 'DELIVERY_FAILED', options);
    this.name = 'DeliveryError';
    this.userId = userId;
  }
}

/**
 * Concurrent mutation of the same session.
 * Per-user serialization should make this unreachable; seeing it is a bug.
 */
export class StateConflictError extends BotError {
  readonly userId: string;

  constructor(userId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Session for user ${userId} changed concurrently (expected version ${String(expectedVersion)}, found ${String(actualVersion)})`,
      'STATE_CONFLICT'
    );
    this.name = 'StateConflictError';
    this.userId = userId;
  }
}

/**
 * Invalid or missing configuration at startup.
 */
export class ConfigError extends BotError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

/**
 * Check if an error is worth retrying.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof BotError && error.retryable;
}

/**
 * Extract a loggable message from an unknown error.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

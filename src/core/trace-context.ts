/**
 * Trace Context
 *
 * AsyncLocalStorage-based context so every log line written while handling
 * one inbound message (or one scheduler tick) carries the same traceId.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace ID: the inbound message ID or a tick ID */
  traceId: string;
  /** User the work is done for, if any */
  userId?: string;
  /** Current span ID */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit it.
 *
 * @example
 * ```ts
 * await withTraceContext(createTraceContext('msg_42', { userId: '1001' }), async () => {
 *   logger.info('Handling message'); // carries traceId and userId
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Current trace context, or undefined outside withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Generate a span ID, nested under parent when given.
 */
export function generateChildSpan(parent?: string): string {
  const shortId = randomUUID().slice(0, 8);
  return parent ? `${parent}_${shortId}` : `root_${shortId}`;
}

export function createTraceContext(id: string, options: { userId?: string } = {}): TraceContext {
  const result: TraceContext = { traceId: id, spanId: generateChildSpan() };
  if (options.userId !== undefined) {
    result.userId = options.userId;
  }
  return result;
}

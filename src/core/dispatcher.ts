import { randomUUID } from 'node:crypto';
import type { Gateway, InboundMessage } from '../ports/gateway.js';
import type { Logger } from '../types/logger.js';
import { errorMessage } from './errors.js';
import { createTraceContext, withTraceContext } from './trace-context.js';

/**
 * Anything that can handle an inbound message (the DialogueService).
 */
export interface MessageHandler {
  handle(message: InboundMessage): Promise<unknown>;
}

/**
 * Dispatcher
 *
 * Pulls inbound messages from the gateway and hands each to the handler
 * without waiting for the previous one, so a slow user never blocks others.
 * Ordering per user is the handler's job.
 */
export class Dispatcher {
  private readonly gateway: Gateway;
  private readonly handler: MessageHandler;
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();
  private loop: Promise<void> | null = null;
  private running = false;

  constructor(gateway: Gateway, handler: MessageHandler, logger: Logger) {
    this.gateway = gateway;
    this.handler = handler;
    this.logger = logger.child({ component: 'dispatcher' });
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Dispatcher already running');
      return;
    }
    this.running = true;
    this.loop = this.receiveLoop();
    this.logger.info('Dispatcher started');
  }

  /**
   * Wait for the receive loop to end (the gateway must be stopped first)
   * and for every handler still running.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await this.drain();
    this.logger.info('Dispatcher stopped');
  }

  /**
   * Wait for handlers in progress.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Dispatch one message. Resolves when its handler settles; never rejects.
   */
  dispatch(message: InboundMessage): Promise<void> {
    const traceId = `msg_${randomUUID().slice(0, 8)}`;
    const context = createTraceContext(traceId, { userId: message.userId });

    const task = withTraceContext(context, async () => {
      try {
        await this.handler.handle(message);
      } catch (error) {
        this.logger.error(
          { userId: message.userId, messageId: message.messageId, error: errorMessage(error) },
          'Message handler failed'
        );
      }
    }).finally(() => {
      this.pending.delete(task);
    });

    this.pending.add(task);
    return task;
  }

  private async receiveLoop(): Promise<void> {
    while (this.running) {
      let message: InboundMessage | null;
      try {
        message = await this.gateway.receive();
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Receive failed, stopping dispatcher');
        break;
      }

      if (message === null) break;
      void this.dispatch(message);
    }
    this.running = false;
  }
}

export function createDispatcher(gateway: Gateway, handler: MessageHandler, logger: Logger): Dispatcher {
  return new Dispatcher(gateway, handler, logger);
}

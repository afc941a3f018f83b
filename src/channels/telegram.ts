import { Bot, GrammyError, HttpError } from 'grammy';
import type { Context } from 'grammy';
import type { Gateway, InboundMessage, SendOptions } from '../ports/gateway.js';
import type { Logger } from '../types/logger.js';
import { DeliveryError, errorMessage } from '../core/errors.js';
import { InboundQueue } from '../core/inbound-queue.js';
import { withRetry } from '../core/retry.js';

/**
 * Telegram gateway configuration.
 */
export interface TelegramConfig {
  /** Bot token from BotFather (required) */
  botToken: string;
  /** Attempts for a retried send, including the first (default: 3) */
  sendAttempts?: number;
  /** Base retry delay in ms (default: 1000) */
  retryDelayMs?: number;
  /** Longest single retry delay in ms (default: 10000) */
  maxRetryDelayMs?: number;
}

const DEFAULT_CONFIG = {
  sendAttempts: 3,
  retryDelayMs: 1000,
  maxRetryDelayMs: 10_000,
};

/**
 * Rate limits, server errors and network failures are worth another try.
 * Anything else (blocked by the user, chat not found, bad request) is not.
 */
export function isRetryableTelegramError(error: unknown): boolean {
  if (error instanceof GrammyError) {
    return error.error_code === 429 || error.error_code >= 500;
  }
  return error instanceof HttpError;
}

/**
 * The parts of a grammY context an inbound message is built from.
 */
export type UpdateContext = Pick<Context, 'message' | 'from' | 'chat'>;

/**
 * Convert an incoming Telegram update into an InboundMessage.
 * Null for anything but a text message in a private chat.
 */
export function toInboundMessage(ctx: UpdateContext): InboundMessage | null {
  const message = ctx.message;
  const from = ctx.from;
  if (!message?.text || !from || ctx.chat?.type !== 'private') {
    return null;
  }

  return {
    userId: String(from.id),
    chatId: String(ctx.chat.id),
    text: message.text,
    timestamp: new Date(message.date * 1000),
    messageId: String(message.message_id),
    username: from.username,
  };
}

/**
 * Telegram gateway using grammY long polling.
 *
 * Inbound text messages from private chats are queued for receive(); the
 * dispatcher drains the queue. Outbound sends report the outcome as a boolean;
 * with `retry` they also retry rate limits and transient failures with backoff.
 */
export class TelegramGateway implements Gateway {
  readonly name = 'telegram';

  private readonly config: Required<TelegramConfig>;
  private readonly logger: Logger;
  private readonly queue = new InboundQueue();
  private readonly bot: Bot;
  private running = false;

  constructor(config: TelegramConfig, logger: Logger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'telegram' });
    this.bot = new Bot(this.config.botToken);

    this.bot.on('message:text', (ctx) => {
      this.onMessage(ctx);
    });

    this.bot.catch((err) => {
      this.logger.error({ error: errorMessage(err.error) }, 'Telegram bot error');
    });
  }

  /**
   * Start polling. Resolves once polling has been launched.
   */
  start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Telegram gateway already running');
      return Promise.resolve();
    }

    this.running = true;
    this.queue.reopen();

    this.bot
      .start({
        allowed_updates: ['message'],
        onStart: (info) => {
          this.logger.info({ username: info.username }, 'Telegram gateway started');
        },
      })
      .catch((error: unknown) => {
        this.running = false;
        this.queue.close();
        this.logger.error({ error: errorMessage(error) }, 'Telegram polling stopped with error');
      });

    return Promise.resolve();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      this.queue.close();
      return;
    }

    this.running = false;
    this.queue.close();
    await this.bot.stop();
    this.logger.info('Telegram gateway stopped');
  }

  receive(): Promise<InboundMessage | null> {
    return this.queue.pull();
  }

  async send(userId: string, text: string, options: SendOptions = {}): Promise<boolean> {
    const chatId = Number(userId);
    if (!Number.isSafeInteger(chatId)) {
      this.logger.error({ userId }, 'Cannot send message: invalid chat ID');
      return false;
    }

    try {
      await withRetry(
        async () => {
          try {
            await this.bot.api.sendMessage(chatId, text);
          } catch (error) {
            throw new DeliveryError(userId, `Telegram send failed: ${errorMessage(error)}`, {
              retryable: isRetryableTelegramError(error),
              cause: error,
            });
          }
        },
        {
          attempts: options.retry ? this.config.sendAttempts : 1,
          baseDelayMs: this.config.retryDelayMs,
          maxDelayMs: this.config.maxRetryDelayMs,
          operation: 'telegram.sendMessage',
          logger: this.logger,
        }
      );
      this.logger.debug({ userId, textLength: text.length }, 'Message sent');
      return true;
    } catch (error) {
      this.logger.error({ userId, error: errorMessage(error) }, 'Failed to send message');
      return false;
    }
  }

  private onMessage(ctx: UpdateContext): void {
    const message = toInboundMessage(ctx);
    if (!message) {
      this.logger.debug({ chatType: ctx.chat?.type }, 'Ignoring non-private message');
      return;
    }

    this.queue.push(message);
    this.logger.debug(
      { userId: message.userId, messageId: message.messageId, textLength: message.text.length },
      'Message received and queued'
    );
  }
}

export function createTelegramGateway(config: TelegramConfig, logger: Logger): TelegramGateway {
  return new TelegramGateway(config, logger);
}

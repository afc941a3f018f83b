/**
 * Gateway Port - Hexagonal Architecture
 *
 * Defines the chat-platform boundary (Telegram, console, etc.).
 * The core only consumes two operations from it: receive an inbound
 * message and send a text to a user.
 *
 * Delivery is at-least-once: the same inbound message may arrive twice.
 */

/**
 * Inbound message, normalized across platforms.
 */
export interface InboundMessage {
  /** Platform user ID */
  userId: string;
  /** Platform chat ID the message came from */
  chatId: string;
  /** Message text content */
  text: string;
  /** When the platform received the message */
  timestamp: Date;
  /** Platform message ID, used as an idempotency key when present */
  messageId: string | null;
  /** Sender username, for logs only */
  username?: string | undefined;
}

/**
 * Per-send delivery options.
 */
export interface SendOptions {
  /**
   * Retry transient failures with backoff (default: false).
   * Replies to a user are best-effort; scheduled notifications retry.
   */
  retry?: boolean;
}

/**
 * Gateway - chat platform adapter.
 */
export interface Gateway {
  /** Gateway name (e.g., "telegram") */
  readonly name: string;

  /**
   * Start receiving messages.
   */
  start(): Promise<void>;

  /**
   * Stop receiving messages. Pending and future receive() calls resolve null.
   */
  stop(): Promise<void>;

  /**
   * Wait for the next inbound message.
   * Resolves null once the gateway is stopped and drained.
   */
  receive(): Promise<InboundMessage | null>;

  /**
   * Send a text message to a user.
   * Resolves false on failure; never rejects.
   */
  send(userId: string, text: string, options?: SendOptions): Promise<boolean>;
}

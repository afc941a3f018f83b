export {
  TelegramGateway,
  createTelegramGateway,
  isRetryableTelegramError,
  toInboundMessage,
  type TelegramConfig,
  type UpdateContext,
} from './telegram.js';

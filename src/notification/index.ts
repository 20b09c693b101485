export { NotificationService } from './NotificationService.js';
export { TelegramClient } from './TelegramClient.js';
export {
  escapeMarkdown,
  formatAlertMessage,
  formatErrorMessage,
  formatPrice,
  formatShutdownMessage,
  formatStartupMessage,
  formatSummaryMessage,
  formatTradeFailedMessage,
  formatTradeMessage,
} from './formatter.js';
export type {
  AlertMessageInput,
  ErrorMessageInput,
  SummaryMessageInput,
  TradeMessageInput,
} from './formatter.js';
export type {
  MessageTransport,
  NotificationServiceConfig,
  Notifier,
  TelegramClientConfig,
} from './types.js';

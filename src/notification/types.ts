/**
 * Types for Notification Service
 */

import type { NotificationPriority } from '../types.js';

/**
 * Outbound notification channel used by the orchestrator.
 * Rejects with NotificationError when delivery fails.
 */
export interface Notifier {
  send(title: string, message: string, priority: NotificationPriority): Promise<void>;
}

export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
  /** Upper bound for a single Bot API request */
  requestTimeoutMs: number;
}

/**
 * Configuration for Notification Service
 */
export type NotificationServiceConfig = TelegramClientConfig;

/**
 * Minimal transport the service needs; TelegramClient satisfies it
 */
export interface MessageTransport {
  sendMessage(text: string, options?: { silent?: boolean }): Promise<boolean>;
  verifyConnection(): Promise<boolean>;
}

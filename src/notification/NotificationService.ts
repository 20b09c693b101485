/**
 * Notification Service
 *
 * Notifier backed by Telegram. Title and body are joined into one Markdown
 * message; low priority messages are delivered silently.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { NotificationError } from '../errors.js';
import type { NotificationPriority } from '../types.js';
import type { MessageTransport, NotificationServiceConfig, Notifier } from './types.js';
import { TelegramClient } from './TelegramClient.js';
import { escapeMarkdown } from './formatter.js';

interface NotificationEventTypes {
  sent: [title: string, priority: NotificationPriority];
  failed: [title: string, error: NotificationError];
}

export class NotificationService extends EventEmitter<NotificationEventTypes> implements Notifier {
  private readonly transport: MessageTransport;

  constructor(
    config: NotificationServiceConfig,
    transport: MessageTransport = new TelegramClient(config)
  ) {
    super();
    this.transport = transport;

    logger.info('Notification Service initialized');
  }

  /**
   * Verify Telegram connection on startup
   */
  public async verifyConnection(): Promise<boolean> {
    return this.transport.verifyConnection();
  }

  /**
   * Deliver one notification. Rejects with NotificationError when the
   * transport gives up after its retries.
   */
  public async send(
    title: string,
    message: string,
    priority: NotificationPriority
  ): Promise<void> {
    const marker = priority === 'high' ? '❗ ' : '';
    const text = `${marker}*${escapeMarkdown(title)}*\n\n${message}`;

    const success = await this.transport.sendMessage(text, {
      silent: priority === 'low',
    });

    if (!success) {
      const error = new NotificationError(`Failed to deliver notification: ${title}`);
      logger.error('Failed to send notification', { title, priority });
      this.emit('failed', title, error);
      throw error;
    }

    logger.debug('Notification sent', { title, priority });
    this.emit('sent', title, priority);
  }
}

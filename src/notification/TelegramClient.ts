/**
 * Telegram Client
 *
 * Sends chat messages through the Bot API. Each attempt is bounded by a
 * timeout; failed attempts back off linearly, rate limits wait for the
 * delay Telegram asks for.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import { errorMessage } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { TelegramClientConfig } from './types.js';

export interface SendMessageOptions {
  parseMode?: 'Markdown' | 'HTML';
  /** Deliver without sound */
  silent?: boolean;
}

/**
 * The Bot API calls the client makes
 */
export interface TelegramBotApi {
  sendMessage(
    chatId: string,
    text: string,
    options: {
      parse_mode: 'Markdown' | 'HTML';
      disable_web_page_preview: boolean;
      disable_notification: boolean;
    }
  ): Promise<unknown>;
  getMe(): Promise<{ username?: string }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

/**
 * Telegram answers flooding with HTTP 429 and the seconds to wait in
 * `parameters.retry_after`. Null when the error is not a rate limit.
 */
export function rateLimitDelayMs(error: unknown, fallbackMs: number): number | null {
  if (!isRecord(error) || !isRecord(error.response) || error.response.statusCode !== 429) {
    return null;
  }

  const body = error.response.body;
  const retryAfter = isRecord(body) && isRecord(body.parameters) ? body.parameters.retry_after : undefined;
  return typeof retryAfter === 'number' && retryAfter >= 0 ? retryAfter * 1000 : fallbackMs;
}

export class TelegramClient {
  private readonly bot: TelegramBotApi;
  private readonly chatId: string;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs: number;

  constructor(config: TelegramClientConfig, bot?: TelegramBotApi) {
    this.bot = bot ?? new TelegramBot(config.botToken);
    this.chatId = config.chatId;
    this.retryAttempts = config.retryAttempts;
    this.retryDelayMs = config.retryDelayMs;
    this.requestTimeoutMs = config.requestTimeoutMs;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Returns false once every attempt has failed
   */
  public async sendMessage(text: string, options: SendMessageOptions = {}): Promise<boolean> {
    const { parseMode = 'Markdown', silent = false } = options;
    let lastError = 'unknown';

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        await withTimeout(
          this.bot.sendMessage(this.chatId, text, {
            parse_mode: parseMode,
            disable_web_page_preview: true,
            disable_notification: silent,
          }),
          this.requestTimeoutMs,
          'telegram.sendMessage'
        );

        logger.debug('Telegram message sent', { attempt });
        return true;
      } catch (error) {
        lastError = errorMessage(error);
        if (attempt === this.retryAttempts) break;

        const backoff = this.retryDelayMs * attempt;
        const rateLimitWait = rateLimitDelayMs(error, backoff);
        const waitMs = rateLimitWait ?? backoff;
        logger.warn(rateLimitWait === null ? 'Telegram send failed, retrying' : 'Telegram rate limit hit, waiting', {
          attempt,
          waitMs,
          error: lastError,
        });
        await this.sleep(waitMs);
      }
    }

    logger.error('Failed to send Telegram message after all retries', {
      attempts: this.retryAttempts,
      error: lastError,
    });
    return false;
  }

  /**
   * Check that the bot token is accepted
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await withTimeout(this.bot.getMe(), this.requestTimeoutMs, 'telegram.getMe');
      logger.info('Telegram bot verified', { username: me.username });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', { error: errorMessage(error) });
      return false;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

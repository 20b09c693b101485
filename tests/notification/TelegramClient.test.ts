/**
 * Tests for TelegramClient
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { TelegramClient, rateLimitDelayMs } from '../../src/notification/TelegramClient.js';
import type { TelegramBotApi } from '../../src/notification/TelegramClient.js';

function rateLimited(retryAfter?: number): Error {
  return Object.assign(new Error('ETELEGRAM: 429 Too Many Requests'), {
    response: {
      statusCode: 429,
      body: retryAfter === undefined ? {} : { parameters: { retry_after: retryAfter } },
    },
  });
}

describe('rateLimitDelayMs', () => {
  it('should convert retry_after seconds to milliseconds', () => {
    expect(rateLimitDelayMs(rateLimited(3), 1000)).toBe(3000);
  });

  it('should fall back to the backoff when Telegram gives no delay', () => {
    expect(rateLimitDelayMs(rateLimited(), 1000)).toBe(1000);
  });

  it('should ignore other failures', () => {
    expect(rateLimitDelayMs(new Error('ECONNRESET'), 1000)).toBeNull();
    expect(rateLimitDelayMs({ response: { statusCode: 400 } }, 1000)).toBeNull();
  });
});

describe('TelegramClient', () => {
  let sendMessage: Mock<Parameters<TelegramBotApi['sendMessage']>, Promise<unknown>>;
  let getMe: Mock<[], Promise<{ username?: string }>>;
  let client: TelegramClient;

  beforeEach(() => {
    sendMessage = vi
      .fn<Parameters<TelegramBotApi['sendMessage']>, Promise<unknown>>()
      .mockResolvedValue({ message_id: 1 });
    getMe = vi.fn<[], Promise<{ username?: string }>>().mockResolvedValue({ username: 'watcher_bot' });
    client = new TelegramClient(
      {
        botToken: 'test-token',
        chatId: 'test-chat',
        retryAttempts: 3,
        retryDelayMs: 0,
        requestTimeoutMs: 1000,
      },
      { sendMessage, getMe }
    );
  });

  it('should send Markdown to the configured chat', async () => {
    expect(await client.sendMessage('*hello*')).toBe(true);

    expect(sendMessage).toHaveBeenCalledWith('test-chat', '*hello*', {
      parse_mode: 'Markdown',
      disable_web_page_preview: true,
      disable_notification: false,
    });
  });

  it('should map silent delivery to a muted notification', async () => {
    await client.sendMessage('quiet', { silent: true });

    expect(sendMessage.mock.calls[0]?.[2].disable_notification).toBe(true);
  });

  it('should retry a failed attempt', async () => {
    sendMessage.mockRejectedValueOnce(new Error('ECONNRESET'));

    expect(await client.sendMessage('retry me')).toBe(true);
    expect(sendMessage).toHaveBeenCalledTimes(2);
  });

  it('should wait out a rate limit and try again', async () => {
    sendMessage.mockRejectedValueOnce(rateLimited(0));

    expect(await client.sendMessage('busy')).toBe(true);
    expect(sendMessage).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured attempts', async () => {
    sendMessage.mockRejectedValue(new Error('ETELEGRAM: 400 Bad Request'));

    expect(await client.sendMessage('never')).toBe(false);
    expect(sendMessage).toHaveBeenCalledTimes(3);
  });

  it('should bound each attempt with the request timeout', async () => {
    vi.useFakeTimers();
    try {
      sendMessage.mockReturnValue(new Promise<unknown>(() => undefined));
      const result = client.sendMessage('stuck');

      await vi.advanceTimersByTimeAsync(3000);

      expect(await result).toBe(false);
      expect(sendMessage).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should report whether the token is accepted', async () => {
    expect(await client.verifyConnection()).toBe(true);

    getMe.mockRejectedValueOnce(new Error('ETELEGRAM: 401 Unauthorized'));
    expect(await client.verifyConnection()).toBe(false);
  });
});

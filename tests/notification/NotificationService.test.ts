/**
 * Tests for NotificationService
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { NotificationService } from '../../src/notification/NotificationService.js';
import { NotificationError } from '../../src/errors.js';
import type { MessageTransport } from '../../src/notification/types.js';

describe('NotificationService', () => {
  let sendMessage: Mock<[string, { silent?: boolean }?], Promise<boolean>>;
  let service: NotificationService;

  beforeEach(() => {
    sendMessage = vi.fn<[string, { silent?: boolean }?], Promise<boolean>>().mockResolvedValue(true);
    const transport: MessageTransport = {
      sendMessage,
      verifyConnection: vi.fn<[], Promise<boolean>>().mockResolvedValue(true),
    };
    service = new NotificationService(
      { botToken: 'test-token', chatId: 'test-chat', retryAttempts: 1, retryDelayMs: 0, requestTimeoutMs: 1000 },
      transport
    );
  });

  it('should join the title and message', async () => {
    await service.send('Daily summary', 'body', 'normal');

    expect(sendMessage).toHaveBeenCalledWith('*Daily summary*\n\nbody', { silent: false });
  });

  it('should mark high priority messages', async () => {
    await service.send('Alert', 'body', 'high');

    expect(sendMessage).toHaveBeenCalledWith('❗ *Alert*\n\nbody', { silent: false });
  });

  it('should deliver low priority messages silently', async () => {
    await service.send('Started', 'body', 'low');

    expect(sendMessage).toHaveBeenCalledWith('*Started*\n\nbody', { silent: true });
  });

  it('should escape markup in the title', async () => {
    await service.send('BTC_USDT', 'body', 'normal');

    expect(sendMessage).toHaveBeenCalledWith('*BTC\\_USDT*\n\nbody', { silent: false });
  });

  it('should emit sent on delivery', async () => {
    const listener = vi.fn();
    service.on('sent', listener);

    await service.send('Alert', 'body', 'high');

    expect(listener).toHaveBeenCalledWith('Alert', 'high');
  });

  it('should reject with NotificationError when the transport gives up', async () => {
    sendMessage.mockResolvedValue(false);
    const listener = vi.fn();
    service.on('failed', listener);

    await expect(service.send('Alert', 'body', 'high')).rejects.toBeInstanceOf(NotificationError);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

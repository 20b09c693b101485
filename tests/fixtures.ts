/**
 * Shared test builders
 */

import type { Sample } from '../src/types.js';

export function makeSample(price: number, overrides: Partial<Sample> = {}): Sample {
  return {
    timestamp: 0,
    price,
    change1h: 0,
    change24h: 0,
    change7d: 0,
    ohlc: { open: price, high: price, low: price, close: price },
    ...overrides,
  };
}

export const TEST_ENV: Record<string, string> = {
  TELEGRAM_BOT_TOKEN: 'test-token',
  TELEGRAM_CHAT_ID: 'test-chat',
};

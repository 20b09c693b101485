/**
 * Tests for the message formatter
 */

import { describe, it, expect } from 'vitest';
import {
  escapeMarkdown,
  formatAlertMessage,
  formatErrorMessage,
  formatPrice,
  formatShutdownMessage,
  formatStartupMessage,
  formatSummaryMessage,
  formatTradeFailedMessage,
  formatTradeMessage,
} from '../../src/notification/formatter.js';
import type { Signal } from '../../src/types.js';
import { makeSample } from '../fixtures.js';

const signal: Signal = {
  action: 'BUY',
  reason: 'RSI 25.00 < 30',
  trend: 'uptrend',
  trendLabel: '🟢 Uptrend: 1h +1.50%, 24h +3.00%',
  ranging: false,
  breakout: false,
  breakoutDirection: null,
  dcaOpportunity: false,
};

describe('formatPrice', () => {
  it('should group thousands with two decimals', () => {
    expect(formatPrice(43250.5)).toBe('43,250.50');
  });

  it('should use four decimals from 1 to 1000', () => {
    expect(formatPrice(1.5)).toBe('1.5000');
  });

  it('should use eight decimals below 1', () => {
    expect(formatPrice(0.00012)).toBe('0.00012000');
  });
});

describe('escapeMarkdown', () => {
  it('should escape legacy Markdown markup characters', () => {
    expect(escapeMarkdown('a_b*c`d[e')).toBe('a\\_b\\*c\\`d\\[e');
  });
});

describe('formatAlertMessage', () => {
  it('should format an upward alert', () => {
    const payload = formatAlertMessage({
      symbol: 'SUIUSDT',
      price: 1.05,
      referencePrice: 1,
      changePercent: 5,
      thresholdPercent: 5,
      direction: 'up',
      signal,
      momentum: 'up',
    });

    expect(payload.title).toBe('🎯 SUIUSDT +5% target hit');
    expect(payload.priority).toBe('high');
    expect(payload.message.split('\n')).toEqual([
      '• Price: `$1.0500`',
      '• Since last alert: `+5.00%` (from `$1.0000`)',
      '• Signal: `BUY`',
      '• 🟢 Uptrend: 1h +1.50%, 24h +3.00%',
      '• 📈 Momentum up: short-term prices rising above average',
    ]);
  });

  it('should title a downward alert', () => {
    const payload = formatAlertMessage({
      symbol: 'SUIUSDT',
      price: 0.95,
      referencePrice: 1,
      changePercent: -5,
      thresholdPercent: 5,
      direction: 'down',
      signal,
      momentum: null,
    });

    expect(payload.title).toBe('📉 SUIUSDT dropped -5%');
    expect(payload.message).not.toContain('Momentum');
  });
});

describe('formatSummaryMessage', () => {
  it('should print n/a for indicators that are not ready', () => {
    const payload = formatSummaryMessage({
      symbol: 'SUIUSDT',
      sample: makeSample(1.5, { timestamp: Date.UTC(2024, 0, 2, 3, 4, 5) }),
      signal: { ...signal, action: 'HOLD', reason: 'Insufficient history for MACD' },
      snapshot: { rsi: 42.123, macd: null, bollinger: null, atr: null },
      momentum: null,
      projection: { oneDay: 1.5, sevenDay: 1.5, thirtyDay: 1.5 },
      timeZone: 'UTC',
    });
    const lines = payload.message.split('\n');

    expect(payload.title).toBe('📊 Summary for SUIUSDT');
    expect(payload.priority).toBe('normal');
    expect(lines).toContain('• RSI: `42.12`');
    expect(lines).toContain('• MACD: `n/a`');
    expect(lines).toContain('• Bollinger: `n/a`');
    expect(lines).toContain('• ATR: `n/a`');
    expect(lines).toContain('• Flags: none');
    expect(lines).toContain('• Time: `01/02/2024, 03:04:05`');
  });

  it('should list the active flags', () => {
    const payload = formatSummaryMessage({
      symbol: 'SUIUSDT',
      sample: makeSample(1.5),
      signal: { ...signal, ranging: true, dcaOpportunity: true },
      snapshot: { rsi: null, macd: null, bollinger: null, atr: null },
      momentum: 'flat',
      projection: { oneDay: 1.5, sevenDay: 1.5, thirtyDay: 1.5 },
      timeZone: 'UTC',
    });

    expect(payload.message.split('\n')).toContain('• Flags: ranging, DCA opportunity');
  });
});

describe('formatTradeMessage', () => {
  it('should describe the filled order', () => {
    const payload = formatTradeMessage({
      symbol: 'SUIUSDT',
      baseAsset: 'SUI',
      side: 'BUY',
      quantity: 6.66,
      price: 1.5,
      orderId: '42',
    });

    expect(payload).toEqual({
      title: '🟢 BUY order filled',
      message: [
        '• Symbol: `SUIUSDT`',
        '• Quantity: `6.66 SUI`',
        '• Price: `$1.5000`',
        '• Order ID: `42`',
      ].join('\n'),
      priority: 'high',
    });
  });
});

describe('formatTradeFailedMessage', () => {
  it('should escape the reason', () => {
    const payload = formatTradeFailedMessage('SUIUSDT', 'SELL', 'LOT_SIZE filter');

    expect(payload.title).toBe('⚠️ SELL order failed');
    expect(payload.message.split('\n')[1]).toBe('• Reason: LOT\\_SIZE filter');
  });
});

describe('formatErrorMessage', () => {
  it('should default to high priority', () => {
    const payload = formatErrorMessage(
      { errorType: 'DataFetchError', message: 'timeout', timestamp: Date.UTC(2024, 5, 1, 12, 30, 0) },
      'UTC'
    );

    expect(payload.priority).toBe('high');
    expect(payload.message.split('\n')).toEqual([
      '• Type: `DataFetchError`',
      '• Message: timeout',
      '• Time: `06/01/2024, 12:30:00`',
    ]);
  });
});

describe('lifecycle messages', () => {
  it('should describe the startup settings', () => {
    const payload = formatStartupMessage('SUIUSDT', 60 * 60 * 1000, true, true);

    expect(payload.priority).toBe('low');
    expect(payload.message.split('\n')).toEqual([
      '• Symbol: `SUIUSDT`',
      '• Poll interval: `1h`',
      '• Trading: `enabled`',
      '• Environment: `testnet`',
    ]);
  });

  it('should show minutes for sub-hour intervals', () => {
    const payload = formatStartupMessage('SUIUSDT', 15 * 60 * 1000, false, true);

    expect(payload.message.split('\n')).toEqual([
      '• Symbol: `SUIUSDT`',
      '• Poll interval: `15m`',
      '• Trading: `disabled`',
    ]);
  });

  it('should include the shutdown reason', () => {
    expect(formatShutdownMessage('Received SIGINT').message).toBe('• Reason: Received SIGINT');
  });
});

/**
 * Message Formatter
 *
 * Turns alerts, summaries, trades and errors into Telegram Markdown payloads.
 */

import type {
  IndicatorSnapshot,
  NotificationPayload,
  Sample,
  Signal,
  TradeSide,
} from '../types.js';
import type { MomentumDirection, PriceProjection } from '../strategy/types.js';
import type { AlertDirection } from '../orchestrator/types.js';

export interface AlertMessageInput {
  symbol: string;
  price: number;
  referencePrice: number;
  changePercent: number;
  thresholdPercent: number;
  direction: AlertDirection;
  signal: Signal;
  momentum: MomentumDirection | null;
}

export interface SummaryMessageInput {
  symbol: string;
  sample: Sample;
  signal: Signal;
  snapshot: IndicatorSnapshot;
  momentum: MomentumDirection | null;
  projection: PriceProjection;
  timeZone: string;
}

export interface TradeMessageInput {
  symbol: string;
  baseAsset: string;
  side: TradeSide;
  quantity: number;
  price: number;
  orderId: string;
}

export interface ErrorMessageInput {
  errorType: string;
  message: string;
  timestamp: number;
}

const MOMENTUM_LABELS: Record<MomentumDirection, string> = {
  up: '📈 Momentum up: short-term prices rising above average',
  down: '📉 Weakening: short-term prices below average',
  flat: '➖ No clear direction',
};

export function formatAlertMessage(input: AlertMessageInput): NotificationPayload {
  const { symbol, price, referencePrice, changePercent, thresholdPercent, direction, signal } = input;
  const title =
    direction === 'up'
      ? `🎯 ${symbol} +${thresholdPercent}% target hit`
      : `📉 ${symbol} dropped -${thresholdPercent}%`;

  const lines = [
    `• Price: \`$${formatPrice(price)}\``,
    `• Since last alert: \`${formatSignedPercent(changePercent)}\` (from \`$${formatPrice(referencePrice)}\`)`,
    `• Signal: \`${signal.action}\``,
    `• ${escapeMarkdown(signal.trendLabel)}`,
  ];

  if (input.momentum) {
    lines.push(`• ${MOMENTUM_LABELS[input.momentum]}`);
  }

  return { title, message: lines.join('\n'), priority: 'high' };
}

export function formatSummaryMessage(input: SummaryMessageInput): NotificationPayload {
  const { symbol, sample, signal, snapshot, projection } = input;
  const flags = describeFlags(signal);

  const lines = [
    `• Price: \`$${formatPrice(sample.price)}\``,
    `• Change: 1h \`${formatSignedPercent(sample.change1h)}\` | 24h \`${formatSignedPercent(sample.change24h)}\` | 7d \`${formatSignedPercent(sample.change7d)}\``,
    `• Signal: \`${signal.action}\` (${escapeMarkdown(signal.reason)})`,
    `• ${escapeMarkdown(signal.trendLabel)}`,
    `• Flags: ${flags.length > 0 ? flags.join(', ') : 'none'}`,
    '',
    '*Indicators*',
    `• RSI: \`${snapshot.rsi === null ? 'n/a' : snapshot.rsi.toFixed(2)}\``,
    snapshot.macd === null
      ? '• MACD: `n/a`'
      : `• MACD: \`${snapshot.macd.line.toFixed(4)}\` / signal \`${snapshot.macd.signal.toFixed(4)}\` / hist \`${snapshot.macd.histogram.toFixed(4)}\``,
    snapshot.bollinger === null
      ? '• Bollinger: `n/a`'
      : `• Bollinger: \`$${formatPrice(snapshot.bollinger.lower)}\` / \`$${formatPrice(snapshot.bollinger.middle)}\` / \`$${formatPrice(snapshot.bollinger.upper)}\``,
    `• ATR: \`${snapshot.atr === null ? 'n/a' : formatPrice(snapshot.atr)}\``,
    '',
    '*Outlook*',
  ];

  if (input.momentum) {
    lines.push(`• ${MOMENTUM_LABELS[input.momentum]}`);
  }

  lines.push(
    `• 1D: \`$${formatPrice(projection.oneDay)}\` | 7D: \`$${formatPrice(projection.sevenDay)}\` | 30D: \`$${formatPrice(projection.thirtyDay)}\``,
    `• Time: \`${formatTime(sample.timestamp, input.timeZone)}\``
  );

  return {
    title: `📊 Summary for ${symbol}`,
    message: lines.join('\n'),
    priority: 'normal',
  };
}

export function formatTradeMessage(input: TradeMessageInput): NotificationPayload {
  const emoji = input.side === 'BUY' ? '🟢' : '🔴';

  return {
    title: `${emoji} ${input.side} order filled`,
    message: [
      `• Symbol: \`${input.symbol}\``,
      `• Quantity: \`${input.quantity} ${input.baseAsset}\``,
      `• Price: \`$${formatPrice(input.price)}\``,
      `• Order ID: \`${input.orderId}\``,
    ].join('\n'),
    priority: 'high',
  };
}

export function formatTradeFailedMessage(
  symbol: string,
  side: TradeSide,
  reason: string
): NotificationPayload {
  return {
    title: `⚠️ ${side} order failed`,
    message: [
      `• Symbol: \`${symbol}\``,
      `• Reason: ${escapeMarkdown(reason)}`,
      '',
      '_The trade will be retried on the next qualifying signal._',
    ].join('\n'),
    priority: 'high',
  };
}

/**
 * Format an error notification into a Telegram message
 */
export function formatErrorMessage(
  error: ErrorMessageInput,
  timeZone: string,
  priority: NotificationPayload['priority'] = 'high'
): NotificationPayload {
  return {
    title: 'Watcher error',
    message: [
      `• Type: \`${error.errorType}\``,
      `• Message: ${escapeMarkdown(error.message)}`,
      `• Time: \`${formatTime(error.timestamp, timeZone)}\``,
    ].join('\n'),
    priority,
  };
}

/**
 * Format a startup notification
 */
export function formatStartupMessage(
  symbol: string,
  pollIntervalMs: number,
  tradingEnabled: boolean,
  testnet: boolean
): NotificationPayload {
  const lines = [
    `• Symbol: \`${symbol}\``,
    `• Poll interval: \`${formatDuration(pollIntervalMs)}\``,
    `• Trading: \`${tradingEnabled ? 'enabled' : 'disabled'}\``,
  ];
  if (tradingEnabled) {
    lines.push(`• Environment: \`${testnet ? 'testnet' : 'mainnet'}\``);
  }

  return {
    title: '🚀 Signal watcher started',
    message: lines.join('\n'),
    priority: 'low',
  };
}

/**
 * Format a shutdown notification
 */
export function formatShutdownMessage(reason: string): NotificationPayload {
  return {
    title: '🛑 Signal watcher stopped',
    message: `• Reason: ${escapeMarkdown(reason)}`,
    priority: 'low',
  };
}

function describeFlags(signal: Signal): string[] {
  const flags: string[] = [];
  if (signal.ranging) flags.push('ranging');
  if (signal.breakout && signal.breakoutDirection) flags.push(`breakout ${signal.breakoutDirection}`);
  if (signal.dcaOpportunity) flags.push('DCA opportunity');
  return flags;
}

/**
 * Format price with appropriate decimal places
 */
export function formatPrice(price: number): string {
  if (price >= 1000) {
    return price.toLocaleString('en-US', {
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    });
  } else if (price >= 1) {
    return price.toFixed(4);
  } else {
    return price.toFixed(8);
  }
}

export function formatSignedPercent(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

function formatDuration(ms: number): string {
  const minutes = Math.round(ms / 60000);
  if (minutes >= 60 && minutes % 60 === 0) {
    return `${minutes / 60}h`;
  }
  if (minutes >= 1) {
    return `${minutes}m`;
  }
  return `${Math.round(ms / 1000)}s`;
}

function formatTime(timestamp: number, timeZone: string): string {
  return new Date(timestamp).toLocaleString('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Escape the characters Telegram's legacy Markdown treats as markup
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, '\\$&');
}

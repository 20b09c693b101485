/**
 * Common types for Crypto Signal Watcher
 */

// ===========================================
// Market Data Types
// ===========================================

/**
 * Open/high/low/close for one interval
 */
export interface OhlcBar {
  open: number;
  high: number;
  low: number;
  close: number;
}

/**
 * One observation of the watched pair, taken once per tick.
 * Percent changes are in percent units (2.5 = +2.5%).
 */
export interface Sample {
  timestamp: number;
  price: number;
  change1h: number;
  change24h: number;
  change7d: number;
  ohlc: OhlcBar;
}

// ===========================================
// Indicator Types
// ===========================================

export interface MacdResult {
  line: number;
  signal: number;
  histogram: number;
}

/**
 * Bollinger Bands calculation result
 */
export interface BollingerBandsResult {
  upper: number;
  middle: number;
  lower: number;
  bandwidth: number;
}

/**
 * Indicators derived from the current history window.
 * `null` marks an indicator whose lookback is not yet filled.
 */
export interface IndicatorSnapshot {
  rsi: number | null;
  macd: MacdResult | null;
  bollinger: BollingerBandsResult | null;
  atr: number | null;
}

// ===========================================
// Signal Types
// ===========================================

export type SignalAction = 'BUY' | 'SELL' | 'HOLD';

/**
 * Side of an executed trade
 */
export type TradeSide = Exclude<SignalAction, 'HOLD'>;

export type TrendKind = 'uptrend' | 'pullback' | 'downtrend' | 'sideways';

export type BreakoutDirection = 'up' | 'down';

export interface MarketClassification {
  trend: TrendKind;
  trendLabel: string;
  ranging: boolean;
  breakout: boolean;
  breakoutDirection: BreakoutDirection | null;
  dcaOpportunity: boolean;
}

/**
 * Trading signal produced every tick
 */
export interface Signal extends MarketClassification {
  action: SignalAction;
  reason: string;
}

// ===========================================
// Notification Types
// ===========================================

export type NotificationPriority = 'low' | 'normal' | 'high';

export interface NotificationPayload {
  title: string;
  message: string;
  priority: NotificationPriority;
}

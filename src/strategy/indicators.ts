/**
 * Technical Indicators Helper
 *
 * RSI, MACD, Bollinger Bands and ATR over the rolling history, computed with
 * the technicalindicators library. Each helper returns null until its
 * lookback is filled; callers treat null as "not ready", never as a value.
 */

import { ATR, BollingerBands, MACD, RSI } from 'technicalindicators';
import type {
  BollingerBandsResult,
  IndicatorSnapshot,
  MacdResult,
  OhlcBar,
} from '../types.js';
import type { IndicatorSettings } from './types.js';

/**
 * Largest number of samples any indicator needs before it is ready
 */
export function indicatorLookback(settings: IndicatorSettings): number {
  return Math.max(
    settings.rsiPeriod + 1,
    settings.macdSlow + settings.macdSignal,
    settings.bollingerPeriod,
    settings.atrPeriod + 1
  );
}

/**
 * Relative Strength Index with Wilder's smoothing.
 * Needs period + 1 closes (period price changes).
 *
 * Values come back rounded to 2 decimals. A window without losses reads 100,
 * a flat series included, so a flat market sits above the overbought
 * threshold. A window without gains reads 0.
 */
export function calculateRsi(closePrices: number[], period: number = 14): number | null {
  if (closePrices.length < period + 1) {
    return null;
  }

  const result = RSI.calculate({ period, values: closePrices });
  const latest = result[result.length - 1];

  return latest === undefined ? null : latest;
}

/**
 * MACD line, signal line and histogram using exponential averages.
 * Needs slow + signal closes so the signal EMA has a full window.
 */
export function calculateMacd(
  closePrices: number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MacdResult | null {
  if (closePrices.length < slowPeriod + signalPeriod) {
    return null;
  }

  const result = MACD.calculate({
    values: closePrices,
    fastPeriod,
    slowPeriod,
    signalPeriod,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  });

  const latest = result[result.length - 1];
  if (
    !latest ||
    latest.MACD === undefined ||
    latest.signal === undefined ||
    latest.histogram === undefined
  ) {
    return null;
  }

  return {
    line: latest.MACD,
    signal: latest.signal,
    histogram: latest.histogram,
  };
}

/**
 * Calculate Bollinger Bands for given price data
 *
 * @param closePrices - Array of close prices (most recent last)
 * @param period - Moving average period (default: 20)
 * @param stdDev - Standard deviation multiplier (default: 2)
 * @returns Bollinger Bands result or null if insufficient data
 */
export function calculateBollingerBands(
  closePrices: number[],
  period: number = 20,
  stdDev: number = 2
): BollingerBandsResult | null {
  if (closePrices.length < period) {
    return null;
  }

  const result = BollingerBands.calculate({
    period,
    values: closePrices,
    stdDev,
  });

  // Get the most recent value
  const latest = result[result.length - 1];

  if (!latest) {
    return null;
  }

  const { upper, middle, lower } = latest;

  // Calculate bandwidth: (Upper - Lower) / Middle
  const bandwidth = middle === 0 ? 0 : (upper - lower) / middle;

  return {
    upper,
    middle,
    lower,
    bandwidth,
  };
}

/**
 * Average True Range over OHLC bars. Needs period + 1 bars.
 */
export function calculateAtr(bars: OhlcBar[], period: number = 14): number | null {
  if (bars.length < period + 1) {
    return null;
  }

  const result = ATR.calculate({
    period,
    high: bars.map((bar) => bar.high),
    low: bars.map((bar) => bar.low),
    close: bars.map((bar) => bar.close),
  });

  const latest = result[result.length - 1];
  return latest === undefined ? null : latest;
}

/**
 * Derive every indicator from the current history window
 */
export function computeIndicatorSnapshot(
  closePrices: number[],
  bars: OhlcBar[],
  settings: IndicatorSettings
): IndicatorSnapshot {
  return {
    rsi: calculateRsi(closePrices, settings.rsiPeriod),
    macd: calculateMacd(
      closePrices,
      settings.macdFast,
      settings.macdSlow,
      settings.macdSignal
    ),
    bollinger: calculateBollingerBands(
      closePrices,
      settings.bollingerPeriod,
      settings.bollingerStdDev
    ),
    atr: calculateAtr(bars, settings.atrPeriod),
  };
}

/**
 * Check if price is at or below lower band, allowing a relative tolerance
 */
export function isAtLowerBand(price: number, lowerBand: number, tolerance: number = 0): boolean {
  return price <= lowerBand * (1 + tolerance);
}

/**
 * Check if price is at or above upper band, allowing a relative tolerance
 */
export function isAtUpperBand(price: number, upperBand: number, tolerance: number = 0): boolean {
  return price >= upperBand * (1 - tolerance);
}

/**
 * Check if bandwidth indicates a squeeze (low volatility)
 */
export function isSqueezeActive(bandwidth: number, threshold: number): boolean {
  return bandwidth < threshold;
}

/**
 * Market Classification
 *
 * Advisory labels attached to every signal. They are derived from the
 * sample's percent changes and the Bollinger band geometry only and never
 * feed back into the BUY/SELL/HOLD decision.
 */

import type {
  BollingerBandsResult,
  BreakoutDirection,
  MarketClassification,
  Sample,
  TrendKind,
} from '../types.js';
import type { SignalThresholds } from './types.js';
import { isSqueezeActive } from './indicators.js';

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

/**
 * Trend label from short, daily and weekly percent changes
 */
export function analyzeTrend(
  sample: Pick<Sample, 'change1h' | 'change24h' | 'change7d'>
): { trend: TrendKind; label: string } {
  const { change1h, change24h, change7d } = sample;

  if (change1h > 1 && change24h > 2) {
    return {
      trend: 'uptrend',
      label: `🟢 Uptrend: 1h ${signed(change1h)}, 24h ${signed(change24h)}`,
    };
  }

  if (change1h < -1 && change24h > 2) {
    return {
      trend: 'pullback',
      label: `🟡 Pullback: 1h ${signed(change1h)} drop, 24h ${signed(change24h)} uptrend continues`,
    };
  }

  if (change24h < 0 && change7d < 0) {
    return {
      trend: 'downtrend',
      label: `🔴 Downtrend: 24h ${signed(change24h)}, 7d ${signed(change7d)}`,
    };
  }

  return {
    trend: 'sideways',
    label: `⚪ Sideways: 1h ${signed(change1h)}, 24h ${signed(change24h)}, 7d ${signed(change7d)}`,
  };
}

/**
 * Price outside the bands on a strong hourly move
 */
export function detectBreakout(
  price: number,
  change1h: number,
  bands: BollingerBandsResult | null,
  minChange: number
): BreakoutDirection | null {
  if (!bands || Math.abs(change1h) < minChange) {
    return null;
  }
  if (price > bands.upper && change1h > 0) {
    return 'up';
  }
  if (price < bands.lower && change1h < 0) {
    return 'down';
  }
  return null;
}

export function classifyMarket(
  sample: Sample,
  bands: BollingerBandsResult | null,
  thresholds: SignalThresholds
): MarketClassification {
  const { trend, label } = analyzeTrend(sample);

  const ranging =
    Math.abs(sample.change24h) < thresholds.rangingMaxChange &&
    (bands === null || isSqueezeActive(bands.bandwidth, thresholds.bandwidthThreshold));

  const breakoutDirection = detectBreakout(
    sample.price,
    sample.change1h,
    bands,
    thresholds.breakoutMinChange
  );

  // A daily dip that is not part of a weekly crash
  const dcaOpportunity =
    sample.change24h <= -thresholds.dcaDipPercent &&
    sample.change7d > -2 * thresholds.dcaDipPercent;

  return {
    trend,
    trendLabel: label,
    ranging,
    breakout: breakoutDirection !== null,
    breakoutDirection,
    dcaOpportunity,
  };
}

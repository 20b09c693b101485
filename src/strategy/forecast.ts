/**
 * Heuristic price outlook included in summaries. Not used for decisions.
 */

import type { MomentumDirection, PriceProjection } from './types.js';

const SHORT_WINDOW = 3;
const LONG_WINDOW = 5;

/** 1h move that counts as a rebound against a falling day */
const REBOUND_1H_THRESHOLD = 0.5;

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Compare the 3-sample and 5-sample averages of the latest closes
 */
export function predictMomentum(closePrices: number[]): MomentumDirection | null {
  if (closePrices.length < LONG_WINDOW) {
    return null;
  }

  const shortMa = average(closePrices.slice(-SHORT_WINDOW));
  const longMa = average(closePrices.slice(-LONG_WINDOW));

  if (shortMa > longMa) return 'up';
  if (shortMa < longMa) return 'down';
  return 'flat';
}

/**
 * Project the price forward by extrapolating the percent changes.
 * The 30 day figure compounds the weekly rate four times.
 */
export function projectPrices(
  price: number,
  change1h: number,
  change24h: number,
  change7d: number
): PriceProjection {
  const dailyChange =
    change24h < 0 && change1h > REBOUND_1H_THRESHOLD
      ? (change1h + change24h) / 2
      : change24h;

  const weeklyFactor = 1 + change7d / 100;

  return {
    oneDay: price * (1 + dailyChange / 100),
    sevenDay: price * weeklyFactor,
    thirtyDay: price * weeklyFactor ** 4,
  };
}

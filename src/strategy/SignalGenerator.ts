/**
 * Signal Generator
 *
 * Fuses an indicator snapshot and the current price into BUY, SELL or HOLD.
 * Pure and deterministic: the same snapshot and price always give the same
 * action. BUY and SELL each need every condition of their side; RSI
 * thresholds are disjoint so both can never hold at once.
 */

import type { IndicatorSnapshot, Sample, Signal, SignalAction } from '../types.js';
import type { SignalThresholds } from './types.js';
import { isAtLowerBand, isAtUpperBand } from './indicators.js';
import { classifyMarket } from './classification.js';

export interface ActionEvaluation {
  action: SignalAction;
  reason: string;
}

/**
 * Decide the action for the current price
 */
export function evaluateAction(
  snapshot: IndicatorSnapshot,
  price: number,
  thresholds: SignalThresholds
): ActionEvaluation {
  const { rsi, macd, bollinger } = snapshot;

  // Abstain until every voting indicator is ready
  if (rsi === null || macd === null || bollinger === null) {
    const missing = [
      rsi === null ? 'RSI' : null,
      macd === null ? 'MACD' : null,
      bollinger === null ? 'Bollinger' : null,
    ].filter((name): name is string => name !== null);

    return {
      action: 'HOLD',
      reason: `Insufficient history for ${missing.join(', ')}`,
    };
  }

  // Oversold, bullish momentum, price at or under the lower band
  if (
    rsi < thresholds.rsiOversold &&
    macd.histogram > 0 &&
    isAtLowerBand(price, bollinger.lower, thresholds.bandTolerance)
  ) {
    return {
      action: 'BUY',
      reason: `RSI ${rsi.toFixed(2)} < ${thresholds.rsiOversold}, MACD histogram ${macd.histogram.toFixed(4)} > 0, price ${price} near lower band ${bollinger.lower.toFixed(4)}`,
    };
  }

  // Overbought, bearish momentum, price at or over the upper band
  if (
    rsi > thresholds.rsiOverbought &&
    macd.histogram < 0 &&
    isAtUpperBand(price, bollinger.upper, thresholds.bandTolerance)
  ) {
    return {
      action: 'SELL',
      reason: `RSI ${rsi.toFixed(2)} > ${thresholds.rsiOverbought}, MACD histogram ${macd.histogram.toFixed(4)} < 0, price ${price} near upper band ${bollinger.upper.toFixed(4)}`,
    };
  }

  return {
    action: 'HOLD',
    reason: 'No BUY/SELL conditions met',
  };
}

/**
 * Build the full signal: action plus advisory classification
 */
export function generateSignal(
  snapshot: IndicatorSnapshot,
  sample: Sample,
  thresholds: SignalThresholds
): Signal {
  const { action, reason } = evaluateAction(snapshot, sample.price, thresholds);
  const classification = classifyMarket(sample, snapshot.bollinger, thresholds);

  return {
    action,
    reason,
    ...classification,
  };
}

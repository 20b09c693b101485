/**
 * Gates
 *
 * Pure per-tick decisions. The alert and summary gates advance their state
 * as soon as they fire; the trade gate only advances through recordTrade,
 * which the caller invokes after the exchange confirmed the order.
 */

import type { SignalAction, TradeSide } from '../types.js';
import type {
  AlertDecision,
  GateSettings,
  OrchestratorState,
  TickDecision,
} from './types.js';

export function createInitialState(tradingEnabled: boolean): OrchestratorState {
  return {
    lastAlertPrice: null,
    lastAlertDirection: null,
    lastSummaryAt: null,
    lastTradeSide: null,
    tradingEnabled,
  };
}

/**
 * Fires when price moved at least `thresholdPercent` from the last alert price
 */
export function evaluateAlertGate(
  lastAlertPrice: number | null,
  price: number,
  thresholdPercent: number
): AlertDecision | null {
  if (lastAlertPrice === null || lastAlertPrice === 0) {
    return null;
  }

  const changePercent = ((price - lastAlertPrice) / lastAlertPrice) * 100;

  if (changePercent >= thresholdPercent) {
    return { direction: 'up', price, referencePrice: lastAlertPrice, changePercent };
  }
  if (changePercent <= -thresholdPercent) {
    return { direction: 'down', price, referencePrice: lastAlertPrice, changePercent };
  }
  return null;
}

export function evaluateSummaryGate(
  lastSummaryAt: number | null,
  now: number,
  intervalMs: number
): boolean {
  return lastSummaryAt === null || now - lastSummaryAt >= intervalMs;
}

/**
 * Fires for BUY/SELL unless the last confirmed trade was the same side
 */
export function evaluateTradeGate(
  state: OrchestratorState,
  action: SignalAction
): TradeSide | null {
  if (!state.tradingEnabled || action === 'HOLD') {
    return null;
  }
  return action === state.lastTradeSide ? null : action;
}

/**
 * Evaluate all three gates independently and advance the alert and
 * summary state. Trade state is left for recordTrade.
 */
export function decideTick(
  state: OrchestratorState,
  price: number,
  action: SignalAction,
  now: number,
  settings: GateSettings
): { decision: TickDecision; state: OrchestratorState } {
  let next: OrchestratorState = { ...state };

  // Alert gate: the first observed price becomes the baseline
  const alert = evaluateAlertGate(state.lastAlertPrice, price, settings.alertThresholdPercent);
  if (state.lastAlertPrice === null) {
    next = { ...next, lastAlertPrice: price };
  } else if (alert) {
    next = { ...next, lastAlertPrice: price, lastAlertDirection: alert.direction };
  }

  // Summary gate
  let summaryDue = false;
  if (state.lastSummaryAt === null && !settings.summaryOnStartup) {
    next = { ...next, lastSummaryAt: now };
  } else if (evaluateSummaryGate(state.lastSummaryAt, now, settings.summaryIntervalMs)) {
    summaryDue = true;
    next = { ...next, lastSummaryAt: now };
  }

  // Trade gate
  const side = evaluateTradeGate(state, action);

  return {
    decision: {
      alert,
      summaryDue,
      trade: side ? { side, price } : null,
    },
    state: next,
  };
}

/**
 * Advance the trade gate after a confirmed order
 */
export function recordTrade(state: OrchestratorState, side: TradeSide): OrchestratorState {
  return { ...state, lastTradeSide: side };
}

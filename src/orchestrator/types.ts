/**
 * Types for the Orchestrator
 */

import type { DataFetchError } from '../errors.js';
import type { TradeResult } from '../execution/types.js';
import type { IndicatorSnapshot, Sample, Signal, TradeSide } from '../types.js';

export type AlertDirection = 'up' | 'down';

/**
 * State carried between ticks. Each gate owns its own fields.
 * In memory only: a restart starts from the initial state.
 */
export interface OrchestratorState {
  /** Alert gate: price of the last alert (or the first observed price) */
  lastAlertPrice: number | null;
  lastAlertDirection: AlertDirection | null;
  /** Summary gate: time the last summary fired */
  lastSummaryAt: number | null;
  /** Trade gate: side of the last confirmed order */
  lastTradeSide: TradeSide | null;
  tradingEnabled: boolean;
}

export interface GateSettings {
  alertThresholdPercent: number;
  summaryIntervalMs: number;
  /** Fire the first summary on the first tick instead of one interval later */
  summaryOnStartup: boolean;
}

export interface AlertDecision {
  direction: AlertDirection;
  price: number;
  referencePrice: number;
  changePercent: number;
}

export interface TradeDecision {
  side: TradeSide;
  price: number;
}

/**
 * What the gates decided for one tick
 */
export interface TickDecision {
  alert: AlertDecision | null;
  summaryDue: boolean;
  trade: TradeDecision | null;
}

export type TradeOutcome = 'none' | 'executed' | 'failed';

export interface TickReport {
  timestamp: number;
  sample: Sample;
  snapshot: IndicatorSnapshot;
  signal: Signal;
  decision: TickDecision;
  alertSent: boolean;
  summarySent: boolean;
  trade: TradeOutcome;
}

export interface OrchestratorEvents {
  tick: [report: TickReport];
  alert: [alert: AlertDecision];
  summary: [report: Omit<TickReport, 'alertSent' | 'summarySent' | 'trade'>];
  tradeExecuted: [result: TradeResult];
  tradeFailed: [side: TradeSide, reason: string];
  dataError: [error: DataFetchError];
}

/**
 * Tests for the alert, summary and trade gates
 */

import { describe, it, expect } from 'vitest';
import {
  createInitialState,
  decideTick,
  evaluateAlertGate,
  evaluateSummaryGate,
  evaluateTradeGate,
  recordTrade,
} from '../../src/orchestrator/gates.js';
import type { GateSettings } from '../../src/orchestrator/types.js';

const HOUR = 60 * 60 * 1000;

const settings: GateSettings = {
  alertThresholdPercent: 5,
  summaryIntervalMs: 24 * HOUR,
  summaryOnStartup: true,
};

describe('evaluateAlertGate', () => {
  it('should not fire without a baseline', () => {
    expect(evaluateAlertGate(null, 100, 5)).toBeNull();
  });

  it('should fire up at exactly the threshold', () => {
    expect(evaluateAlertGate(100, 105, 5)).toEqual({
      direction: 'up',
      price: 105,
      referencePrice: 100,
      changePercent: 5,
    });
  });

  it('should fire down at exactly the threshold', () => {
    expect(evaluateAlertGate(100, 95, 5)?.direction).toBe('down');
  });

  it('should stay quiet inside the threshold', () => {
    expect(evaluateAlertGate(100, 104.9, 5)).toBeNull();
    expect(evaluateAlertGate(100, 95.1, 5)).toBeNull();
  });
});

describe('evaluateSummaryGate', () => {
  it('should be due when no summary was sent yet', () => {
    expect(evaluateSummaryGate(null, 0, HOUR)).toBe(true);
  });

  it('should be due once the interval elapsed', () => {
    expect(evaluateSummaryGate(0, HOUR - 1, HOUR)).toBe(false);
    expect(evaluateSummaryGate(0, HOUR, HOUR)).toBe(true);
  });
});

describe('evaluateTradeGate', () => {
  it('should never fire while trading is disabled', () => {
    expect(evaluateTradeGate(createInitialState(false), 'BUY')).toBeNull();
  });

  it('should never fire on HOLD', () => {
    expect(evaluateTradeGate(createInitialState(true), 'HOLD')).toBeNull();
  });

  it('should fire on a side change only', () => {
    const state = recordTrade(createInitialState(true), 'BUY');

    expect(evaluateTradeGate(state, 'BUY')).toBeNull();
    expect(evaluateTradeGate(state, 'SELL')).toBe('SELL');
  });
});

describe('decideTick', () => {
  it('should take the first price as the alert baseline without firing', () => {
    const { decision, state } = decideTick(createInitialState(false), 100, 'HOLD', 0, settings);

    expect(decision.alert).toBeNull();
    expect(state.lastAlertPrice).toBe(100);
  });

  it('should move the baseline to the alert price when it fires', () => {
    let state = decideTick(createInitialState(false), 100, 'HOLD', 0, settings).state;
    const result = decideTick(state, 106, 'HOLD', HOUR, settings);
    state = result.state;

    expect(result.decision.alert?.direction).toBe('up');
    expect(state.lastAlertPrice).toBe(106);
    expect(state.lastAlertDirection).toBe('up');

    // 108 is only +1.9% from the new baseline
    expect(decideTick(state, 108, 'HOLD', 2 * HOUR, settings).decision.alert).toBeNull();
  });

  it('should send the first summary on startup', () => {
    const { decision, state } = decideTick(createInitialState(false), 100, 'HOLD', 1000, settings);

    expect(decision.summaryDue).toBe(true);
    expect(state.lastSummaryAt).toBe(1000);
  });

  it('should delay the first summary by one interval when not sent on startup', () => {
    const quiet = { ...settings, summaryOnStartup: false };
    const first = decideTick(createInitialState(false), 100, 'HOLD', 0, quiet);

    expect(first.decision.summaryDue).toBe(false);
    expect(first.state.lastSummaryAt).toBe(0);
    expect(decideTick(first.state, 100, 'HOLD', 24 * HOUR, quiet).decision.summaryDue).toBe(true);
  });

  it('should fire the summary once per interval', () => {
    let state = createInitialState(false);
    let fired = 0;

    for (let hour = 0; hour < 48; hour++) {
      const result = decideTick(state, 100, 'HOLD', hour * HOUR, settings);
      state = result.state;
      if (result.decision.summaryDue) fired++;
    }

    // Hours 0 and 24
    expect(fired).toBe(2);
  });

  it('should leave the trade state for recordTrade', () => {
    const { decision, state } = decideTick(createInitialState(true), 100, 'BUY', 0, settings);

    expect(decision.trade).toEqual({ side: 'BUY', price: 100 });
    expect(state.lastTradeSide).toBeNull();
  });

  it('should not mutate the input state', () => {
    const initial = createInitialState(true);
    decideTick(initial, 100, 'BUY', 0, settings);

    expect(initial).toEqual(createInitialState(true));
  });

  it('should evaluate every gate on the same tick', () => {
    const state = decideTick(createInitialState(true), 100, 'HOLD', 0, settings).state;
    const { decision } = decideTick(state, 90, 'BUY', 24 * HOUR, settings);

    expect(decision.alert?.direction).toBe('down');
    expect(decision.summaryDue).toBe(true);
    expect(decision.trade?.side).toBe('BUY');
  });
});

/**
 * Orchestrator
 *
 * Sequential polling loop:
 * Market Data → History Buffer → Indicators → Signal → Gates → Effects
 *
 * One tick runs at a time. Collaborator failures are contained to the tick
 * that hit them; only the constructor can fail hard.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import type { Config } from '../config.js';
import {
  ConfigurationError,
  DataFetchError,
  ExchangeError,
  errorMessage,
} from '../errors.js';
import { HistoryBuffer } from '../history/index.js';
import {
  computeIndicatorSnapshot,
  generateSignal,
  indicatorLookback,
  predictMomentum,
  projectPrices,
} from '../strategy/index.js';
import {
  formatAlertMessage,
  formatErrorMessage,
  formatSummaryMessage,
  formatTradeFailedMessage,
  formatTradeMessage,
} from '../notification/formatter.js';
import type { Notifier } from '../notification/types.js';
import type { ExchangeClient } from '../execution/types.js';
import { TradeExecutor } from '../execution/TradeExecutor.js';
import type { MarketDataSource } from '../market/types.js';
import type { NotificationPayload, Sample, Signal, IndicatorSnapshot } from '../types.js';
import { withTimeout } from '../utils/timeout.js';
import { createInitialState, decideTick, recordTrade } from './gates.js';
import type {
  AlertDecision,
  GateSettings,
  OrchestratorEvents,
  OrchestratorState,
  TickReport,
  TradeDecision,
  TradeOutcome,
} from './types.js';

/** Balance reads are retried; order placement never is */
const BALANCE_RETRY_ATTEMPTS = 3;
const BALANCE_RETRY_DELAY_MS = 1000;

export interface OrchestratorDependencies {
  marketData: MarketDataSource;
  notifier: Notifier;
  /** Required when trading is enabled */
  exchange?: ExchangeClient;
  /** Time source, replaced in tests to simulate elapsed time */
  clock?: () => number;
}

export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly config: Config;
  private readonly marketData: MarketDataSource;
  private readonly notifier: Notifier;
  private readonly executor: TradeExecutor | null;
  private readonly clock: () => number;
  private readonly history: HistoryBuffer;
  private readonly gateSettings: GateSettings;
  private state: OrchestratorState;

  private running = false;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(config: Config, deps: OrchestratorDependencies) {
    super();
    this.config = config;
    this.marketData = deps.marketData;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? Date.now;

    if (config.trading.enabled && !deps.exchange) {
      throw new ConfigurationError('TRADING_ENABLED', 'Trading is enabled but no exchange client was provided');
    }

    this.executor =
      config.trading.enabled && deps.exchange
        ? new TradeExecutor(
            {
              symbol: config.pair.symbol,
              baseAsset: config.pair.baseAsset,
              quoteAsset: config.pair.quoteAsset,
              notional: config.trading.notional,
              quantityPrecision: config.trading.quantityPrecision,
              retryAttempts: BALANCE_RETRY_ATTEMPTS,
              retryDelayMs: BALANCE_RETRY_DELAY_MS,
              callTimeoutMs: config.loop.callTimeoutMs,
            },
            deps.exchange
          )
        : null;

    const lookback = indicatorLookback(config.indicators);
    this.history = new HistoryBuffer(lookback + config.loop.historyMargin, lookback);

    this.gateSettings = {
      alertThresholdPercent: config.alerts.thresholdPercent,
      summaryIntervalMs: config.summary.intervalMs,
      summaryOnStartup: config.summary.onStartup,
    };

    this.state = createInitialState(config.trading.enabled);

    logger.info('Orchestrator initialized', {
      symbol: config.pair.symbol,
      historyCapacity: this.history.capacity,
      pollIntervalMs: config.loop.pollIntervalMs,
      tradingEnabled: config.trading.enabled,
    });
  }

  /**
   * Verify the exchange when trading is enabled
   */
  public async initialize(): Promise<boolean> {
    if (!this.executor) {
      return true;
    }
    return withTimeout(this.executor.initialize(), this.config.loop.callTimeoutMs, 'verifyConnection');
  }

  /**
   * Run the loop until stop() is called
   */
  public async start(): Promise<void> {
    if (this.running) {
      logger.warn('Orchestrator already running');
      return;
    }
    this.running = true;

    if (this.config.loop.backfillHistory) {
      await this.warmUp();
    }

    while (this.running) {
      try {
        await this.runTick();
      } catch (error) {
        logger.error('Unexpected tick failure', { error: errorMessage(error) });
      }

      if (!this.running) break;
      await this.sleep(this.config.loop.pollIntervalMs);
    }

    logger.info('Orchestrator loop ended');
  }

  /**
   * End the loop after the current tick and cancel the pending wait
   */
  public stop(): void {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    if (this.wakeUp) {
      this.wakeUp();
      this.wakeUp = null;
    }
  }

  /**
   * One iteration: fetch, analyze, gate, dispatch.
   * Returns null when the sample could not be fetched.
   */
  public async runTick(now: number = this.clock()): Promise<TickReport | null> {
    let sample: Sample;
    try {
      sample = await withTimeout(
        this.marketData.fetchSample(),
        this.config.loop.callTimeoutMs,
        'fetchSample'
      );
    } catch (error) {
      await this.handleDataError(error, now);
      return null;
    }

    this.history.append(sample);

    const snapshot = computeIndicatorSnapshot(
      this.history.closes(),
      this.history.bars(),
      this.config.indicators
    );
    const signal = generateSignal(snapshot, sample, this.config.signal);

    const { decision, state } = decideTick(
      this.state,
      sample.price,
      signal.action,
      now,
      this.gateSettings
    );
    this.state = state;

    logger.info('Tick evaluated', {
      price: sample.price,
      action: signal.action,
      trend: signal.trend,
      rsi: snapshot.rsi === null ? null : snapshot.rsi.toFixed(2),
      bufferLength: this.history.size,
      alert: decision.alert?.direction ?? null,
      summaryDue: decision.summaryDue,
      trade: decision.trade?.side ?? null,
    });

    // Gates dispatch independently; none of them can suppress another
    const alertSent = decision.alert ? await this.dispatchAlert(decision.alert, signal) : false;
    const summarySent = decision.summaryDue
      ? await this.dispatchSummary(now, sample, snapshot, signal, decision)
      : false;
    const trade: TradeOutcome = decision.trade ? await this.dispatchTrade(decision.trade) : 'none';

    const report: TickReport = {
      timestamp: now,
      sample,
      snapshot,
      signal,
      decision,
      alertSent,
      summarySent,
      trade,
    };

    this.emit('tick', report);
    return report;
  }

  public getState(): Readonly<OrchestratorState> {
    return { ...this.state };
  }

  public getBufferLength(): number {
    return this.history.size;
  }

  public isRunning(): boolean {
    return this.running;
  }

  /**
   * Seed the history from past intervals so indicators are ready from the
   * first tick. Failure leaves the buffer to fill from live ticks.
   */
  public async warmUp(): Promise<void> {
    try {
      const samples = await withTimeout(
        this.marketData.fetchHistory(this.history.capacity),
        this.config.loop.callTimeoutMs,
        'fetchHistory'
      );
      this.history.seed(samples);
      logger.info('History backfilled', { samples: samples.length, bufferLength: this.history.size });
    } catch (error) {
      logger.warn('History backfill failed, indicators will warm up from live ticks', {
        error: errorMessage(error),
      });
    }
  }

  private async dispatchAlert(alert: AlertDecision, signal: Signal): Promise<boolean> {
    this.emit('alert', alert);

    return this.notify('alert', () =>
      formatAlertMessage({
        symbol: this.config.pair.symbol,
        price: alert.price,
        referencePrice: alert.referencePrice,
        changePercent: alert.changePercent,
        thresholdPercent: this.config.alerts.thresholdPercent,
        direction: alert.direction,
        signal,
        momentum: predictMomentum(this.history.closes()),
      })
    );
  }

  private async dispatchSummary(
    now: number,
    sample: Sample,
    snapshot: IndicatorSnapshot,
    signal: Signal,
    decision: TickReport['decision']
  ): Promise<boolean> {
    this.emit('summary', { timestamp: now, sample, snapshot, signal, decision });

    return this.notify('summary', () =>
      formatSummaryMessage({
        symbol: this.config.pair.symbol,
        sample,
        signal,
        snapshot,
        momentum: predictMomentum(this.history.closes()),
        projection: projectPrices(sample.price, sample.change1h, sample.change24h, sample.change7d),
        timeZone: this.config.summary.timeZone,
      })
    );
  }

  /**
   * Only a confirmed order advances the trade gate
   */
  private async dispatchTrade(trade: TradeDecision): Promise<TradeOutcome> {
    if (!this.executor) {
      return 'none';
    }

    try {
      const result = await this.executor.execute(trade.side, trade.price);
      this.state = recordTrade(this.state, trade.side);
      this.emit('tradeExecuted', result);

      await this.notify('trade', () =>
        formatTradeMessage({
          symbol: this.config.pair.symbol,
          baseAsset: this.config.pair.baseAsset,
          side: trade.side,
          quantity: result.quantity,
          price: result.confirmation.avgPrice ?? trade.price,
          orderId: result.confirmation.orderId,
        })
      );
      return 'executed';
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn('Trade attempt failed, gate left open', {
        side: trade.side,
        reason,
        retryable: error instanceof ExchangeError ? error.retryable : false,
      });
      this.emit('tradeFailed', trade.side, reason);

      await this.notify('trade failure', () =>
        formatTradeFailedMessage(this.config.pair.symbol, trade.side, reason)
      );
      return 'failed';
    }
  }

  private async handleDataError(error: unknown, now: number): Promise<void> {
    const dataError = this.toDataFetchError(error);

    logger.error('Market data fetch failed, skipping tick', {
      error: dataError.message,
      transient: dataError.transient,
    });
    this.emit('dataError', dataError);

    await this.notify('data error', () =>
      formatErrorMessage(
        {
          errorType: dataError.transient ? 'DataFetchError (transient)' : 'DataFetchError',
          message: dataError.message,
          timestamp: now,
        },
        this.config.summary.timeZone,
        dataError.transient ? 'normal' : 'high'
      )
    );
  }

  private toDataFetchError(error: unknown): DataFetchError {
    if (error instanceof DataFetchError) {
      return error;
    }
    // Timeouts and unclassified failures are treated as transient
    return new DataFetchError(errorMessage(error), true, { cause: error });
  }

  /**
   * Best-effort delivery: formatting and sending failures are logged and
   * never propagate
   */
  private async notify(kind: string, build: () => NotificationPayload): Promise<boolean> {
    let title: string | undefined;
    try {
      const payload = build();
      title = payload.title;
      await withTimeout(
        this.notifier.send(payload.title, payload.message, payload.priority),
        this.config.loop.callTimeoutMs,
        'notify'
      );
      return true;
    } catch (error) {
      logger.warn('Notification delivery failed', {
        kind,
        title,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeUp = null;
        resolve();
      }, ms);
    });
  }
}

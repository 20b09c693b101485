/**
 * Application
 *
 * Wires the collaborators and owns the lifecycle:
 * Market Data → Orchestrator → Notification / Trade Executor
 */

import { logger, maskSecret } from './logger.js';
import type { Config } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { BinanceMarketDataSource } from './market/index.js';
import type { MarketDataSource } from './market/index.js';
import { BinanceSpotClient } from './execution/index.js';
import type { ExchangeClient } from './execution/index.js';
import {
  NotificationService,
  formatShutdownMessage,
  formatStartupMessage,
} from './notification/index.js';
import { Orchestrator } from './orchestrator/index.js';
import type { TickReport } from './orchestrator/index.js';

export interface AppDependencies {
  marketData?: MarketDataSource;
  notificationService?: NotificationService;
  exchange?: ExchangeClient;
}

export class App {
  private readonly config: Config;
  private readonly notificationService: NotificationService;
  private readonly orchestrator: Orchestrator;
  private loop: Promise<void> | null = null;
  private isRunning = false;

  constructor(config: Config, deps: AppDependencies = {}) {
    this.config = config;

    this.notificationService =
      deps.notificationService ??
      new NotificationService({
        botToken: config.telegram.botToken,
        chatId: config.telegram.chatId,
        retryAttempts: config.telegram.retryAttempts,
        retryDelayMs: config.telegram.retryDelayMs,
        requestTimeoutMs: config.telegram.requestTimeoutMs,
      });

    const marketData =
      deps.marketData ??
      new BinanceMarketDataSource({
        symbol: config.pair.symbol,
        testnet: config.binance.testnet,
      });

    // Exchange credentials are only touched when orders can be placed
    let exchange: ExchangeClient | undefined;
    if (config.trading.enabled) {
      exchange =
        deps.exchange ??
        new BinanceSpotClient({
          apiKey: config.binance.apiKey,
          apiSecret: config.binance.apiSecret,
          testnet: config.binance.testnet,
        });
    }

    this.orchestrator = new Orchestrator(config, {
      marketData,
      notifier: this.notificationService,
      exchange,
    });

    this.setupEvents();
  }

  private setupEvents(): void {
    this.orchestrator.on('tick', (report: TickReport) => {
      logger.debug('Tick complete', {
        action: report.signal.action,
        alertSent: report.alertSent,
        summarySent: report.summarySent,
        trade: report.trade,
      });
    });

    this.orchestrator.on('alert', (alert) => {
      logger.info('Price alert', {
        direction: alert.direction,
        price: alert.price,
        changePercent: alert.changePercent.toFixed(2),
      });
    });

    this.orchestrator.on('tradeExecuted', (result) => {
      logger.info('Order executed successfully', {
        side: result.side,
        orderId: result.confirmation.orderId,
        quantity: result.quantity,
      });
    });

    this.orchestrator.on('tradeFailed', (side, reason) => {
      logger.warn('Order execution failed', { side, reason });
    });

    this.orchestrator.on('dataError', (error) => {
      logger.warn('Tick skipped', { error: error.message, transient: error.transient });
    });

    this.notificationService.on('failed', (title, error) => {
      logger.error('Notification Service error', { title, error: error.message });
    });
  }

  /**
   * Verify collaborators, announce startup and run the loop in the background
   */
  public async start(): Promise<void> {
    logger.info('Starting crypto signal watcher', {
      symbol: this.config.pair.symbol,
      pollIntervalMs: this.config.loop.pollIntervalMs,
      tradingEnabled: this.config.trading.enabled,
      testnet: this.config.binance.testnet,
      apiKey: this.config.trading.enabled ? maskSecret(this.config.binance.apiKey) : undefined,
    });

    // Verify Telegram connection
    const telegramOk = await this.notificationService.verifyConnection();
    if (!telegramOk) {
      throw new ConfigurationError('TELEGRAM_BOT_TOKEN', 'Failed to verify Telegram connection');
    }

    if (this.config.trading.enabled) {
      let exchangeOk = false;
      try {
        exchangeOk = await this.orchestrator.initialize();
      } catch (error) {
        logger.error('Exchange verification failed', { error: errorMessage(error) });
      }
      if (!exchangeOk) {
        throw new ConfigurationError('BINANCE_API_KEY', 'Failed to verify exchange credentials');
      }
    } else {
      logger.info('Trading is disabled, signals are notify-only');
    }

    const startup = formatStartupMessage(
      this.config.pair.symbol,
      this.config.loop.pollIntervalMs,
      this.config.trading.enabled,
      this.config.binance.testnet
    );
    try {
      await this.notificationService.send(startup.title, startup.message, startup.priority);
    } catch (error) {
      logger.warn('Startup notification failed', { error: errorMessage(error) });
    }

    this.isRunning = true;
    this.loop = this.orchestrator.start();

    logger.info('Watcher started successfully');
  }

  /**
   * Stop the loop and announce shutdown
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping crypto signal watcher', { reason });
    this.isRunning = false;

    this.orchestrator.stop();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }

    const shutdown = formatShutdownMessage(reason);
    try {
      await this.notificationService.send(shutdown.title, shutdown.message, shutdown.priority);
    } catch (error) {
      logger.error('Failed to send shutdown notification', { error: errorMessage(error) });
    }

    logger.info('Watcher stopped successfully');
  }

  public getStatus(): {
    isRunning: boolean;
    bufferLength: number;
    tradingEnabled: boolean;
    lastTradeSide: string | null;
  } {
    const state = this.orchestrator.getState();
    return {
      isRunning: this.isRunning,
      bufferLength: this.orchestrator.getBufferLength(),
      tradingEnabled: state.tradingEnabled,
      lastTradeSide: state.lastTradeSide,
    };
  }
}

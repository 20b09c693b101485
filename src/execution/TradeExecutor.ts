/**
 * Trade Executor
 *
 * Orchestrates one trade attempt:
 * Side → Position Sizing → Balance Check → Validation → Market Order
 *
 * Resolves with the trade result only when the exchange confirmed the order;
 * every other outcome rejects with ExchangeError so the caller can leave its
 * trade gate untouched.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { ExchangeError, errorMessage } from '../errors.js';
import type {
  ExchangeClient,
  ExecutionEvents,
  TradeExecutorConfig,
  TradeResult,
  TradeSide,
} from './types.js';
import { PositionSizer } from './PositionSizer.js';
import { OrderValidator } from './OrderValidator.js';
import { withTimeout } from '../utils/timeout.js';

export class TradeExecutor extends EventEmitter<ExecutionEvents> {
  private readonly config: TradeExecutorConfig;
  private readonly client: ExchangeClient;
  private readonly sizer: PositionSizer;
  private readonly validator: OrderValidator;

  constructor(config: TradeExecutorConfig, client: ExchangeClient) {
    super();
    this.config = config;
    this.client = client;
    this.sizer = new PositionSizer(config.notional, config.quantityPrecision);
    this.validator = new OrderValidator();

    logger.info('Trade Executor initialized', {
      symbol: config.symbol,
      notional: config.notional,
      quantityPrecision: config.quantityPrecision,
    });
  }

  /**
   * Verify the exchange accepts our credentials
   */
  async initialize(): Promise<boolean> {
    return this.client.verifyConnection();
  }

  /**
   * Size, check and place a market order at the given reference price
   */
  async execute(side: TradeSide, price: number): Promise<TradeResult> {
    const executionId = `${this.config.symbol}-${side}-${Date.now()}`;
    logger.info('Processing trade', { executionId, side, price });

    try {
      // Step 1: Size the order
      const positionSize = this.sizer.calculatePositionSize(price);

      // Step 2: Read the balance being spent
      const asset = side === 'BUY' ? this.config.quoteAsset : this.config.baseAsset;
      const balance = await this.executeWithRetry(() =>
        withTimeout(this.client.getBalance(asset), this.config.callTimeoutMs, `getBalance(${asset})`)
      );

      // Step 3: Validate
      const validation = this.validator.validate(side, positionSize, balance);
      if (!validation.valid) {
        logger.warn('Order validation failed', {
          executionId,
          errors: validation.errors,
        });
        throw new ExchangeError(validation.errors.join(', '), false);
      }

      // Step 4: Place the order, never resubmitted
      const confirmation = await withTimeout(
        this.client.placeMarketOrder(this.config.symbol, side, positionSize.quantity),
        this.config.callTimeoutMs,
        'placeMarketOrder'
      );

      const result: TradeResult = {
        side,
        quantity: positionSize.quantity,
        notionalValue: positionSize.notionalValue,
        confirmation,
      };

      logger.info('Trade completed', {
        executionId,
        orderId: confirmation.orderId,
        quantity: positionSize.quantity,
        avgPrice: confirmation.avgPrice,
      });

      this.emit('orderExecuted', result);
      return result;
    } catch (error) {
      const normalizedError =
        error instanceof ExchangeError
          ? error
          : new ExchangeError(errorMessage(error), false, { cause: error });

      logger.error('Trade failed', {
        executionId,
        error: normalizedError.message,
      });
      this.emit('orderFailed', side, normalizedError.message);
      throw normalizedError;
    }
  }

  /**
   * Execute operation with retry logic
   */
  private async executeWithRetry<T>(
    operation: () => Promise<T>,
    attempts: number = this.config.retryAttempts
  ): Promise<T> {
    let lastError: unknown = null;

    for (let i = 1; i <= attempts; i++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        logger.warn(`Operation failed, attempt ${i}/${attempts}`, {
          error: errorMessage(error),
        });

        // Timeouts and transport errors are retried, refusals are not
        const retryable = !(error instanceof ExchangeError) || error.retryable;
        if (!retryable) {
          break;
        }
        if (i < attempts) {
          await this.sleep(this.config.retryDelayMs * i);
        }
      }
    }

    throw lastError;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

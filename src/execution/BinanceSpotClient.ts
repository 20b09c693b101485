/**
 * Binance Spot Client
 *
 * ExchangeClient over the Binance spot REST API.
 * Handles authentication and error normalization.
 */

import { MainClient } from 'binance';
import { logger, maskSecret } from '../logger.js';
import { ExchangeError } from '../errors.js';
import type {
  BinanceClientConfig,
  ExchangeClient,
  OrderConfirmation,
  TradeSide,
} from './types.js';
import {
  isRetryableBinanceError,
  normalizeBinanceError,
} from './binanceErrors.js';

const SPOT_TESTNET_URL = 'https://testnet.binance.vision';

interface SpotBalance {
  asset: string;
  free: number;
}

interface SpotFill {
  price: number;
  qty: number;
}

/**
 * The part of the Binance REST client the spot client calls
 */
export interface SpotRestApi {
  getAccountInformation(): Promise<unknown>;
  submitNewOrder(params: {
    symbol: string;
    side: TradeSide;
    type: 'MARKET';
    quantity: number;
    newOrderRespType: 'FULL';
  }): Promise<unknown>;
}

function toNumber(value: unknown): number {
  return parseFloat(String(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

export class BinanceSpotClient implements ExchangeClient {
  private client: SpotRestApi;

  constructor(config: BinanceClientConfig, client?: SpotRestApi) {
    this.client =
      client ??
      new MainClient({
        api_key: config.apiKey,
        api_secret: config.apiSecret,
        baseUrl: config.testnet ? SPOT_TESTNET_URL : undefined,
      });

    logger.info('Binance Spot Client initialized', {
      testnet: config.testnet,
      apiKey: maskSecret(config.apiKey),
    });
  }

  /**
   * Verify API connection and permissions
   */
  async verifyConnection(): Promise<boolean> {
    try {
      await this.client.getAccountInformation();
      logger.info('Binance API connection verified');
      return true;
    } catch (error) {
      logger.error('Binance API connection failed', {
        error: normalizeBinanceError(error),
      });
      return false;
    }
  }

  /**
   * Get free balance for asset
   */
  async getBalance(asset: string): Promise<number> {
    try {
      const account = await this.client.getAccountInformation();
      return freeBalance(account, asset);
    } catch (error) {
      const wrapped = toExchangeError(error, `Failed to get ${asset} balance`);
      logger.error('Failed to get balance', { asset, error: wrapped.message });
      throw wrapped;
    }
  }

  /**
   * Submit market order
   */
  async placeMarketOrder(
    symbol: string,
    side: TradeSide,
    quantity: number
  ): Promise<OrderConfirmation> {
    logger.info('Submitting market order', { symbol, side, quantity });

    try {
      const response = await this.client.submitNewOrder({
        symbol,
        side,
        type: 'MARKET',
        quantity,
        newOrderRespType: 'FULL',
      });

      const confirmation = parseOrderResponse(response, symbol, side, quantity);

      logger.info('Market order executed', {
        orderId: confirmation.orderId,
        executedQty: confirmation.executedQty,
        avgPrice: confirmation.avgPrice,
      });

      return confirmation;
    } catch (error) {
      const wrapped = toExchangeError(error, `Market ${side} order failed`);
      logger.error('Market order failed', { symbol, side, quantity, error: wrapped.message });
      throw wrapped;
    }
  }
}

/**
 * Wrap a REST failure; errors already classified pass through unchanged
 */
export function toExchangeError(error: unknown, context: string): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }
  return new ExchangeError(`${context}: ${normalizeBinanceError(error)}`, isRetryableBinanceError(error), {
    cause: error,
  });
}

export function parseBalances(account: unknown): SpotBalance[] {
  if (!isRecord(account) || !Array.isArray(account.balances)) {
    throw new ExchangeError('Unexpected account information response', false);
  }

  return account.balances.filter(isRecord).map((balance) => ({
    asset: String(balance.asset),
    free: toNumber(balance.free),
  }));
}

/**
 * Free amount of one asset; assets never held are absent from the listing
 */
export function freeBalance(account: unknown, asset: string): number {
  const balance = parseBalances(account).find((b) => b.asset === asset);
  return balance ? balance.free : 0;
}

export function parseOrderResponse(
  response: unknown,
  symbol: string,
  side: TradeSide,
  requestedQuantity: number,
  now: () => number = Date.now
): OrderConfirmation {
  if (!isRecord(response) || response.orderId === undefined) {
    throw new ExchangeError('Unexpected order response', false);
  }

  const executedQty =
    response.executedQty !== undefined ? toNumber(response.executedQty) : requestedQuantity;

  return {
    orderId: String(response.orderId),
    symbol,
    side,
    executedQty,
    avgPrice: averageFillPrice(response.fills),
    timestamp: typeof response.transactTime === 'number' ? response.transactTime : now(),
  };
}

/**
 * Quantity-weighted average of the reported fills
 */
export function averageFillPrice(fills: unknown): number | null {
  if (!Array.isArray(fills)) {
    return null;
  }

  const parsed: SpotFill[] = fills
    .filter(isRecord)
    .map((fill) => ({ price: toNumber(fill.price), qty: toNumber(fill.qty) }));

  const totalQty = parsed.reduce((sum, fill) => sum + fill.qty, 0);
  if (!(totalQty > 0)) {
    return null;
  }

  return parsed.reduce((sum, fill) => sum + fill.price * fill.qty, 0) / totalQty;
}

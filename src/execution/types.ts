/**
 * Types for Trade Execution
 */

import type { TradeSide } from '../types.js';

// ===========================================
// Collaborator Types
// ===========================================

/**
 * Confirmation returned once the exchange accepted a market order
 */
export interface OrderConfirmation {
  orderId: string;
  symbol: string;
  side: TradeSide;
  /** Quantity filled; equals the requested quantity when the exchange only acknowledges */
  executedQty: number;
  /** Average fill price, null when the exchange did not report fills */
  avgPrice: number | null;
  timestamp: number;
}

/**
 * Spot exchange operations the watcher needs.
 * Implementations reject with ExchangeError.
 */
export interface ExchangeClient {
  verifyConnection(): Promise<boolean>;
  /** Free (available) balance for an asset */
  getBalance(asset: string): Promise<number>;
  placeMarketOrder(symbol: string, side: TradeSide, quantity: number): Promise<OrderConfirmation>;
}

// ===========================================
// Configuration Types
// ===========================================

/**
 * Binance API client configuration
 */
export interface BinanceClientConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
}

export interface TradeExecutorConfig {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
  /** Order size in quote asset */
  notional: number;
  /** Decimal places the quantity is truncated to */
  quantityPrecision: number;
  /** Attempts for balance reads; orders are never resubmitted */
  retryAttempts: number;
  retryDelayMs: number;
  /** Upper bound for each exchange call */
  callTimeoutMs: number;
}

// ===========================================
// Sizing & Validation Types
// ===========================================

/**
 * Position size calculation result
 */
export interface PositionSizeResult {
  quantity: number;
  notionalValue: number;
  valid: boolean;
  reason?: string;
}

/**
 * Order validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Outcome of one executed trade
 */
export interface TradeResult {
  side: TradeSide;
  quantity: number;
  notionalValue: number;
  confirmation: OrderConfirmation;
}

// ===========================================
// Event Types
// ===========================================

export type ExecutionEvents = {
  orderExecuted: [result: TradeResult];
  orderFailed: [side: TradeSide, reason: string];
};

export type { TradeSide };

/**
 * Types for Market Data
 */

import type { Sample } from '../types.js';

/**
 * Source of price samples. Implementations reject with DataFetchError.
 */
export interface MarketDataSource {
  /** Current price, percent changes and the current interval's OHLC */
  fetchSample(): Promise<Sample>;
  /** Past closed intervals, oldest first, for warming up the history */
  fetchHistory(limit: number): Promise<Sample[]>;
}

export interface BinanceMarketDataConfig {
  symbol: string;
  testnet: boolean;
}

/**
 * Parsed kline
 */
export interface ParsedKline {
  openTime: number;
  closeTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
}

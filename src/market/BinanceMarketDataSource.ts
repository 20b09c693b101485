/**
 * Binance Market Data Source
 *
 * Polls hourly klines from the public spot API. The last kline is the
 * interval in progress: its close is the current price and its OHLC the
 * sample's bar. Percent changes are measured against the closes 1, 24 and
 * 168 bars back.
 */

import { MainClient } from 'binance';
import { logger } from '../logger.js';
import { DataFetchError } from '../errors.js';
import {
  isStructuralBinanceError,
  normalizeBinanceError,
} from '../execution/binanceErrors.js';
import type { Sample } from '../types.js';
import type { BinanceMarketDataConfig, MarketDataSource, ParsedKline } from './types.js';

const SPOT_TESTNET_URL = 'https://testnet.binance.vision';

const BARS_1H = 1;
const BARS_24H = 24;
const BARS_7D = 168;

/** Binance caps a single klines request at 1000 bars */
const MAX_KLINES = 1000;

/**
 * Percent change of the close at `index` against the close `barsBack` earlier,
 * falling back to the oldest close when the series is shorter
 */
export function percentChange(closes: number[], index: number, barsBack: number): number {
  const current = closes[index];
  const reference = closes[Math.max(0, index - barsBack)];
  if (current === undefined || reference === undefined || reference === 0) {
    return 0;
  }
  return ((current - reference) / reference) * 100;
}

/**
 * Parse one raw kline tuple:
 * [openTime, open, high, low, close, volume, closeTime, ...]
 */
export function parseKline(raw: unknown): ParsedKline {
  if (!Array.isArray(raw) || raw.length < 7) {
    throw new DataFetchError('Malformed kline in response', false);
  }

  const kline: ParsedKline = {
    openTime: Number(raw[0]),
    open: parseFloat(String(raw[1])),
    high: parseFloat(String(raw[2])),
    low: parseFloat(String(raw[3])),
    close: parseFloat(String(raw[4])),
    closeTime: Number(raw[6]),
  };

  if ([kline.open, kline.high, kline.low, kline.close].some((value) => !Number.isFinite(value))) {
    throw new DataFetchError('Non-numeric price in kline', false);
  }

  return kline;
}

/**
 * Build a sample for the kline at `index` of the series
 */
export function klineToSample(klines: ParsedKline[], index: number, timestamp: number): Sample {
  const kline = klines[index];
  if (!kline) {
    throw new DataFetchError(`No kline at index ${index}`, false);
  }

  const closes = klines.map((k) => k.close);

  return {
    timestamp,
    price: kline.close,
    change1h: percentChange(closes, index, BARS_1H),
    change24h: percentChange(closes, index, BARS_24H),
    change7d: percentChange(closes, index, BARS_7D),
    ohlc: {
      open: kline.open,
      high: kline.high,
      low: kline.low,
      close: kline.close,
    },
  };
}

export class BinanceMarketDataSource implements MarketDataSource {
  private readonly client: MainClient;
  private readonly symbol: string;

  constructor(config: BinanceMarketDataConfig) {
    this.symbol = config.symbol;
    this.client = new MainClient({
      baseUrl: config.testnet ? SPOT_TESTNET_URL : undefined,
    });

    logger.info('Binance Market Data Source initialized', {
      symbol: config.symbol,
      testnet: config.testnet,
    });
  }

  async fetchSample(): Promise<Sample> {
    const klines = await this.fetchKlines(BARS_7D + 1);
    return klineToSample(klines, klines.length - 1, Date.now());
  }

  async fetchHistory(limit: number): Promise<Sample[]> {
    // One extra bar: the last kline is still open and belongs to the next sample
    const klines = await this.fetchKlines(Math.min(limit + 1, MAX_KLINES));
    const samples: Sample[] = [];

    for (let i = 0; i < klines.length - 1; i++) {
      const kline = klines[i];
      if (kline) {
        samples.push(klineToSample(klines, i, kline.closeTime));
      }
    }

    logger.info('Fetched kline history', { symbol: this.symbol, samples: samples.length });
    return samples;
  }

  private async fetchKlines(limit: number): Promise<ParsedKline[]> {
    let response: unknown;

    try {
      response = await this.client.getKlines({
        symbol: this.symbol,
        interval: '1h',
        limit,
      });
    } catch (error) {
      const message = normalizeBinanceError(error);
      const transient = !isStructuralBinanceError(error);
      logger.warn('Failed to fetch klines', { symbol: this.symbol, error: message, transient });
      throw new DataFetchError(`Kline request failed: ${message}`, transient, { cause: error });
    }

    if (!Array.isArray(response) || response.length === 0) {
      throw new DataFetchError(`Empty kline response for ${this.symbol}`, false);
    }

    return response.map(parseKline);
  }
}

export {
  BinanceMarketDataSource,
  klineToSample,
  parseKline,
  percentChange,
} from './BinanceMarketDataSource.js';
export type { BinanceMarketDataConfig, MarketDataSource, ParsedKline } from './types.js';

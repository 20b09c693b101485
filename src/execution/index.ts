/**
 * Execution Module
 *
 * Places spot market orders for BUY/SELL signals.
 */

// Types
export type {
  BinanceClientConfig,
  ExchangeClient,
  ExecutionEvents,
  OrderConfirmation,
  PositionSizeResult,
  TradeExecutorConfig,
  TradeResult,
  ValidationResult,
} from './types.js';

// Classes
export { BinanceSpotClient } from './BinanceSpotClient.js';
export { PositionSizer, truncateToPrecision } from './PositionSizer.js';
export { OrderValidator } from './OrderValidator.js';
export { TradeExecutor } from './TradeExecutor.js';
export {
  isRetryableBinanceError,
  isStructuralBinanceError,
  normalizeBinanceError,
} from './binanceErrors.js';

export { evaluateAction, generateSignal } from './SignalGenerator.js';
export type { ActionEvaluation } from './SignalGenerator.js';
export {
  calculateAtr,
  calculateBollingerBands,
  calculateMacd,
  calculateRsi,
  computeIndicatorSnapshot,
  indicatorLookback,
  isAtLowerBand,
  isAtUpperBand,
  isSqueezeActive,
} from './indicators.js';
export { analyzeTrend, classifyMarket, detectBreakout } from './classification.js';
export { predictMomentum, projectPrices } from './forecast.js';
export type {
  IndicatorSettings,
  SignalThresholds,
  MomentumDirection,
  PriceProjection,
} from './types.js';

/**
 * Types for the indicator engine and signal generator
 */

/**
 * Lookback periods for every indicator family
 */
export interface IndicatorSettings {
  rsiPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  bollingerPeriod: number;
  /** Standard deviation multiplier (k) */
  bollingerStdDev: number;
  atrPeriod: number;
}

/**
 * Thresholds used to turn indicators into an action and classification
 */
export interface SignalThresholds {
  rsiOversold: number;
  rsiOverbought: number;
  /** How close to a band counts as touching it (0.01 = within 1%) */
  bandTolerance: number;
  /** Bandwidth below this is treated as a squeeze */
  bandwidthThreshold: number;
  /** Max absolute 24h change (%) for a ranging market */
  rangingMaxChange: number;
  /** Min absolute 1h change (%) for a band break to count as a breakout */
  breakoutMinChange: number;
  /** 24h drop (%) that qualifies as a DCA opportunity */
  dcaDipPercent: number;
}

export type MomentumDirection = 'up' | 'down' | 'flat';

export interface PriceProjection {
  oneDay: number;
  sevenDay: number;
  thirtyDay: number;
}

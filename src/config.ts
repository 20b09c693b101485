import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError, errorMessage } from './errors.js';
import type { IndicatorSettings, SignalThresholds } from './strategy/types.js';

type Env = Record<string, string | undefined>;

/** winston's npm levels, most to least severe */
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function getEnvLogLevel(env: Env, key: string, defaultValue: LogLevel): LogLevel {
  const value = (env[key] ?? '').trim().toLowerCase();
  if (value === '') {
    return defaultValue;
  }
  if (!isLogLevel(value)) {
    throw new ConfigurationError(key, `${key} must be one of ${LOG_LEVELS.join(', ')} (got ${value})`);
  }
  return value;
}

/**
 * Load variables from a local .env file into process.env.
 * Called once by the entry point, never by library code.
 */
export function loadEnvFile(): void {
  dotenvConfig();
}

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] ?? defaultValue;
  if (value === undefined || value === '') {
    throw new ConfigurationError(key, `Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvVar(env: Env, key: string): string {
  return env[key] ?? '';
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new ConfigurationError(key, `Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

export interface AppConfig {
  pair: {
    baseAsset: string;
    quoteAsset: string;
    /** Exchange symbol, e.g. SUIUSDT */
    symbol: string;
  };
  loop: {
    pollIntervalMs: number;
    /** Upper bound for every external call inside a tick */
    callTimeoutMs: number;
    /** Seed the history buffer from past klines before the first tick */
    backfillHistory: boolean;
    historyMargin: number;
  };
  alerts: {
    thresholdPercent: number;
  };
  summary: {
    intervalMs: number;
    onStartup: boolean;
    timeZone: string;
  };
  indicators: IndicatorSettings;
  signal: SignalThresholds;
  trading: {
    /** Kill switch, the CLI flag overrides it */
    enabled: boolean;
    /** Order size in quote asset */
    notional: number;
    /** Decimal places the order quantity is truncated to */
    quantityPrecision: number;
  };
  binance: {
    apiKey: string;
    apiSecret: string;
    testnet: boolean;
  };
  telegram: {
    botToken: string;
    chatId: string;
    retryAttempts: number;
    retryDelayMs: number;
    requestTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
  };
}

export interface ConfigOverrides {
  tradingEnabled?: boolean;
}

export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type Config = DeepReadonly<AppConfig>;

/**
 * Build and validate the immutable process configuration.
 * Throws ConfigurationError on the first invalid or missing setting.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): Config {
  const baseAsset = getEnvVar(env, 'BASE_ASSET', 'SUI').toUpperCase();
  const quoteAsset = getEnvVar(env, 'QUOTE_ASSET', 'USDT').toUpperCase();
  const tradingEnabled = overrides.tradingEnabled ?? getEnvBoolean(env, 'TRADING_ENABLED', false);

  const config: AppConfig = {
    pair: {
      baseAsset,
      quoteAsset,
      symbol: `${baseAsset}${quoteAsset}`,
    },
    loop: {
      pollIntervalMs: getEnvNumber(env, 'POLL_INTERVAL_SECONDS', 3600) * 1000,
      callTimeoutMs: getEnvNumber(env, 'CALL_TIMEOUT_MS', 15000),
      backfillHistory: getEnvBoolean(env, 'HISTORY_BACKFILL', true),
      historyMargin: getEnvNumber(env, 'HISTORY_MARGIN', 5),
    },
    alerts: {
      thresholdPercent: getEnvNumber(env, 'ALERT_THRESHOLD_PERCENT', 5),
    },
    summary: {
      intervalMs: getEnvNumber(env, 'SUMMARY_INTERVAL_HOURS', 24) * 60 * 60 * 1000,
      onStartup: getEnvBoolean(env, 'SUMMARY_ON_STARTUP', true),
      timeZone: getEnvVar(env, 'TIMEZONE', 'UTC'),
    },
    indicators: {
      rsiPeriod: getEnvNumber(env, 'RSI_PERIOD', 14),
      macdFast: getEnvNumber(env, 'MACD_FAST', 12),
      macdSlow: getEnvNumber(env, 'MACD_SLOW', 26),
      macdSignal: getEnvNumber(env, 'MACD_SIGNAL', 9),
      bollingerPeriod: getEnvNumber(env, 'BB_PERIOD', 20),
      bollingerStdDev: getEnvNumber(env, 'BB_STD_DEV', 2),
      atrPeriod: getEnvNumber(env, 'ATR_PERIOD', 14),
    },
    signal: {
      rsiOversold: getEnvNumber(env, 'RSI_OVERSOLD', 30),
      rsiOverbought: getEnvNumber(env, 'RSI_OVERBOUGHT', 70),
      bandTolerance: getEnvNumber(env, 'BB_TOLERANCE', 0.01),
      bandwidthThreshold: getEnvNumber(env, 'BANDWIDTH_THRESHOLD', 0.04),
      rangingMaxChange: getEnvNumber(env, 'RANGING_MAX_CHANGE', 2),
      breakoutMinChange: getEnvNumber(env, 'BREAKOUT_MIN_CHANGE', 1),
      dcaDipPercent: getEnvNumber(env, 'DCA_DIP_PERCENT', 5),
    },
    trading: {
      enabled: tradingEnabled,
      notional: getEnvNumber(env, 'TRADE_NOTIONAL', 10),
      quantityPrecision: getEnvNumber(env, 'QUANTITY_PRECISION', 2),
    },
    binance: {
      // Credentials are only required when orders can be placed
      apiKey: tradingEnabled
        ? getEnvVar(env, 'BINANCE_API_KEY')
        : getOptionalEnvVar(env, 'BINANCE_API_KEY'),
      apiSecret: tradingEnabled
        ? getEnvVar(env, 'BINANCE_API_SECRET')
        : getOptionalEnvVar(env, 'BINANCE_API_SECRET'),
      testnet: getEnvBoolean(env, 'BINANCE_TESTNET', true),
    },
    telegram: {
      botToken: getEnvVar(env, 'TELEGRAM_BOT_TOKEN'),
      chatId: getEnvVar(env, 'TELEGRAM_CHAT_ID'),
      retryAttempts: getEnvNumber(env, 'NOTIFY_RETRY_ATTEMPTS', 3),
      retryDelayMs: getEnvNumber(env, 'NOTIFY_RETRY_DELAY_MS', 1000),
      requestTimeoutMs: getEnvNumber(env, 'NOTIFY_TIMEOUT_MS', 5000),
    },
    logging: {
      level: getEnvLogLevel(env, 'LOG_LEVEL', 'info'),
    },
  };

  validateConfig(config);
  deepFreeze(config);
  return config;
}

function requirePositive(key: string, value: number): void {
  if (!(value > 0)) {
    throw new ConfigurationError(key, `${key} must be greater than 0 (got ${value})`);
  }
}

function requirePositiveInteger(key: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(key, `${key} must be a positive integer (got ${value})`);
  }
}

// Summaries and error notices format timestamps in this zone
function requireTimeZone(key: string, timeZone: string): void {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
  } catch (error) {
    throw new ConfigurationError(key, `Unknown time zone: ${timeZone} (${errorMessage(error)})`);
  }
}

function validateConfig(config: AppConfig): void {
  requirePositive('POLL_INTERVAL_SECONDS', config.loop.pollIntervalMs);
  requirePositive('CALL_TIMEOUT_MS', config.loop.callTimeoutMs);
  if (!Number.isInteger(config.loop.historyMargin) || config.loop.historyMargin < 0) {
    throw new ConfigurationError('HISTORY_MARGIN', 'HISTORY_MARGIN must be a non-negative integer');
  }
  requirePositive('ALERT_THRESHOLD_PERCENT', config.alerts.thresholdPercent);
  requirePositive('SUMMARY_INTERVAL_HOURS', config.summary.intervalMs);
  requireTimeZone('TIMEZONE', config.summary.timeZone);

  const { indicators, signal, trading, telegram } = config;
  requirePositiveInteger('RSI_PERIOD', indicators.rsiPeriod);
  requirePositiveInteger('MACD_FAST', indicators.macdFast);
  requirePositiveInteger('MACD_SLOW', indicators.macdSlow);
  requirePositiveInteger('MACD_SIGNAL', indicators.macdSignal);
  requirePositiveInteger('BB_PERIOD', indicators.bollingerPeriod);
  requirePositiveInteger('ATR_PERIOD', indicators.atrPeriod);
  requirePositive('BB_STD_DEV', indicators.bollingerStdDev);
  if (indicators.macdFast >= indicators.macdSlow) {
    throw new ConfigurationError('MACD_FAST', 'MACD_FAST must be smaller than MACD_SLOW');
  }

  if (signal.rsiOversold <= 0 || signal.rsiOverbought >= 100) {
    throw new ConfigurationError('RSI_OVERSOLD', 'RSI thresholds must lie strictly between 0 and 100');
  }
  if (signal.rsiOversold >= signal.rsiOverbought) {
    throw new ConfigurationError('RSI_OVERSOLD', 'RSI_OVERSOLD must be smaller than RSI_OVERBOUGHT');
  }
  if (signal.bandTolerance < 0 || signal.bandTolerance >= 1) {
    throw new ConfigurationError('BB_TOLERANCE', 'BB_TOLERANCE must be in [0, 1)');
  }

  requirePositive('TRADE_NOTIONAL', trading.notional);
  if (!Number.isInteger(trading.quantityPrecision) || trading.quantityPrecision < 0 || trading.quantityPrecision > 12) {
    throw new ConfigurationError('QUANTITY_PRECISION', 'QUANTITY_PRECISION must be an integer between 0 and 12');
  }

  requirePositiveInteger('NOTIFY_RETRY_ATTEMPTS', telegram.retryAttempts);
  requirePositive('NOTIFY_TIMEOUT_MS', telegram.requestTimeoutMs);
}

function deepFreeze(value: object): void {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
}

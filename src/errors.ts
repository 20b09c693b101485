/**
 * Error taxonomy
 *
 * Every failure crossing a collaborator boundary is normalized into one of
 * these classes so the orchestrator can decide per tick whether to skip,
 * retry later, or abort startup.
 */

export type WatcherErrorCode =
  | 'DATA_FETCH_FAILED'
  | 'EXCHANGE_FAILED'
  | 'NOTIFICATION_FAILED'
  | 'CONFIGURATION_INVALID'
  | 'TIMEOUT';

export interface WatcherErrorOptions {
  cause?: unknown;
}

export class WatcherError extends Error {
  readonly code: WatcherErrorCode;
  override readonly cause?: unknown;

  constructor(code: WatcherErrorCode, message: string, options: WatcherErrorOptions = {}) {
    super(message);
    this.name = 'WatcherError';
    this.code = code;
    this.cause = options.cause;
  }
}

/**
 * Market-data call failed. `transient` separates network hiccups and rate
 * limits from structural problems such as an unknown symbol or bad credentials.
 */
export class DataFetchError extends WatcherError {
  readonly transient: boolean;

  constructor(message: string, transient: boolean, options: WatcherErrorOptions = {}) {
    super('DATA_FETCH_FAILED', message, options);
    this.name = 'DataFetchError';
    this.transient = transient;
  }
}

/**
 * Balance or order call failed, or the order was refused before submission
 */
export class ExchangeError extends WatcherError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options: WatcherErrorOptions = {}) {
    super('EXCHANGE_FAILED', message, options);
    this.name = 'ExchangeError';
    this.retryable = retryable;
  }
}

export class NotificationError extends WatcherError {
  constructor(message: string, options: WatcherErrorOptions = {}) {
    super('NOTIFICATION_FAILED', message, options);
    this.name = 'NotificationError';
  }
}

/**
 * Missing or invalid setting. Only ever thrown before the loop starts.
 */
export class ConfigurationError extends WatcherError {
  readonly key: string;

  constructor(key: string, message: string) {
    super('CONFIGURATION_INVALID', message);
    this.name = 'ConfigurationError';
    this.key = key;
  }
}

export class TimeoutError extends WatcherError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Normalize anything thrown into a readable message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

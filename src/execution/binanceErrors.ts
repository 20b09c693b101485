/**
 * Binance error normalization shared by the order client and the market-data source
 */

const RETRYABLE_CODES = [
  -1001, // DISCONNECTED
  -1003, // TOO_MANY_REQUESTS
  -1007, // TIMEOUT
  -1015, // TOO_MANY_ORDERS
];

const STRUCTURAL_CODES = [
  -1021, // INVALID_TIMESTAMP
  -1022, // INVALID_SIGNATURE
  -1121, // BAD_SYMBOL
  -2014, // BAD_API_KEY_FMT
  -2015, // REJECTED_MBX_KEY
];

function errorCode(error: unknown): number | null {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

/**
 * Normalize various error types to string message
 */
export function normalizeBinanceError(error: unknown): string {
  if (error && typeof error === 'object') {
    const code = errorCode(error);
    // Binance API error
    if (code !== null) {
      const detail =
        'msg' in error
          ? String(error.msg)
          : 'message' in error
            ? String(error.message)
            : 'unknown';
      return `Binance Error ${code}: ${detail}`;
    }
    // Standard Error object
    if (error instanceof Error) {
      return error.message;
    }
  }
  return String(error);
}

/**
 * Check if error is worth retrying (rate limits, disconnects, timeouts)
 */
export function isRetryableBinanceError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== null && RETRYABLE_CODES.includes(code);
}

/**
 * Bad symbol, bad credentials or clock drift: retrying will not help
 */
export function isStructuralBinanceError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === null) {
    return false;
  }
  return STRUCTURAL_CODES.includes(code) || (code <= -1100 && code >= -1199);
}

/**
 * Order Validator
 *
 * Pre-submission checks: a usable quantity and enough free balance on the
 * side being spent (quote asset for BUY, base asset for SELL).
 */

import type { PositionSizeResult, TradeSide, ValidationResult } from './types.js';

export class OrderValidator {
  validate(
    side: TradeSide,
    positionSize: PositionSizeResult,
    availableBalance: number
  ): ValidationResult {
    const errors: string[] = [];

    if (!positionSize.valid) {
      errors.push(`Invalid position size: ${positionSize.reason ?? 'unknown'}`);
    }

    if (positionSize.valid) {
      const required = side === 'BUY' ? positionSize.notionalValue : positionSize.quantity;
      if (availableBalance < required) {
        errors.push(
          `Insufficient balance: ${availableBalance} available, ${required} required`
        );
      }
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }
}

/**
 * Position Sizer
 *
 * Converts the configured notional trade size into an order quantity.
 */

import type { PositionSizeResult } from './types.js';

/**
 * Truncate toward zero at a fixed number of decimals.
 * The intermediate product is rounded at 9 decimals first so that values
 * like 4.35 * 100 = 434.99999999999994 do not lose a unit.
 */
export function truncateToPrecision(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = parseFloat((value * factor).toFixed(9));
  return Math.trunc(scaled) / factor;
}

export class PositionSizer {
  constructor(
    private readonly notional: number,
    private readonly quantityPrecision: number
  ) {}

  /**
   * Calculate order quantity for a trade
   *
   * Formula:
   * 1. rawQuantity = notional / currentPrice
   * 2. quantity = truncate(rawQuantity, quantityPrecision)
   */
  calculatePositionSize(currentPrice: number): PositionSizeResult {
    if (!(currentPrice > 0)) {
      return this.createInvalidResult(`Invalid price ${currentPrice}`);
    }

    const rawQuantity = this.notional / currentPrice;
    const quantity = truncateToPrecision(rawQuantity, this.quantityPrecision);

    if (quantity <= 0) {
      return this.createInvalidResult(
        `Quantity rounds to 0 at ${this.quantityPrecision} decimals (raw ${rawQuantity})`
      );
    }

    return {
      quantity,
      notionalValue: quantity * currentPrice,
      valid: true,
    };
  }

  private createInvalidResult(reason: string): PositionSizeResult {
    return {
      quantity: 0,
      notionalValue: 0,
      valid: false,
      reason,
    };
  }
}

/**
 * Tests for OrderValidator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { OrderValidator } from '../../src/execution/OrderValidator.js';
import type { PositionSizeResult } from '../../src/execution/types.js';

describe('OrderValidator', () => {
  let validator: OrderValidator;

  const validPositionSize: PositionSizeResult = {
    quantity: 6.66,
    notionalValue: 9.99,
    valid: true,
  };

  beforeEach(() => {
    validator = new OrderValidator();
  });

  it('should pass a BUY with enough quote balance', () => {
    expect(validator.validate('BUY', validPositionSize, 100)).toEqual({ valid: true, errors: [] });
  });

  it('should check the notional for BUY', () => {
    const result = validator.validate('BUY', validPositionSize, 5);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Insufficient balance: 5 available, 9.99 required']);
  });

  it('should check the quantity for SELL', () => {
    expect(validator.validate('SELL', validPositionSize, 6.66).valid).toBe(true);
    expect(validator.validate('SELL', validPositionSize, 6).errors).toEqual([
      'Insufficient balance: 6 available, 6.66 required',
    ]);
  });

  it('should reject an invalid position size', () => {
    const result = validator.validate(
      'BUY',
      { quantity: 0, notionalValue: 0, valid: false, reason: 'Invalid price 0' },
      100
    );

    expect(result.errors).toEqual(['Invalid position size: Invalid price 0']);
  });
});

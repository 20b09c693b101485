/**
 * Tests for PositionSizer
 */

import { describe, it, expect } from 'vitest';
import { PositionSizer, truncateToPrecision } from '../../src/execution/PositionSizer.js';

describe('truncateToPrecision', () => {
  it('should truncate toward zero', () => {
    expect(truncateToPrecision(6.6666, 2)).toBe(6.66);
    expect(truncateToPrecision(0.129, 1)).toBe(0.1);
  });

  it('should not lose a unit to floating point error', () => {
    // 4.35 * 100 is 434.99999999999994 in binary floating point
    expect(truncateToPrecision(4.35, 2)).toBe(4.35);
  });

  it('should support zero decimals', () => {
    expect(truncateToPrecision(7.9, 0)).toBe(7);
  });
});

describe('PositionSizer', () => {
  describe('calculatePositionSize', () => {
    it('should size the notional at the current price', () => {
      const sizer = new PositionSizer(10, 2);
      const result = sizer.calculatePositionSize(1.5);

      // 10 / 1.5 = 6.666..., truncated to 6.66
      expect(result.valid).toBe(true);
      expect(result.quantity).toBe(6.66);
      expect(result.notionalValue).toBeCloseTo(9.99, 8);
    });

    it('should reject a non-positive price', () => {
      const sizer = new PositionSizer(10, 2);

      expect(sizer.calculatePositionSize(0).valid).toBe(false);
      expect(sizer.calculatePositionSize(-1).reason).toBe('Invalid price -1');
    });

    it('should reject a quantity that truncates to zero', () => {
      // 10 / 50000 = 0.0002, truncated to 0.00
      const sizer = new PositionSizer(10, 2);
      const result = sizer.calculatePositionSize(50000);

      expect(result.valid).toBe(false);
      expect(result.quantity).toBe(0);
      expect(result.notionalValue).toBe(0);
    });
  });
});

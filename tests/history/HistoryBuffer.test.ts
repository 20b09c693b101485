/**
 * Tests for HistoryBuffer
 */

import { describe, it, expect } from 'vitest';
import { HistoryBuffer } from '../../src/history/HistoryBuffer.js';
import { makeSample } from '../fixtures.js';

describe('HistoryBuffer', () => {
  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new HistoryBuffer(0)).toThrow(RangeError);
    expect(() => new HistoryBuffer(2.5)).toThrow(RangeError);
  });

  it('should reject a capacity below the required lookback', () => {
    expect(() => new HistoryBuffer(20, 35)).toThrow(
      'History capacity 20 is below the required lookback 35'
    );
  });

  it('should keep samples in insertion order', () => {
    const buffer = new HistoryBuffer(5);
    buffer.append(makeSample(1));
    buffer.append(makeSample(2));
    buffer.append(makeSample(3));

    expect(buffer.closes()).toEqual([1, 2, 3]);
    expect(buffer.size).toBe(3);
    expect(buffer.latest()?.price).toBe(3);
  });

  it('should evict the oldest sample once over capacity', () => {
    const buffer = new HistoryBuffer(3);
    buffer.seed([1, 2, 3, 4, 5].map((price) => makeSample(price)));

    expect(buffer.size).toBe(3);
    expect(buffer.closes()).toEqual([3, 4, 5]);
  });

  it('should keep duplicate timestamps', () => {
    const buffer = new HistoryBuffer(3);
    buffer.append(makeSample(1, { timestamp: 1000 }));
    buffer.append(makeSample(2, { timestamp: 1000 }));

    expect(buffer.size).toBe(2);
  });

  it('should return the latest n samples and flag sufficiency', () => {
    const buffer = new HistoryBuffer(10);
    buffer.seed([1, 2, 3, 4].map((price) => makeSample(price)));

    const window = buffer.window(2);
    expect(window.samples.map((s) => s.price)).toEqual([3, 4]);
    expect(window.sufficient).toBe(true);

    const tooLong = buffer.window(6);
    expect(tooLong.samples).toHaveLength(4);
    expect(tooLong.sufficient).toBe(false);
  });

  it('should return an empty window for n = 0', () => {
    const buffer = new HistoryBuffer(3);
    buffer.append(makeSample(1));

    expect(buffer.window(0)).toEqual({ samples: [], sufficient: true });
  });

  it('should store copies that later mutation of the input cannot change', () => {
    const buffer = new HistoryBuffer(3);
    const sample = makeSample(10);
    buffer.append(sample);
    sample.ohlc.close = 99;

    expect(buffer.closes()).toEqual([10]);
  });

  it('should return null for latest when empty and after clear', () => {
    const buffer = new HistoryBuffer(3);
    expect(buffer.latest()).toBeNull();

    buffer.append(makeSample(1));
    buffer.clear();
    expect(buffer.latest()).toBeNull();
    expect(buffer.size).toBe(0);
  });

  it('should expose bars in order', () => {
    const buffer = new HistoryBuffer(3);
    buffer.append(makeSample(1, { ohlc: { open: 1, high: 2, low: 0.5, close: 1.5 } }));

    expect(buffer.bars()).toEqual([{ open: 1, high: 2, low: 0.5, close: 1.5 }]);
  });
});

/**
 * History Buffer
 *
 * Bounded FIFO of samples feeding the indicator engine.
 * Insertion order is chronological order; nothing is reordered or
 * deduplicated, even when the source repeats a timestamp.
 */

import type { OhlcBar, Sample } from '../types.js';

export interface HistoryWindow {
  samples: readonly Sample[];
  /** False when fewer samples exist than were requested */
  sufficient: boolean;
}

export class HistoryBuffer {
  private readonly samples: Sample[] = [];
  public readonly capacity: number;

  /**
   * @param capacity - max samples kept
   * @param minimumCapacity - largest indicator lookback; capacity may not be smaller
   */
  constructor(capacity: number, minimumCapacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer (got ${capacity})`);
    }
    if (capacity < minimumCapacity) {
      throw new RangeError(
        `History capacity ${capacity} is below the required lookback ${minimumCapacity}`
      );
    }
    this.capacity = capacity;
  }

  /**
   * Append the newest sample, evicting the oldest once over capacity
   */
  public append(sample: Sample): void {
    this.samples.push(Object.freeze({ ...sample, ohlc: Object.freeze({ ...sample.ohlc }) }));

    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }
  }

  /**
   * Bulk append in the given order (used for warm-up backfill)
   */
  public seed(samples: readonly Sample[]): void {
    for (const sample of samples) {
      this.append(sample);
    }
  }

  /**
   * Most recent n samples, oldest first
   */
  public window(n: number): HistoryWindow {
    const count = Math.max(0, Math.floor(n));
    return {
      samples: count === 0 ? [] : this.samples.slice(-count),
      sufficient: this.samples.length >= count,
    };
  }

  public closes(): number[] {
    return this.samples.map((sample) => sample.ohlc.close);
  }

  public bars(): OhlcBar[] {
    return this.samples.map((sample) => sample.ohlc);
  }

  public latest(): Sample | null {
    return this.samples[this.samples.length - 1] ?? null;
  }

  public get size(): number {
    return this.samples.length;
  }

  public clear(): void {
    this.samples.length = 0;
  }
}

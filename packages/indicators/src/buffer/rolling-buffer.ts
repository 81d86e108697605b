import { IndicatorError, fail, ok } from '@rollta/shared';
import type { IndicatorResult, Num } from '@rollta/shared';

/**
 * RollingBuffer - fixed capacity FIFO window over numeric samples
 *
 * Keeps a running sum so `sum()` and `mean()` are O(1). Until the buffer
 * reaches capacity, `shift()` grows it without evicting anything.
 * Variance and standard deviation walk the window (O(capacity)).
 *
 * @example
 * ```typescript
 * const buffer = unwrap(RollingBuffer.fromArray(3, [1, 2, 3, 4]));
 * buffer.queue(); // [2, 3, 4]
 * buffer.shift(5); // 2
 * buffer.mean(); // 4
 * ```
 */
export class RollingBuffer {
  private readonly slots: Num[];
  private head = 0;
  private size = 0;
  private runningSum = 0;

  private constructor(private readonly cap: number) {
    this.slots = new Array<Num>(cap).fill(0);
  }

  /**
   * Build a buffer from existing data, keeping at most the last `capacity` values
   *
   * @param capacity - Maximum number of values held, must be > 0
   * @param data - Values ordered oldest to newest, must not be empty
   */
  static fromArray(capacity: number, data: readonly Num[]): IndicatorResult<RollingBuffer> {
    if (!Number.isInteger(capacity) || capacity < 1) {
      return fail(IndicatorError.invalidSize(`buffer capacity must be a positive integer, got ${capacity}`));
    }
    if (data.length === 0) {
      return fail(IndicatorError.invalidData('buffer cannot be built from an empty array'));
    }

    const buffer = new RollingBuffer(capacity);
    const start = Math.max(0, data.length - capacity);
    for (let i = start; i < data.length; i++) {
      buffer.shift(data[i]);
    }
    return ok(buffer);
  }

  /**
   * Maximum number of values the buffer holds
   */
  capacity(): number {
    return this.cap;
  }

  /**
   * Number of values currently held
   */
  length(): number {
    return this.size;
  }

  /**
   * True once the buffer holds `capacity` values
   */
  isReady(): boolean {
    return this.size === this.cap;
  }

  /**
   * Oldest value, the next one to be evicted
   */
  oldest(): Num {
    return this.slots[this.head];
  }

  /**
   * Most recently added value
   */
  newest(): Num {
    return this.slots[(this.head + this.size - 1) % this.cap];
  }

  /**
   * Copy of the held values, oldest first
   */
  queue(): Num[] {
    const out: Num[] = [];
    for (let i = 0; i < this.size; i++) {
      out.push(this.slots[(this.head + i) % this.cap]);
    }
    return out;
  }

  /**
   * Append a value, evicting the oldest one when full
   *
   * @returns The evicted value, or 0 while the buffer is still filling up
   */
  shift(value: Num): Num {
    if (this.size < this.cap) {
      this.slots[(this.head + this.size) % this.cap] = value;
      this.size++;
      this.runningSum += value;
      return 0;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.cap;
    this.runningSum -= evicted;
    this.runningSum += value;
    return evicted;
  }

  sum(): Num {
    return this.runningSum;
  }

  mean(): Num {
    return this.runningSum / this.size;
  }

  /**
   * Variance of the held values
   *
   * A sample variance of a single value divides by zero and yields NaN.
   *
   * @param isSample - Divide by `n - 1` (sample) instead of `n` (population)
   */
  variance(isSample: boolean): Num {
    const mean = this.mean();
    let squares = 0;
    for (let i = 0; i < this.size; i++) {
      const diff = this.slots[(this.head + i) % this.cap] - mean;
      squares += diff * diff;
    }
    return squares / (isSample ? this.size - 1 : this.size);
  }

  stdev(isSample: boolean): Num {
    return Math.sqrt(this.variance(isSample));
  }
}

/**
 * Simple Moving Average (SMA)
 *
 * Average of the last `period` values, updated in O(1) from the
 * buffer's running sum.
 */

import { fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

export class SimpleMovingAverage extends BaseLine<Sample> {
  private constructor(period: number, value: Num, window: RollingBuffer) {
    super(period, value, window);
  }

  /**
   * Create an SMA from historical data
   *
   * Requires `period >= 1` and at least `period` values; only the last
   * `period` values are kept.
   */
  static create(period: number, data: readonly Num[]): IndicatorResult<SimpleMovingAverage> {
    const error =
      checkPeriod('simple moving average', period, 1) ??
      checkData('simple moving average', data.length, period);
    if (error) {
      return fail(error);
    }

    const buffer = RollingBuffer.fromArray(period, data);
    if (!buffer.success) {
      return buffer;
    }

    return ok(new SimpleMovingAverage(period, buffer.data.mean(), buffer.data));
  }

  next(input: Sample): Num {
    this.history.shift(toNum(input));
    this.current = this.history.sum() / this.size;
    return this.current;
  }
}

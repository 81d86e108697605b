/**
 * Exponential Moving Average (EMA)
 *
 * EMA = (x - y) * k + y
 *
 * where:
 * - `x` = current value (most recent)
 * - `y` = last EMA
 * - `k` = 2 / (n + 1)
 * - `n` = period
 */

import { fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

/**
 * Weighs recent values heavier than older ones. Seeded with the SMA of the
 * first `period` values; Stats cover the last `period` EMA outputs.
 */
export class ExponentialMovingAverage extends BaseLine<Sample> {
  private readonly smoothing: Num;

  private constructor(period: number, value: Num, outputs: RollingBuffer) {
    super(period, value, outputs);
    this.smoothing = ExponentialMovingAverage.smoothingFor(period);
  }

  static smoothingFor(period: number): Num {
    return 2 / (period + 1);
  }

  /**
   * Create an EMA from historical data
   *
   * Requires `period >= 1` and at least `period` values.
   */
  static create(period: number, data: readonly Num[]): IndicatorResult<ExponentialMovingAverage> {
    const error =
      checkPeriod('exponential moving average', period, 1) ??
      checkData('exponential moving average', data.length, period);
    if (error) {
      return fail(error);
    }

    const seed = RollingBuffer.fromArray(period, data.slice(0, period));
    if (!seed.success) {
      return seed;
    }

    const outputs = RollingBuffer.fromArray(period, [seed.data.mean()]);
    if (!outputs.success) {
      return outputs;
    }

    const ema = new ExponentialMovingAverage(period, seed.data.mean(), outputs.data);
    for (let i = period; i < data.length; i++) {
      ema.next(data[i]);
    }
    return ok(ema);
  }

  /**
   * Smoothing factor
   */
  k(): Num {
    return this.smoothing;
  }

  next(input: Sample): Num {
    this.current = (toNum(input) - this.current) * this.smoothing + this.current;
    this.history.shift(this.current);
    return this.current;
  }
}

/**
 * Double Exponential Moving Average (DEMA)
 *
 * DEMA = 2 * EMA(n) - EMA(EMA(n))
 */

import { fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';
import { ExponentialMovingAverage } from './exponential-moving-average.js';

export class DoubleExponentialMovingAverage extends BaseLine<Sample> {
  private constructor(
    period: number,
    value: Num,
    outputs: RollingBuffer,
    private readonly emaN: ExponentialMovingAverage,
    private readonly emaEmaN: ExponentialMovingAverage
  ) {
    super(period, value, outputs);
  }

  /**
   * Create a DEMA from historical data
   *
   * Requires `period >= 1` and at least `2 * period - 1` values: `period`
   * to seed EMA(n), then `period - 1` more so EMA(EMA(n)) has `period`
   * inputs of its own.
   */
  static create(
    period: number,
    data: readonly Num[]
  ): IndicatorResult<DoubleExponentialMovingAverage> {
    const error =
      checkPeriod('double exponential moving average', period, 1) ??
      checkData('double exponential moving average', data.length, period * 2 - 1);
    if (error) {
      return fail(error);
    }

    const emaN = ExponentialMovingAverage.create(period, data.slice(0, period));
    if (!emaN.success) {
      return emaN;
    }

    // EMA(n) outputs that seed the outer EMA
    const seeds: Num[] = [emaN.data.value()];
    for (let i = period; i < period * 2 - 1; i++) {
      seeds.push(emaN.data.next(data[i]));
    }

    const emaEmaN = ExponentialMovingAverage.create(period, seeds);
    if (!emaEmaN.success) {
      return emaEmaN;
    }

    const value = 2 * emaN.data.value() - emaEmaN.data.value();
    const outputs = RollingBuffer.fromArray(period, [value]);
    if (!outputs.success) {
      return outputs;
    }

    const dema = new DoubleExponentialMovingAverage(
      period,
      value,
      outputs.data,
      emaN.data,
      emaEmaN.data
    );
    for (let i = period * 2 - 1; i < data.length; i++) {
      dema.next(data[i]);
    }
    return ok(dema);
  }

  next(input: Sample): Num {
    const ema = this.emaN.next(toNum(input));
    this.current = 2 * ema - this.emaEmaN.next(ema);
    this.history.shift(this.current);
    return this.current;
  }
}

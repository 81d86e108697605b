/**
 * Rate of Change (ROC)
 *
 * ROC = (x - y) / y * 100
 *
 * where `y` is the value `period` samples before `x`.
 */

import { fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

export class RateOfChange extends BaseLine<Sample> {
  private constructor(
    period: number,
    value: Num,
    outputs: RollingBuffer,
    private readonly past: RollingBuffer
  ) {
    super(period, value, outputs);
  }

  /**
   * Create a ROC from historical data
   *
   * Requires `period >= 2` and at least `period + 1` values.
   */
  static create(period: number, data: readonly Num[]): IndicatorResult<RateOfChange> {
    const error =
      checkPeriod('rate of change', period, 2) ??
      checkData('rate of change', data.length, period + 1);
    if (error) {
      return fail(error);
    }

    const past = RollingBuffer.fromArray(period, data.slice(0, period));
    if (!past.success) {
      return past;
    }

    const first = RateOfChange.percent(data[period], past.data.oldest());
    past.data.shift(data[period]);

    const outputs = RollingBuffer.fromArray(period, [first]);
    if (!outputs.success) {
      return outputs;
    }

    const roc = new RateOfChange(period, first, outputs.data, past.data);
    for (let i = period + 1; i < data.length; i++) {
      roc.next(data[i]);
    }
    return ok(roc);
  }

  private static percent(value: Num, base: Num): Num {
    return ((value - base) / base) * 100;
  }

  next(input: Sample): Num {
    const x = toNum(input);
    this.current = RateOfChange.percent(x, this.past.oldest());
    this.past.shift(x);
    this.history.shift(this.current);
    return this.current;
  }
}

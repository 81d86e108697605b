/**
 * Average True Range (ATR)
 *
 * ATR = (ATR_prev * (n - 1) + TR) / n
 *
 * Seeded with the plain mean of the first `n` true ranges.
 */

import { fail, ok } from '@rollta/shared';
import type { HighLowClose, IndicatorResult, Num } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';
import { TrueRange, type RangeInput } from './true-range.js';

export class AverageTrueRange extends BaseLine<RangeInput> {
  private constructor(
    period: number,
    value: Num,
    outputs: RollingBuffer,
    private readonly trueRange: TrueRange
  ) {
    super(period, value, outputs);
  }

  /**
   * Create an ATR from historical samples
   *
   * Requires `period >= 1` and at least `period + 1` samples.
   */
  static create(period: number, data: readonly HighLowClose[]): IndicatorResult<AverageTrueRange> {
    const error =
      checkPeriod('average true range', period, 1) ??
      checkData('average true range', data.length, period + 1);
    if (error) {
      return fail(error);
    }

    const tr = TrueRange.create(period, data.slice(0, period + 1));
    if (!tr.success) {
      return tr;
    }

    const seed = tr.data.mean();
    const outputs = RollingBuffer.fromArray(period, [seed]);
    if (!outputs.success) {
      return outputs;
    }

    const atr = new AverageTrueRange(period, seed, outputs.data, tr.data);
    for (let i = period + 1; i < data.length; i++) {
      atr.next(data[i]);
    }
    return ok(atr);
  }

  /**
   * True range of the most recent sample
   */
  lastTrueRange(): Num {
    return this.trueRange.value();
  }

  next(input: RangeInput): Num {
    const tr = this.trueRange.next(input);
    this.current = (this.current * (this.size - 1) + tr) / this.size;
    this.history.shift(this.current);
    return this.current;
  }
}

/**
 * True Range (TR)
 *
 * TR = max(|H - L|, |H - C_prev|, |L - C_prev|)
 *
 * where `C_prev` is the close of the previous sample.
 */

import { fail, ok } from '@rollta/shared';
import type { HighLowClose, IndicatorResult, Num } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

/**
 * A candle-like value or a `[high, low, close]` tuple
 */
export type RangeInput = HighLowClose | readonly [high: Num, low: Num, close: Num];

export function toHighLowClose(input: RangeInput): HighLowClose {
  if ('close' in input) {
    return input;
  }
  const [high, low, close] = input;
  return { high, low, close };
}

/**
 * True range of one sample against the previous close
 */
export function trueRange(sample: HighLowClose, prevClose: Num): Num {
  const hl = Math.abs(sample.high - sample.low);
  const hc = Math.abs(sample.high - prevClose);
  const lc = Math.abs(sample.low - prevClose);
  return Math.max(hl, hc, lc);
}

export class TrueRange extends BaseLine<RangeInput> {
  private constructor(
    period: number,
    value: Num,
    outputs: RollingBuffer,
    private prevClose: Num
  ) {
    super(period, value, outputs);
  }

  /**
   * Create a True Range from historical samples
   *
   * The first sample only provides the previous close. Requires
   * `period >= 1` and at least `period + 1` samples.
   */
  static create(period: number, data: readonly HighLowClose[]): IndicatorResult<TrueRange> {
    const error =
      checkPeriod('true range', period, 1) ?? checkData('true range', data.length, period + 1);
    if (error) {
      return fail(error);
    }

    const first = trueRange(data[1], data[0].close);
    const outputs = RollingBuffer.fromArray(period, [first]);
    if (!outputs.success) {
      return outputs;
    }

    const tr = new TrueRange(period, first, outputs.data, data[1].close);
    for (let i = 2; i < data.length; i++) {
      tr.next(data[i]);
    }
    return ok(tr);
  }

  /**
   * Close of the most recent sample
   */
  lastClose(): Num {
    return this.prevClose;
  }

  next(input: RangeInput): Num {
    const sample = toHighLowClose(input);
    this.current = trueRange(sample, this.prevClose);
    this.prevClose = sample.close;
    this.history.shift(this.current);
    return this.current;
  }
}

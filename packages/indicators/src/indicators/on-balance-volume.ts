/**
 * On-Balance Volume (OBV)
 *
 * OBV = OBV_prev + (close > close_prev ? volume : close < close_prev ? -volume : 0)
 *
 * A running total with no window; the buffer only keeps the last `period`
 * values for Stats.
 */

import { fail, ok } from '@rollta/shared';
import type { CloseVolume, IndicatorResult, Num } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

/**
 * A candle-like value or a `[close, volume]` tuple
 */
export type VolumeInput = CloseVolume | readonly [close: Num, volume: Num];

export function toCloseVolume(input: VolumeInput): CloseVolume {
  if ('close' in input) {
    return input;
  }
  const [close, volume] = input;
  return { close, volume };
}

export class OnBalanceVolume extends BaseLine<VolumeInput> {
  private constructor(
    period: number,
    outputs: RollingBuffer,
    private prevClose: Num
  ) {
    super(period, 0, outputs);
  }

  /**
   * Create an OBV from historical samples
   *
   * Starts at 0 on the first sample, which only provides the previous close.
   * Requires `period >= 1` and at least `period` samples.
   *
   * @param period - Number of past OBV values kept for Stats
   */
  static create(period: number, data: readonly CloseVolume[]): IndicatorResult<OnBalanceVolume> {
    const error =
      checkPeriod('on-balance volume', period, 1) ??
      checkData('on-balance volume', data.length, period);
    if (error) {
      return fail(error);
    }

    const outputs = RollingBuffer.fromArray(period, [0]);
    if (!outputs.success) {
      return outputs;
    }

    const obv = new OnBalanceVolume(period, outputs.data, data[0].close);
    for (let i = 1; i < data.length; i++) {
      obv.next(data[i]);
    }
    return ok(obv);
  }

  lastClose(): Num {
    return this.prevClose;
  }

  next(input: VolumeInput): Num {
    const sample = toCloseVolume(input);
    if (sample.close > this.prevClose) {
      this.current += sample.volume;
    } else if (sample.close < this.prevClose) {
      this.current -= sample.volume;
    }
    this.prevClose = sample.close;
    this.history.shift(this.current);
    return this.current;
  }
}

/**
 * Relative Strength Index (RSI)
 *
 * RSI = 100 - 100 / (1 + avgGain / avgLoss)
 *
 * Averages use Wilder smoothing: avg = (avg_prev * (n - 1) + current) / n.
 * The first averages are the plain means of the first `n` gains and losses,
 * which is one Wilder step from zero. With no losses the ratio is +Infinity
 * and the RSI is exactly 100.
 */

import { DEFAULT_RSI_OVERBOUGHT, DEFAULT_RSI_OVERSOLD, fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

export class RelativeStrengthIndex extends BaseLine<Sample> {
  private oversoldAt = DEFAULT_RSI_OVERSOLD;
  private overboughtAt = DEFAULT_RSI_OVERBOUGHT;

  private constructor(
    period: number,
    outputs: RollingBuffer,
    private gainAvg: Num,
    private lossAvg: Num,
    private lastValue: Num
  ) {
    super(period, RelativeStrengthIndex.fromAverages(gainAvg, lossAvg), outputs);
  }

  private static fromAverages(gainAvg: Num, lossAvg: Num): Num {
    return 100 - 100 / (1 + gainAvg / lossAvg);
  }

  /**
   * Create an RSI from historical data
   *
   * Requires `period >= 1` and at least `period + 1` values (one change
   * per period).
   */
  static create(period: number, data: readonly Num[]): IndicatorResult<RelativeStrengthIndex> {
    const error =
      checkPeriod('relative strength index', period, 1) ??
      checkData('relative strength index', data.length, period + 1);
    if (error) {
      return fail(error);
    }

    let gains = 0;
    let losses = 0;
    for (let i = 1; i <= period; i++) {
      const change = data[i] - data[i - 1];
      if (change > 0) {
        gains += change;
      } else {
        losses += Math.abs(change);
      }
    }

    const gainAvg = gains / period;
    const lossAvg = losses / period;
    const outputs = RollingBuffer.fromArray(period, [
      RelativeStrengthIndex.fromAverages(gainAvg, lossAvg),
    ]);
    if (!outputs.success) {
      return outputs;
    }

    const rsi = new RelativeStrengthIndex(period, outputs.data, gainAvg, lossAvg, data[period]);

    for (let i = period + 1; i < data.length; i++) {
      rsi.next(data[i]);
    }
    return ok(rsi);
  }

  setOversold(value: Num): void {
    this.oversoldAt = value;
  }

  setOverbought(value: Num): void {
    this.overboughtAt = value;
  }

  oversold(): Num {
    return this.oversoldAt;
  }

  overbought(): Num {
    return this.overboughtAt;
  }

  isOversold(): boolean {
    return this.current < this.oversoldAt;
  }

  isOverbought(): boolean {
    return this.current > this.overboughtAt;
  }

  /**
   * Current Wilder-smoothed average gain
   */
  averageGain(): Num {
    return this.gainAvg;
  }

  /**
   * Current Wilder-smoothed average loss (non-negative)
   */
  averageLoss(): Num {
    return this.lossAvg;
  }

  next(input: Sample): Num {
    const x = toNum(input);
    const change = x - this.lastValue;
    this.lastValue = x;

    this.current = change > 0 ? this.smooth(change, 0) : this.smooth(0, Math.abs(change));
    this.history.shift(this.current);
    return this.current;
  }

  private smooth(gain: Num, loss: Num): Num {
    const n = this.size;
    this.gainAvg = (this.gainAvg * (n - 1) + gain) / n;
    this.lossAvg = (this.lossAvg * (n - 1) + loss) / n;
    return RelativeStrengthIndex.fromAverages(this.gainAvg, this.lossAvg);
  }
}

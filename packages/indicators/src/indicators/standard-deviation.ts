/**
 * Standard Deviation (SD / Stdev)
 *
 * SD = √Var(X)
 */

import { ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import type { RollingBuffer } from '../buffer/rolling-buffer.js';
import { BaseLine } from './base-line.js';
import { buildDispersionWindow } from './variance.js';

export class StandardDeviation extends BaseLine<Sample> {
  private constructor(
    period: number,
    window: RollingBuffer,
    private readonly sample: boolean
  ) {
    super(period, window.stdev(sample), window);
  }

  /**
   * Create a rolling standard deviation from historical data
   *
   * Requires `period >= 1` (`>= 2` when `isSample`) and at least `period` values.
   *
   * @param isSample - Sample (n - 1) rather than population (n) deviation
   */
  static create(
    period: number,
    data: readonly Num[],
    isSample = true
  ): IndicatorResult<StandardDeviation> {
    const window = buildDispersionWindow('standard deviation', period, data, isSample);
    if (!window.success) {
      return window;
    }
    return ok(new StandardDeviation(period, window.data, isSample));
  }

  isSample(): boolean {
    return this.sample;
  }

  next(input: Sample): Num {
    this.history.shift(toNum(input));
    this.current = this.history.stdev(this.sample);
    return this.current;
  }
}

/**
 * McGinley Dynamic (MD)
 *
 * MD = MD_prev + (x - MD_prev) / (k * n * (x / MD_prev)^4)
 *
 * where:
 * - `x` = current value (most recent)
 * - `k` = modifies the period, normally 0.6
 * - `n` = period
 *
 * A previous value of 0 divides by zero and the IEEE result is kept: the
 * line stays at 0 for non-zero samples and turns NaN on a zero sample.
 */

import { DEFAULT_MCGINLEY_K, fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

export class McGinleyDynamic extends BaseLine<Sample> {
  private constructor(
    period: number,
    value: Num,
    outputs: RollingBuffer,
    private readonly constant: Num
  ) {
    super(period, value, outputs);
  }

  /**
   * Create a McGinley Dynamic from historical data
   *
   * Seeded with the first value. Requires `period >= 2` and at least
   * `period + 1` values.
   */
  static create(
    period: number,
    data: readonly Num[],
    k: Num = DEFAULT_MCGINLEY_K
  ): IndicatorResult<McGinleyDynamic> {
    const error =
      checkPeriod('mcginley dynamic', period, 2) ??
      checkData('mcginley dynamic', data.length, period + 1);
    if (error) {
      return fail(error);
    }

    const outputs = RollingBuffer.fromArray(period, [data[0]]);
    if (!outputs.success) {
      return outputs;
    }

    const md = new McGinleyDynamic(period, data[0], outputs.data, k);
    for (let i = 1; i < data.length; i++) {
      md.next(data[i]);
    }
    return ok(md);
  }

  k(): Num {
    return this.constant;
  }

  next(input: Sample): Num {
    const x = toNum(input);
    const prev = this.current;
    this.current = prev + (x - prev) / (this.constant * this.size * Math.pow(x / prev, 4));
    this.history.shift(this.current);
    return this.current;
  }
}

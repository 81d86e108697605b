/**
 * Variance (Var(X))
 *
 * Var(X) = Σ(x - μ)² / (n - 1) for a sample, / n for a population.
 */

import { IndicatorError, fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

/**
 * Shared validation for Variance and StandardDeviation
 */
export function buildDispersionWindow(
  name: string,
  period: number,
  data: readonly Num[],
  isSample: boolean
): IndicatorResult<RollingBuffer> {
  const error = checkPeriod(name, period, 1) ?? checkData(name, data.length, period);
  if (error) {
    return fail(error);
  }
  // A one-value sample divides by zero
  if (isSample && period < 2) {
    return fail(
      IndicatorError.invalidSize(`period cannot be less than 2 to calculate sample ${name}`)
    );
  }
  return RollingBuffer.fromArray(period, data);
}

export class Variance extends BaseLine<Sample> {
  private constructor(
    period: number,
    window: RollingBuffer,
    private readonly sample: boolean
  ) {
    super(period, window.variance(sample), window);
  }

  /**
   * Create a rolling variance from historical data
   *
   * Requires `period >= 1` (`>= 2` when `isSample`) and at least `period` values.
   *
   * @param isSample - Sample (n - 1) rather than population (n) variance
   */
  static create(period: number, data: readonly Num[], isSample = true): IndicatorResult<Variance> {
    const window = buildDispersionWindow('variance', period, data, isSample);
    if (!window.success) {
      return window;
    }
    return ok(new Variance(period, window.data, isSample));
  }

  isSample(): boolean {
    return this.sample;
  }

  next(input: Sample): Num {
    this.history.shift(toNum(input));
    this.current = this.history.variance(this.sample);
    return this.current;
  }
}

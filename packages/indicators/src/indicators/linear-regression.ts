/**
 * Linear Regression (LineReg)
 *
 * Least squares line over the last `period` values, with x = 1..period.
 *
 * slope     = (n * Σxy - Σx * Σy) / (n * Σx² - (Σx)²)
 * intercept = (Σy - slope * Σx) / n
 * value     = intercept + slope * n
 */

import { fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { RollingBuffer } from '../buffer/rolling-buffer.js';
import { checkData, checkPeriod } from '../guards.js';
import { BaseLine } from './base-line.js';

interface Fit {
  intercept: Num;
  slope: Num;
}

export class LinearRegression extends BaseLine<Sample> {
  private readonly sumX: Num;
  private readonly sumXSq: Num;

  private constructor(
    period: number,
    private fitted: Fit,
    outputs: RollingBuffer,
    private readonly ys: RollingBuffer
  ) {
    super(period, fitted.intercept + fitted.slope * period, outputs);
    this.sumX = LinearRegression.sumX(period);
    this.sumXSq = LinearRegression.sumXSq(period);
  }

  private static sumX(period: number): Num {
    return (period * (period + 1)) / 2;
  }

  private static sumXSq(period: number): Num {
    return (period * (period + 1) * (2 * period + 1)) / 6;
  }

  private static fit(period: number, ys: RollingBuffer, sumX: Num, sumXSq: Num): Fit {
    const sumY = ys.sum();
    let sumXY = 0;
    ys.queue().forEach((y, i) => {
      sumXY += (i + 1) * y;
    });

    const slope = (period * sumXY - sumX * sumY) / (period * sumXSq - sumX * sumX);
    const intercept = (sumY - slope * sumX) / period;
    return { intercept, slope };
  }

  /**
   * Create a best fit line from historical data
   *
   * Requires `period >= 2` and at least `period` values.
   */
  static create(period: number, data: readonly Num[]): IndicatorResult<LinearRegression> {
    const error =
      checkPeriod('linear regression', period, 2) ??
      checkData('linear regression', data.length, period);
    if (error) {
      return fail(error);
    }

    const ys = RollingBuffer.fromArray(period, data.slice(0, period));
    if (!ys.success) {
      return ys;
    }

    const first = LinearRegression.fit(
      period,
      ys.data,
      LinearRegression.sumX(period),
      LinearRegression.sumXSq(period)
    );
    const outputs = RollingBuffer.fromArray(period, [first.intercept + first.slope * period]);
    if (!outputs.success) {
      return outputs;
    }

    const lr = new LinearRegression(period, first, outputs.data, ys.data);
    for (let i = period; i < data.length; i++) {
      lr.next(data[i]);
    }
    return ok(lr);
  }

  intercept(): Num {
    return this.fitted.intercept;
  }

  slope(): Num {
    return this.fitted.slope;
  }

  /**
   * Coefficient of determination (R²) of the current fit
   */
  rSq(): Num {
    const meanY = this.ys.mean();
    let sst = 0;
    let ssr = 0;
    this.ys.queue().forEach((y, i) => {
      const predicted = this.fitted.intercept + this.fitted.slope * (i + 1);
      sst += (y - meanY) ** 2;
      ssr += (y - predicted) ** 2;
    });
    return 1 - ssr / sst;
  }

  /**
   * Sample standard deviation of the values being fitted
   */
  lineStdev(): Num {
    return this.ys.stdev(true);
  }

  /**
   * Extrapolate the line `distance` steps past the newest value
   */
  forecast(distance: number): Num {
    return this.fitted.intercept + this.fitted.slope * (this.size + distance);
  }

  next(input: Sample): Num {
    this.ys.shift(toNum(input));
    this.fitted = LinearRegression.fit(this.size, this.ys, this.sumX, this.sumXSq);
    this.current = this.fitted.intercept + this.fitted.slope * this.size;
    this.history.shift(this.current);
    return this.current;
  }
}

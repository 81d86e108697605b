/**
 * Bollinger Bands (BB / BBands)
 *
 * lower = line - σ * d
 * upper = line + σ * d
 *
 * where `σ` is the sample standard deviation reported by the line and `d`
 * the distance in standard deviations.
 */

import { DEFAULT_BBANDS_DISTANCE, IndicatorError, fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import type { Line, Next, Period, Value } from '../types.js';
import { SimpleMovingAverage } from './simple-moving-average.js';

/**
 * Line a Bollinger Band can wrap
 */
export type BandLine = Line;

/**
 * Output of a Bollinger Bands step
 */
export interface BandsOutput {
  lower: Num;
  value: Num;
  upper: Num;
}

export class BollingerBands<L extends BandLine = SimpleMovingAverage>
  implements Period, Value, Next<Sample, BandsOutput>
{
  private lowerBand: Num;
  private upperBand: Num;

  private constructor(
    private readonly line: L,
    private readonly width: Num
  ) {
    const stdev = line.stdev(true);
    this.lowerBand = line.value() - stdev * width;
    this.upperBand = line.value() + stdev * width;
  }

  /**
   * Bollinger Bands around an SMA
   *
   * Requires `period >= 2` (sample standard deviation) and `period` values.
   *
   * @param distance - Standard deviations between the SMA and each band, sign ignored
   */
  static create(
    period: number,
    data: readonly Num[],
    distance: Num = DEFAULT_BBANDS_DISTANCE
  ): IndicatorResult<BollingerBands<SimpleMovingAverage>> {
    const sma = SimpleMovingAverage.create(period, data);
    if (!sma.success) {
      return sma;
    }
    return BollingerBands.withLine(sma.data, distance);
  }

  /**
   * Bollinger Bands around any line (EMA, DEMA, ...)
   *
   * The line is owned by the bands from here on.
   */
  static withLine<T extends BandLine>(
    line: T,
    distance: Num = DEFAULT_BBANDS_DISTANCE
  ): IndicatorResult<BollingerBands<T>> {
    if (line.period() < 2) {
      return fail(
        IndicatorError.invalidSize(
          `period cannot be less than 2 to calculate bollinger bands, got ${line.period()}`
        )
      );
    }
    return ok(new BollingerBands(line, Math.abs(distance)));
  }

  period(): number {
    return this.line.period();
  }

  /**
   * Value of the wrapped line (middle band)
   */
  value(): Num {
    return this.line.value();
  }

  distance(): Num {
    return this.width;
  }

  lower(): Num {
    return this.lowerBand;
  }

  upper(): Num {
    return this.upperBand;
  }

  next(input: Sample): BandsOutput {
    const value = this.line.next(toNum(input));
    const stdev = this.line.stdev(true);
    this.lowerBand = value - stdev * this.width;
    this.upperBand = value + stdev * this.width;
    return { lower: this.lowerBand, value, upper: this.upperBand };
  }
}

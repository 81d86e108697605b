/**
 * Moving Average Convergence Divergence (MACD)
 *
 * MACD = EMA(short) - EMA(long), with a signal line EMA(signal) of MACD.
 */

import { IndicatorError, fail, ok, toNum } from '@rollta/shared';
import type { IndicatorResult, Num, Sample } from '@rollta/shared';
import { checkData, checkPeriod } from '../guards.js';
import type { Next, Period, Value } from '../types.js';
import { ExponentialMovingAverage } from './exponential-moving-average.js';

/**
 * Output of a MACD step
 */
export interface MacdOutput {
  /** MACD line (short - long) */
  value: Num;
  /** Short EMA */
  short: Num;
  /** Long EMA */
  long: Num;
}

export class MovingAverageConvergenceDivergence
  implements Period, Value, Next<Sample, MacdOutput>
{
  private hasCrossed = false;

  private constructor(
    private current: Num,
    private readonly emaShort: ExponentialMovingAverage,
    private readonly emaLong: ExponentialMovingAverage,
    private readonly emaSignal: ExponentialMovingAverage
  ) {}

  /**
   * Create a MACD from historical data
   *
   * Short and long EMAs are built over the first `long` values; the rest of
   * the data produces the MACD series that seeds the signal EMA. Requires
   * every period >= 1, `short <= long`, and at least `long + signal - 1` values.
   */
  static create(
    short: number,
    long: number,
    signal: number,
    data: readonly Num[]
  ): IndicatorResult<MovingAverageConvergenceDivergence> {
    const sizeError =
      checkPeriod('moving average convergence divergence (short)', short, 1) ??
      checkPeriod('moving average convergence divergence (long)', long, 1) ??
      checkPeriod('moving average convergence divergence (signal)', signal, 1);
    if (sizeError) {
      return fail(sizeError);
    }
    if (short > long) {
      return fail(
        IndicatorError.invalidSize(`short period (${short}) longer than long period (${long})`)
      );
    }

    // long values seed the EMAs, then the signal EMA needs `signal` MACD values
    const dataError = checkData(
      'moving average convergence divergence',
      data.length,
      long + signal - 1
    );
    if (dataError) {
      return fail(dataError);
    }

    const emaShort = ExponentialMovingAverage.create(short, data.slice(0, long));
    if (!emaShort.success) {
      return emaShort;
    }
    const emaLong = ExponentialMovingAverage.create(long, data.slice(0, long));
    if (!emaLong.success) {
      return emaLong;
    }

    const series: Num[] = [emaShort.data.value() - emaLong.data.value()];
    for (let i = long; i < data.length; i++) {
      series.push(emaShort.data.next(data[i]) - emaLong.data.next(data[i]));
    }

    const emaSignal = ExponentialMovingAverage.create(signal, series);
    if (!emaSignal.success) {
      return emaSignal;
    }

    return ok(
      new MovingAverageConvergenceDivergence(
        emaShort.data.value() - emaLong.data.value(),
        emaShort.data,
        emaLong.data,
        emaSignal.data
      )
    );
  }

  /**
   * Period of the signal line
   */
  period(): number {
    return this.emaSignal.period();
  }

  /**
   * MACD line
   */
  value(): Num {
    return this.current;
  }

  signalValue(): Num {
    return this.emaSignal.value();
  }

  /**
   * True when the last step moved the MACD line from one side of the
   * signal line to the other. Touching the signal line is not a cross.
   */
  crossed(): boolean {
    return this.hasCrossed;
  }

  isAbove(): boolean {
    return this.current > this.signalValue();
  }

  isBelow(): boolean {
    return this.current < this.signalValue();
  }

  next(input: Sample): MacdOutput {
    const x = toNum(input);
    const wasAbove = this.isAbove();
    const wasBelow = this.isBelow();

    const short = this.emaShort.next(x);
    const long = this.emaLong.next(x);
    this.current = short - long;
    this.emaSignal.next(this.current);

    this.hasCrossed = (wasBelow && this.isAbove()) || (wasAbove && this.isBelow());
    return { value: this.current, short, long };
  }
}

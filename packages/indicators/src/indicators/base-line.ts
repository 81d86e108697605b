/**
 * Base class for indicators
 *
 * Holds the period, the current value and a trailing buffer that answers
 * Stats queries. What the buffer holds depends on the indicator: raw
 * samples for window indicators (SMA, Variance), past outputs for
 * recursive ones (EMA, RSI, ATR, ...).
 */

import type { Num } from '@rollta/shared';
import type { RollingBuffer } from '../buffer/rolling-buffer.js';
import type { Next, Period, Stats, Value } from '../types.js';

export abstract class BaseLine<I, O = Num> implements Period, Value, Stats, Next<I, O> {
  protected constructor(
    protected readonly size: number,
    protected current: Num,
    protected readonly history: RollingBuffer
  ) {}

  period(): number {
    return this.size;
  }

  value(): Num {
    return this.current;
  }

  sum(): Num {
    return this.history.sum();
  }

  mean(): Num {
    return this.history.mean();
  }

  variance(isSample: boolean): Num {
    return this.history.variance(isSample);
  }

  stdev(isSample: boolean): Num {
    return this.history.stdev(isSample);
  }

  abstract next(input: I): O;
}

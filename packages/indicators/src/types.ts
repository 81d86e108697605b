/**
 * Capabilities shared by indicators
 *
 * Composite indicators hold their parts through these interfaces, so any
 * line satisfying them can be swapped in (Bollinger Bands over an EMA, a
 * Cross between a DEMA and an SMA, ...).
 */

import type { Num } from '@rollta/shared';

/** Window or capacity of an indicator */
export interface Period {
  period(): number;
}

/** Most recently calculated value */
export interface Value {
  value(): Num;
}

/** Statistics over the indicator's trailing window */
export interface Stats {
  sum(): Num;
  mean(): Num;
  variance(isSample: boolean): Num;
  stdev(isSample: boolean): Num;
}

/** Advance an indicator by one input */
export interface Next<I, O> {
  next(input: I): O;
}

/**
 * A single-valued indicator driven by scalars
 */
export interface Line extends Period, Value, Stats, Next<Num, Num> {}

/**
 * Sample types consumed by indicators
 *
 * Indicators only depend on the accessors below, never on a concrete record,
 * so any candle shape exposing the right fields can be fed to them.
 */

/**
 * Numeric type used by every calculation in the library
 */
export type Num = number;

/** Opening value of a sample */
export interface Open {
  readonly open: Num;
}

/** Highest value of a sample */
export interface High {
  readonly high: Num;
}

/** Lowest value of a sample */
export interface Low {
  readonly low: Num;
}

/** Closing value of a sample */
export interface Close {
  readonly close: Num;
}

/** Traded volume of a sample */
export interface Volume {
  readonly volume: Num;
}

/**
 * User defined reduction of a sample to a single number (HL2, OHLC4 / volume, ...)
 */
export interface AsValue {
  asValue(): Num;
}

/**
 * Scalar input accepted by single-line indicators
 */
export type Sample = Num | AsValue;

export type HighLowClose = High & Low & Close;

export type CloseVolume = Close & Volume;

/**
 * Represents an OHLC candle
 */
export interface Candle {
  /** Candle start time (Unix timestamp), if known */
  timestamp?: number;
  /** Opening price */
  open: Num;
  /** Highest price */
  high: Num;
  /** Lowest price */
  low: Num;
  /** Closing price */
  close: Num;
  /** Volume (if available) */
  volume?: Num;
}

/**
 * Field or blend of fields used to turn a candle into a scalar sample
 */
export type PriceSource = 'open' | 'high' | 'low' | 'close' | 'hl2' | 'hlc3' | 'ohlc4';

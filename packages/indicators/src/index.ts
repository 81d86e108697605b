/**
 * @rollta/indicators - Streaming technical analysis indicators
 *
 * Every indicator is built from historical data through a static `create`
 * returning an `IndicatorResult`, then advanced one sample at a time with
 * `next`.
 */

export { RollingBuffer } from './buffer/rolling-buffer.js';
export type { Line, Next, Period, Stats, Value } from './types.js';

export { BaseLine } from './indicators/base-line.js';
export { SimpleMovingAverage } from './indicators/simple-moving-average.js';
export { ExponentialMovingAverage } from './indicators/exponential-moving-average.js';
export { DoubleExponentialMovingAverage } from './indicators/double-exponential-moving-average.js';
export {
  MovingAverageConvergenceDivergence,
  type MacdOutput,
} from './indicators/moving-average-convergence-divergence.js';
export {
  BollingerBands,
  type BandLine,
  type BandsOutput,
} from './indicators/bollinger-bands.js';
export { McGinleyDynamic } from './indicators/mcginley-dynamic.js';
export { LinearRegression } from './indicators/linear-regression.js';
export { RelativeStrengthIndex } from './indicators/relative-strength-index.js';
export {
  TrueRange,
  toHighLowClose,
  trueRange,
  type RangeInput,
} from './indicators/true-range.js';
export { AverageTrueRange } from './indicators/average-true-range.js';
export {
  OnBalanceVolume,
  toCloseVolume,
  type VolumeInput,
} from './indicators/on-balance-volume.js';
export { RateOfChange } from './indicators/rate-of-change.js';
export { Variance } from './indicators/variance.js';
export { StandardDeviation } from './indicators/standard-deviation.js';
export { Cross, type CrossLine } from './indicators/cross.js';

export * from './shorthand.js';
export {
  createIndicator,
  type AnyIndicator,
  type CandleIndicator,
  type FactoryOptions,
} from './factory.js';

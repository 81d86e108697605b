/**
 * Shorthand constructors
 *
 * One function per indicator, forwarding to its `create`.
 *
 * @example
 * ```typescript
 * const result = rsi(14, closes);
 * if (result.success) {
 *   result.data.next(101.5);
 * }
 * ```
 */

import type { CloseVolume, HighLowClose, Num } from '@rollta/shared';
import { AverageTrueRange } from './indicators/average-true-range.js';
import { BollingerBands } from './indicators/bollinger-bands.js';
import { Cross, type CrossLine } from './indicators/cross.js';
import { DoubleExponentialMovingAverage } from './indicators/double-exponential-moving-average.js';
import { ExponentialMovingAverage } from './indicators/exponential-moving-average.js';
import { LinearRegression } from './indicators/linear-regression.js';
import { McGinleyDynamic } from './indicators/mcginley-dynamic.js';
import { MovingAverageConvergenceDivergence } from './indicators/moving-average-convergence-divergence.js';
import { OnBalanceVolume } from './indicators/on-balance-volume.js';
import { RateOfChange } from './indicators/rate-of-change.js';
import { RelativeStrengthIndex } from './indicators/relative-strength-index.js';
import { SimpleMovingAverage } from './indicators/simple-moving-average.js';
import { StandardDeviation } from './indicators/standard-deviation.js';
import { TrueRange } from './indicators/true-range.js';
import { Variance } from './indicators/variance.js';

/**
 * Average True Range, needs `period + 1` samples
 */
export function atr(period: number, data: readonly HighLowClose[]) {
  return AverageTrueRange.create(period, data);
}

/**
 * Bollinger Bands around an SMA, needs `period` values
 */
export function bbands(period: number, data: readonly Num[], distance?: Num) {
  return BollingerBands.create(period, data, distance);
}

/**
 * Cross between a short (reactive) and a long (historic) line
 */
export function cross<S extends CrossLine, L extends CrossLine = S>(shortLine: S, longLine: L) {
  return Cross.create(shortLine, longLine);
}

/**
 * Double Exponential Moving Average, needs `2 * period - 1` values
 */
export function dema(period: number, data: readonly Num[]) {
  return DoubleExponentialMovingAverage.create(period, data);
}

/**
 * Exponential Moving Average, needs `period` values
 */
export function ema(period: number, data: readonly Num[]) {
  return ExponentialMovingAverage.create(period, data);
}

/**
 * Linear Regression, period >= 2 and `period` values
 */
export function lr(period: number, data: readonly Num[]) {
  return LinearRegression.create(period, data);
}

/**
 * McGinley Dynamic, period >= 2 and `period + 1` values
 */
export function mcginley(period: number, data: readonly Num[], k?: Num) {
  return McGinleyDynamic.create(period, data, k);
}

/**
 * Moving Average Convergence Divergence, needs `long + signal - 1` values
 */
export function macd(short: number, long: number, signal: number, data: readonly Num[]) {
  return MovingAverageConvergenceDivergence.create(short, long, signal, data);
}

/**
 * On-Balance Volume keeping `period` values of history
 */
export function obv(period: number, data: readonly CloseVolume[]) {
  return OnBalanceVolume.create(period, data);
}

/**
 * Rate of Change, period >= 2 and `period + 1` values
 */
export function roc(period: number, data: readonly Num[]) {
  return RateOfChange.create(period, data);
}

/**
 * Relative Strength Index, needs `period + 1` values
 */
export function rsi(period: number, data: readonly Num[]) {
  return RelativeStrengthIndex.create(period, data);
}

/**
 * Simple Moving Average, needs `period` values
 */
export function sma(period: number, data: readonly Num[]) {
  return SimpleMovingAverage.create(period, data);
}

/**
 * Rolling standard deviation, needs `period` values
 */
export function stdev(period: number, data: readonly Num[], isSample?: boolean) {
  return StandardDeviation.create(period, data, isSample);
}

/**
 * True Range, needs `period + 1` samples
 */
export function tr(period: number, data: readonly HighLowClose[]) {
  return TrueRange.create(period, data);
}

/**
 * Rolling variance, needs `period` values
 */
export function variance(period: number, data: readonly Num[], isSample?: boolean) {
  return Variance.create(period, data, isSample);
}

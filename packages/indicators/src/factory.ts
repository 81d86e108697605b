/**
 * Indicator Factory
 *
 * Builds indicators from a validated spec and a candle history, and wraps
 * them so they can be advanced one candle at a time.
 *
 * @example
 * ```typescript
 * const result = createIndicator({ kind: 'rsi', period: 14 }, candles);
 * if (result.success) {
 *   const rsi = result.data;
 *   rsi.next(latestCandle);
 *   console.log(rsi.value());
 * }
 * ```
 */

import { z } from 'zod';
import {
  CandleSchema,
  IndicatorError,
  IndicatorSpecSchema,
  andThen,
  createLogger,
  extractValues,
  fail,
  loadConfig,
  ok,
  priceOf,
  toIndicatorError,
} from '@rollta/shared';
import type {
  Candle,
  CloseVolume,
  IndicatorKind,
  IndicatorResult,
  IndicatorSpec,
  IndicatorSpecInput,
  Logger,
  Num,
  RolltaConfig,
} from '@rollta/shared';
import { AverageTrueRange } from './indicators/average-true-range.js';
import { BollingerBands } from './indicators/bollinger-bands.js';
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
 * Any indicator the factory can build
 */
export type AnyIndicator =
  | SimpleMovingAverage
  | ExponentialMovingAverage
  | DoubleExponentialMovingAverage
  | MovingAverageConvergenceDivergence
  | BollingerBands
  | McGinleyDynamic
  | LinearRegression
  | RelativeStrengthIndex
  | TrueRange
  | AverageTrueRange
  | OnBalanceVolume
  | RateOfChange
  | Variance
  | StandardDeviation;

/**
 * Indicator advanced by whole candles
 */
export interface CandleIndicator {
  readonly kind: IndicatorKind;
  /** Concrete indicator, for kind specific queries */
  readonly indicator: AnyIndicator;
  period(): number;
  value(): Num;
  /**
   * Feed the next candle
   *
   * @returns The new value (MACD line for `macd`, middle band for `bbands`)
   */
  next(candle: Candle): Num;
}

export interface FactoryOptions {
  /** Defaults for omitted parameters; loaded from the environment when absent */
  config?: RolltaConfig;
  /** Logger for construction events */
  logger?: Logger;
}

const CandlesSchema = z.array(CandleSchema);

let defaultConfig: RolltaConfig | null = null;
let defaultLogger: Logger | null = null;

function resolveConfig(options: FactoryOptions): RolltaConfig {
  if (options.config) {
    return options.config;
  }
  if (!defaultConfig) {
    defaultConfig = loadConfig();
  }
  return defaultConfig;
}

function resolveLogger(options: FactoryOptions, config: RolltaConfig): Logger {
  if (options.logger) {
    return options.logger;
  }
  if (!defaultLogger) {
    defaultLogger = createLogger({
      service: 'indicators',
      level: config.logging.level,
      console: config.logging.console,
      file: config.logging.file,
      logDir: config.logging.dir,
    });
  }
  return defaultLogger;
}

function wrap<T extends AnyIndicator>(
  kind: IndicatorKind,
  result: IndicatorResult<T>,
  step: (indicator: T, candle: Candle) => Num
): IndicatorResult<CandleIndicator> {
  return andThen(result, (indicator) =>
    ok<CandleIndicator>({
      kind,
      indicator,
      period: () => indicator.period(),
      value: () => indicator.value(),
      next: (candle: Candle) => step(indicator, candle),
    })
  );
}

function toCloseVolumes(candles: readonly Candle[]): IndicatorResult<CloseVolume[]> {
  const samples: CloseVolume[] = [];
  for (const [index, candle] of candles.entries()) {
    if (candle.volume === undefined) {
      return fail(IndicatorError.invalidData(`candle ${index} has no volume for on-balance volume`));
    }
    samples.push({ close: candle.close, volume: candle.volume });
  }
  return ok(samples);
}

function build(
  spec: IndicatorSpec,
  candles: readonly Candle[],
  config: RolltaConfig
): IndicatorResult<CandleIndicator> {
  switch (spec.kind) {
    case 'tr':
      return wrap(spec.kind, TrueRange.create(spec.period, candles), (ind, c) => ind.next(c));
    case 'atr':
      return wrap(spec.kind, AverageTrueRange.create(spec.period, candles), (ind, c) => ind.next(c));
    case 'obv':
      return wrap(
        spec.kind,
        andThen(toCloseVolumes(candles), (samples) => OnBalanceVolume.create(spec.period, samples)),
        // Candles without volume leave the total unchanged
        (ind, c) => ind.next({ close: c.close, volume: c.volume ?? 0 })
      );
    default:
      return buildScalar(spec, extractValues(candles, spec.source), config);
  }
}

type ScalarSpec = Exclude<IndicatorSpec, { kind: 'tr' | 'atr' | 'obv' }>;

function buildScalar(
  spec: ScalarSpec,
  values: Num[],
  config: RolltaConfig
): IndicatorResult<CandleIndicator> {
  const source = spec.source;
  const price = (candle: Candle): Num => priceOf(candle, source);

  switch (spec.kind) {
    case 'sma':
      return wrap(spec.kind, SimpleMovingAverage.create(spec.period, values), (ind, c) =>
        ind.next(price(c))
      );
    case 'ema':
      return wrap(spec.kind, ExponentialMovingAverage.create(spec.period, values), (ind, c) =>
        ind.next(price(c))
      );
    case 'dema':
      return wrap(spec.kind, DoubleExponentialMovingAverage.create(spec.period, values), (ind, c) =>
        ind.next(price(c))
      );
    case 'macd':
      return wrap(
        spec.kind,
        MovingAverageConvergenceDivergence.create(spec.short, spec.long, spec.signal, values),
        (ind, c) => ind.next(price(c)).value
      );
    case 'bbands':
      return wrap(
        spec.kind,
        BollingerBands.create(spec.period, values, spec.distance ?? config.defaults.bbandsDistance),
        (ind, c) => ind.next(price(c)).value
      );
    case 'mcginley':
      return wrap(
        spec.kind,
        McGinleyDynamic.create(spec.period, values, spec.k ?? config.defaults.mcginleyK),
        (ind, c) => ind.next(price(c))
      );
    case 'linreg':
      return wrap(spec.kind, LinearRegression.create(spec.period, values), (ind, c) =>
        ind.next(price(c))
      );
    case 'rsi': {
      const oversold = spec.oversold ?? config.defaults.rsiOversold;
      const overbought = spec.overbought ?? config.defaults.rsiOverbought;
      // One threshold may come from the spec and the other from configuration
      if (oversold > overbought) {
        return fail(
          IndicatorError.invalidData(
            `rsi oversold threshold (${oversold}) exceeds overbought threshold (${overbought})`
          )
        );
      }
      const rsi = RelativeStrengthIndex.create(spec.period, values);
      if (rsi.success) {
        rsi.data.setOversold(oversold);
        rsi.data.setOverbought(overbought);
      }
      return wrap(spec.kind, rsi, (ind, c) => ind.next(price(c)));
    }
    case 'roc':
      return wrap(spec.kind, RateOfChange.create(spec.period, values), (ind, c) =>
        ind.next(price(c))
      );
    case 'variance':
      return wrap(spec.kind, Variance.create(spec.period, values, spec.isSample), (ind, c) =>
        ind.next(price(c))
      );
    case 'stdev':
      return wrap(
        spec.kind,
        StandardDeviation.create(spec.period, values, spec.isSample),
        (ind, c) => ind.next(price(c))
      );
  }
}

/**
 * Build an indicator from a spec and a candle history
 *
 * The spec and candles are validated with zod; omitted tuning parameters
 * come from configuration. A bad spec or candle history is returned as a
 * failed result.
 *
 * @throws ConfigError when no `config` option is given and the environment
 * holds invalid `ROLLTA_*` values
 */
export function createIndicator(
  spec: IndicatorSpecInput,
  candles: readonly Candle[],
  options: FactoryOptions = {}
): IndicatorResult<CandleIndicator> {
  const config = resolveConfig(options);
  const logger = resolveLogger(options, config);

  const parsedSpec = IndicatorSpecSchema.safeParse(spec);
  if (!parsedSpec.success) {
    const error = toIndicatorError(parsedSpec.error, 'indicator spec');
    logger.warn('Rejected indicator spec', { kind: spec.kind, error: error.message });
    return fail(error);
  }

  const parsedCandles = CandlesSchema.safeParse(candles);
  if (!parsedCandles.success) {
    const error = toIndicatorError(parsedCandles.error, 'candles');
    logger.warn('Rejected candle history', { kind: spec.kind, error: error.message });
    return fail(error);
  }

  const result = build(parsedSpec.data, parsedCandles.data, config);
  if (!result.success) {
    logger.warn('Indicator construction failed', {
      kind: parsedSpec.data.kind,
      errorKind: result.error.kind,
      error: result.error.message,
    });
    return result;
  }

  logger.debug('Indicator created', {
    kind: parsedSpec.data.kind,
    period: result.data.period(),
    samples: candles.length,
  });
  return result;
}

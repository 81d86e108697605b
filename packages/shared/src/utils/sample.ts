/**
 * Helpers turning candle-like values into scalar samples
 */

import type { Candle, Close, High, Low, Num, Open, PriceSource, Sample } from '../types/sample.js';

/**
 * Average between high and low
 */
export function hl2(value: High & Low): Num {
  return (value.high + value.low) / 2;
}

/**
 * Average between high, low and close
 */
export function hlc3(value: High & Low & Close): Num {
  return (value.high + value.low + value.close) / 3;
}

/**
 * Average between open, high, low and close
 */
export function ohlc4(value: Open & High & Low & Close): Num {
  return (value.open + value.high + value.low + value.close) / 4;
}

/**
 * Reduce a sample to the number an indicator consumes
 */
export function toNum(sample: Sample): Num {
  return typeof sample === 'number' ? sample : sample.asValue();
}

/**
 * Extract a scalar from a candle
 */
export function priceOf(candle: Candle, source: PriceSource): Num {
  switch (source) {
    case 'open':
      return candle.open;
    case 'high':
      return candle.high;
    case 'low':
      return candle.low;
    case 'close':
      return candle.close;
    case 'hl2':
      return hl2(candle);
    case 'hlc3':
      return hlc3(candle);
    case 'ohlc4':
      return ohlc4(candle);
  }
}

/**
 * Extract a scalar series from candles
 */
export function extractValues(candles: readonly Candle[], source: PriceSource = 'close'): Num[] {
  return candles.map((candle) => priceOf(candle, source));
}

/**
 * Made-up price series shared by the indicator tests
 */

import type { Candle } from '@rollta/shared';

/** Twenty closes; tests seed with the first 19 and step with the last */
export const CLOSES = [
  50.0, 51.2, 50.8, 52.4, 53.1, 52.7, 54.0, 55.3, 54.6, 56.2, 57.0, 56.1, 55.4, 56.8, 58.3, 59.1,
  58.2, 60.4, 61.0, 60.3,
];

export const HISTORY = CLOSES.slice(0, -1);
export const LATEST = 60.3;

/** Nine candles; tests seed with the first 8 and step with the last */
export const CANDLES: Candle[] = [
  { open: 20.0, high: 20.5, low: 19.8, close: 20.2, volume: 1200 },
  { open: 20.2, high: 20.9, low: 20.1, close: 20.7, volume: 1500 },
  { open: 20.7, high: 21.4, low: 20.6, close: 21.2, volume: 1800 },
  { open: 21.0, high: 21.1, low: 20.3, close: 20.4, volume: 1600 },
  { open: 20.4, high: 20.8, low: 19.9, close: 20.1, volume: 2100 },
  { open: 20.3, high: 21.6, low: 20.2, close: 21.5, volume: 2500 },
  { open: 21.5, high: 21.9, low: 21.0, close: 21.3, volume: 1900 },
  { open: 21.3, high: 22.4, low: 21.2, close: 22.2, volume: 2300 },
  { open: 21.9, high: 22.0, low: 21.1, close: 21.4, volume: 1700 },
];

export const CANDLE_HISTORY = CANDLES.slice(0, -1);
export const LATEST_CANDLE = CANDLES[CANDLES.length - 1];

/**
 * Turn closes into flat candles (open = high = low = close)
 */
export function flatCandles(closes: number[], volume = 100): Candle[] {
  return closes.map((close, i) => ({
    timestamp: 1704067200 + i * 60,
    open: close,
    high: close,
    low: close,
    close,
    volume,
  }));
}

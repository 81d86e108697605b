import { describe, it, expect } from 'vitest';
import type { Candle } from '../types/sample.js';
import { extractValues, hl2, hlc3, ohlc4, priceOf, toNum } from './sample.js';

const candle: Candle = { open: 10, high: 16, low: 8, close: 14, volume: 300 };

describe('sample helpers', () => {
  it('should blend candle fields', () => {
    expect(hl2(candle)).toBe(12);
    expect(hlc3(candle)).toBe(38 / 3);
    expect(ohlc4(candle)).toBe(12);
  });

  it('should reduce samples to numbers', () => {
    expect(toNum(7)).toBe(7);
    expect(toNum({ asValue: () => 3 })).toBe(3);
  });

  it('should pick the requested price source', () => {
    expect(priceOf(candle, 'open')).toBe(10);
    expect(priceOf(candle, 'high')).toBe(16);
    expect(priceOf(candle, 'low')).toBe(8);
    expect(priceOf(candle, 'close')).toBe(14);
    expect(priceOf(candle, 'hl2')).toBe(12);
  });

  it('should extract closes by default', () => {
    const candles: Candle[] = [candle, { ...candle, close: 15 }];

    expect(extractValues(candles)).toEqual([14, 15]);
    expect(extractValues(candles, 'low')).toEqual([8, 8]);
  });
});

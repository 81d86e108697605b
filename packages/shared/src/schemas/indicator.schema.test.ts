import { describe, it, expect } from 'vitest';
import { IndicatorSpecSchema, PeriodSchema, toIndicatorError } from './indicator.schema.js';
import { CandleSchema } from './candle.schema.js';

describe('IndicatorSpecSchema', () => {
  it('should default the price source to close', () => {
    const spec = IndicatorSpecSchema.parse({ kind: 'ema', period: 9 });

    expect(spec).toEqual({ kind: 'ema', period: 9, source: 'close' });
  });

  it('should default variance to a sample', () => {
    const spec = IndicatorSpecSchema.parse({ kind: 'variance', period: 4 });

    expect(spec).toEqual({ kind: 'variance', period: 4, isSample: true, source: 'close' });
  });

  it('should leave tuning values unset when omitted', () => {
    const spec = IndicatorSpecSchema.parse({ kind: 'bbands', period: 20 });

    expect(spec.kind === 'bbands' ? spec.distance : null).toBeUndefined();
  });

  it('should reject an unknown kind', () => {
    expect(IndicatorSpecSchema.safeParse({ kind: 'vwap', period: 4 }).success).toBe(false);
  });

  it('should reject RSI thresholds in the wrong order', () => {
    const parsed = IndicatorSpecSchema.safeParse({
      kind: 'rsi',
      period: 14,
      oversold: 70,
      overbought: 30,
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const error = toIndicatorError(parsed.error, 'indicator spec');
      expect(error.kind).toBe('InvalidData');
      expect(error.message).toBe('invalid indicator spec: oversold: must not exceed overbought');
    }
  });

  it('should accept equal RSI thresholds', () => {
    const parsed = IndicatorSpecSchema.safeParse({
      kind: 'rsi',
      period: 14,
      oversold: 50,
      overbought: 50,
    });

    expect(parsed.success).toBe(true);
  });

  it('should reject fractional periods', () => {
    expect(PeriodSchema.safeParse(2.5).success).toBe(false);
    expect(PeriodSchema.safeParse(0).success).toBe(false);
    expect(PeriodSchema.safeParse(3).success).toBe(true);
  });
});

describe('toIndicatorError', () => {
  it('should map period issues to InvalidSize', () => {
    const parsed = IndicatorSpecSchema.safeParse({ kind: 'macd', short: 3, long: 0, signal: 4 });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const error = toIndicatorError(parsed.error, 'indicator spec');
      expect(error.kind).toBe('InvalidSize');
      expect(error.message).toBe(
        'invalid indicator spec: long: Number must be greater than 0'
      );
    }
  });

  it('should map other issues to InvalidData', () => {
    const parsed = CandleSchema.safeParse({ open: 1, high: 2, low: 0, close: 1, volume: -5 });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(toIndicatorError(parsed.error, 'candle').kind).toBe('InvalidData');
    }
  });
});

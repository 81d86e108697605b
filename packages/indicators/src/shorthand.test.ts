import { describe, it, expect } from 'vitest';
import { unwrap } from '@rollta/shared';
import {
  atr,
  bbands,
  cross,
  dema,
  ema,
  lr,
  macd,
  mcginley,
  obv,
  roc,
  rsi,
  sma,
  stdev,
  tr,
  variance,
} from './shorthand.js';
import { CANDLE_HISTORY, HISTORY } from './testing/fixtures.js';

describe('shorthand constructors', () => {
  it('should build every scalar indicator', () => {
    expect(unwrap(sma(5, HISTORY)).value()).toBeCloseTo(59.4, 10);
    expect(unwrap(ema(5, HISTORY)).value()).toBeCloseTo(59.42523779685798, 10);
    expect(unwrap(dema(4, HISTORY)).value()).toBeCloseTo(60.851369831007844, 10);
    expect(unwrap(macd(3, 6, 4, HISTORY)).value()).toBeCloseTo(1.0468337316697216, 10);
    expect(unwrap(bbands(5, HISTORY)).upper()).toBeCloseTo(61.90998007960222, 10);
    expect(unwrap(mcginley(5, HISTORY)).value()).toBeCloseTo(59.0705611859115, 10);
    expect(unwrap(lr(5, HISTORY)).value()).toBeCloseTo(60.74, 9);
    expect(unwrap(rsi(6, HISTORY)).value()).toBeCloseTo(80.412342349798, 10);
    expect(unwrap(roc(5, HISTORY)).value()).toBeCloseTo(7.394366197183104, 10);
    expect(unwrap(variance(5, HISTORY)).value()).toBeCloseTo(1.575, 10);
    expect(unwrap(stdev(5, HISTORY, false)).value()).toBeCloseTo(Math.sqrt(1.26), 10);
  });

  it('should build the candle indicators', () => {
    expect(unwrap(tr(3, CANDLE_HISTORY)).value()).toBeCloseTo(1.2, 10);
    expect(unwrap(atr(3, CANDLE_HISTORY)).value()).toBeCloseTo(1.0757201646090526, 10);
    expect(
      unwrap(obv(3, CANDLE_HISTORY.map((c) => ({ close: c.close, volume: c.volume ?? 0 })))).value()
    ).toBe(2500);
  });

  it('should pair two lines in a cross', () => {
    const pair = cross(unwrap(sma(2, [10, 10])), unwrap(ema(3, [10, 10, 10])));

    expect(pair.next(14)).toBe(false);
    expect(pair.crossed()).toBe(false);
  });

  it('should forward construction errors', () => {
    const result = rsi(0, HISTORY);

    expect(result.success ? null : result.error.kind).toBe('InvalidSize');
  });
});

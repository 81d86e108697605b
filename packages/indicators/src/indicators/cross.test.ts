import { describe, it, expect } from 'vitest';
import { unwrap } from '@rollta/shared';
import { Cross } from './cross.js';
import { ExponentialMovingAverage } from './exponential-moving-average.js';
import { SimpleMovingAverage } from './simple-moving-average.js';

function smaCross(): Cross<SimpleMovingAverage> {
  const flat = [10, 10, 10, 10];
  return Cross.create(
    unwrap(SimpleMovingAverage.create(2, flat)),
    unwrap(SimpleMovingAverage.create(4, flat))
  );
}

describe('Cross', () => {
  it('should not report a cross before any step', () => {
    const cross = smaCross();

    expect(cross.crossed()).toBe(false);
    expect(cross.isGolden()).toBe(false);
    expect(cross.isDeath()).toBe(false);
  });

  it('should report a tie after a death cross as a cross with no direction', () => {
    const cross = smaCross();

    // short 11 / long 10.5, then 10.5 / 10.25
    expect(cross.next(12)).toBe(false);
    expect(cross.next(9)).toBe(false);

    // 8.5 / 9.75
    expect(cross.next(8)).toBe(true);
    expect(cross.isDeath()).toBe(true);
    expect(cross.isGolden()).toBe(false);

    // 10.5 / 10.5: reaching the long line is a cross with no direction
    expect(cross.next(13)).toBe(true);
    expect(cross.isGolden()).toBe(false);
    expect(cross.isDeath()).toBe(false);

    // 13.5 / 11
    expect(cross.next(14)).toBe(false);
    expect(cross.crossed()).toBe(false);
    expect(cross.isGolden()).toBe(false);
  });

  it('should follow lines of different kinds', () => {
    const cross = Cross.create(
      unwrap(ExponentialMovingAverage.create(3, [10, 10, 10])),
      unwrap(SimpleMovingAverage.create(5, [10, 10, 10, 10, 10]))
    );

    // EMA 8 against SMA 9.2
    expect(cross.next(6)).toBe(true);
    expect(cross.isDeath()).toBe(true);
    // EMA 10.5 against SMA 9.8
    expect(cross.next(13)).toBe(true);
    expect(cross.isGolden()).toBe(true);
  });

  it('should accept values exposing asValue', () => {
    const cross = smaCross();

    expect(cross.next({ asValue: () => 12 })).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { unwrap } from '@rollta/shared';
import { CLOSES, HISTORY, LATEST } from '../testing/fixtures.js';
import { MovingAverageConvergenceDivergence } from './moving-average-convergence-divergence.js';

describe('MovingAverageConvergenceDivergence', () => {
  it('should compute the fixture series', () => {
    const macd = unwrap(MovingAverageConvergenceDivergence.create(3, 6, 4, HISTORY));

    expect(macd.value()).toBeCloseTo(1.0468337316697216, 10);
    expect(macd.signalValue()).toBeCloseTo(0.9147556398426777, 10);
    expect(macd.period()).toBe(4);
  });

  it('should return the MACD line and both EMAs from next', () => {
    const macd = unwrap(MovingAverageConvergenceDivergence.create(3, 6, 4, HISTORY));
    const output = macd.next(LATEST);

    expect(output.value).toBeCloseTo(0.7799987295827222, 10);
    expect(output.short).toBeCloseTo(60.22472585042318, 10);
    expect(output.long).toBeCloseTo(59.444727120840454, 10);
    expect(macd.signalValue()).toBeCloseTo(0.8608528757386955, 10);
    expect(macd.isBelow()).toBe(true);
    expect(macd.crossed()).toBe(true);
  });

  it('should match building from the full series', () => {
    const stepped = unwrap(MovingAverageConvergenceDivergence.create(3, 6, 4, HISTORY));
    stepped.next(LATEST);
    const built = unwrap(MovingAverageConvergenceDivergence.create(3, 6, 4, CLOSES));

    expect(stepped.value()).toBeCloseTo(built.value(), 10);
    expect(stepped.signalValue()).toBeCloseTo(built.signalValue(), 10);
  });

  it('should only report a cross when the line changes sides', () => {
    const macd = unwrap(MovingAverageConvergenceDivergence.create(2, 3, 2, [10, 10, 10, 10]));
    expect(macd.value()).toBe(0);
    expect(macd.signalValue()).toBe(0);

    // Leaving a tie is not a cross
    macd.next(14);
    expect(macd.isAbove()).toBe(true);
    expect(macd.crossed()).toBe(false);

    macd.next(16);
    expect(macd.crossed()).toBe(false);

    macd.next(12);
    expect(macd.isBelow()).toBe(true);
    expect(macd.crossed()).toBe(true);

    macd.next(8);
    expect(macd.crossed()).toBe(false);
  });

  it('should reject a short period longer than the long one', () => {
    const result = MovingAverageConvergenceDivergence.create(12, 6, 4, CLOSES);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('InvalidSize');
    }
  });

  it('should reject a zero signal period', () => {
    const result = MovingAverageConvergenceDivergence.create(3, 6, 0, CLOSES);

    expect(result.success ? null : result.error.kind).toBe('InvalidSize');
  });

  it('should need long + signal - 1 values', () => {
    const data = CLOSES.slice(0, 9);

    expect(MovingAverageConvergenceDivergence.create(3, 6, 4, data).success).toBe(true);
    const result = MovingAverageConvergenceDivergence.create(3, 6, 4, data.slice(0, 8));
    expect(result.success ? null : result.error.kind).toBe('InvalidData');
  });

  it('should replay the rest of the series after a minimum seed', () => {
    const stepped = unwrap(MovingAverageConvergenceDivergence.create(3, 6, 4, CLOSES.slice(0, 9)));
    for (const sample of CLOSES.slice(9)) {
      stepped.next(sample);
    }
    const built = unwrap(MovingAverageConvergenceDivergence.create(3, 6, 4, CLOSES));

    expect(stepped.value()).toBeCloseTo(built.value(), 10);
    expect(stepped.signalValue()).toBeCloseTo(built.signalValue(), 10);
  });
});

import { IndicatorError } from '@rollta/shared';

/**
 * Returns an error when `period` is not an integer of at least `min`
 */
export function checkPeriod(name: string, period: number, min: number): IndicatorError | null {
  if (!Number.isInteger(period) || period < min) {
    return IndicatorError.invalidSize(
      `period cannot be less than ${min} to calculate ${name}, got ${period}`
    );
  }
  return null;
}

/**
 * Returns an error when fewer than `min` samples were supplied
 */
export function checkData(name: string, length: number, min: number): IndicatorError | null {
  if (length < min) {
    return IndicatorError.invalidData(
      `not enough data to calculate ${name}: need ${min}, got ${length}`
    );
  }
  return null;
}

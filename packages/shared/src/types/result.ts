/**
 * Construction results and errors
 */

export type IndicatorErrorKind = 'InvalidSize' | 'InvalidData';

/**
 * Recoverable construction error
 *
 * - `InvalidSize`: a period or capacity is below the indicator's minimum
 * - `InvalidData`: not enough historical samples to seed the indicator
 */
export class IndicatorError extends Error {
  readonly kind: IndicatorErrorKind;

  constructor(kind: IndicatorErrorKind, message: string) {
    super(message);
    this.name = 'IndicatorError';
    this.kind = kind;
  }

  static invalidSize(message: string): IndicatorError {
    return new IndicatorError('InvalidSize', message);
  }

  static invalidData(message: string): IndicatorError {
    return new IndicatorError('InvalidData', message);
  }
}

/**
 * Outcome of building an indicator, shaped like zod's `safeParse`
 */
export type IndicatorResult<T> =
  | { success: true; data: T }
  | { success: false; error: IndicatorError };

export function ok<T>(data: T): IndicatorResult<T> {
  return { success: true, data };
}

export function fail<T>(error: IndicatorError): IndicatorResult<T> {
  return { success: false, error };
}

export function isIndicatorError(value: unknown): value is IndicatorError {
  return value instanceof IndicatorError;
}

/**
 * Returns the built value or throws the construction error
 *
 * @example
 * ```typescript
 * const sma = unwrap(SimpleMovingAverage.create(10, closes));
 * ```
 */
export function unwrap<T>(result: IndicatorResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

/**
 * Chains a second construction step onto a successful result
 */
export function andThen<T, U>(
  result: IndicatorResult<T>,
  next: (data: T) => IndicatorResult<U>
): IndicatorResult<U> {
  return result.success ? next(result.data) : result;
}

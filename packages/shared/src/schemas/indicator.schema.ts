import { z, type ZodError } from 'zod';
import { PriceSourceSchema } from './candle.schema.js';
import { IndicatorError } from '../types/result.js';

/**
 * Window length of an indicator
 */
export const PeriodSchema = z.number().int().positive();

const source = PriceSourceSchema.default('close');

/**
 * Zod schema describing an indicator and its parameters
 *
 * Optional tuning values (distance, k, thresholds) fall back to the
 * configured defaults when omitted.
 */
export const IndicatorSpecSchema = z
  .discriminatedUnion('kind', [
    z.object({ kind: z.literal('sma'), period: PeriodSchema, source }),
    z.object({ kind: z.literal('ema'), period: PeriodSchema, source }),
    z.object({ kind: z.literal('dema'), period: PeriodSchema, source }),
    z.object({
      kind: z.literal('macd'),
      short: PeriodSchema,
      long: PeriodSchema,
      signal: PeriodSchema,
      source,
    }),
    z.object({
      kind: z.literal('bbands'),
      period: PeriodSchema,
      distance: z.number().finite().optional(),
      source,
    }),
    z.object({
      kind: z.literal('mcginley'),
      period: PeriodSchema,
      k: z.number().finite().positive().optional(),
      source,
    }),
    z.object({ kind: z.literal('linreg'), period: PeriodSchema, source }),
    z.object({
      kind: z.literal('rsi'),
      period: PeriodSchema,
      oversold: z.number().min(0).max(100).optional(),
      overbought: z.number().min(0).max(100).optional(),
      source,
    }),
    z.object({ kind: z.literal('tr'), period: PeriodSchema }),
    z.object({ kind: z.literal('atr'), period: PeriodSchema }),
    z.object({ kind: z.literal('obv'), period: PeriodSchema }),
    z.object({ kind: z.literal('roc'), period: PeriodSchema, source }),
    z.object({
      kind: z.literal('variance'),
      period: PeriodSchema,
      isSample: z.boolean().default(true),
      source,
    }),
    z.object({
      kind: z.literal('stdev'),
      period: PeriodSchema,
      isSample: z.boolean().default(true),
      source,
    }),
  ])
  .superRefine((spec, ctx) => {
    if (
      spec.kind === 'rsi' &&
      spec.oversold !== undefined &&
      spec.overbought !== undefined &&
      spec.oversold > spec.overbought
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['oversold'],
        message: 'must not exceed overbought',
      });
    }
  });

/** Spec as written by callers (defaults not yet applied) */
export type IndicatorSpecInput = z.input<typeof IndicatorSpecSchema>;

/** Spec after validation */
export type IndicatorSpec = z.infer<typeof IndicatorSpecSchema>;

export type IndicatorKind = IndicatorSpec['kind'];

const PERIOD_KEYS = new Set<string | number>(['period', 'short', 'long', 'signal']);

/**
 * Map zod issues onto the library's two error kinds
 */
export function toIndicatorError(error: ZodError, label: string): IndicatorError {
  const detail = error.issues
    .map((issue) => `${issue.path.join('.') || label}: ${issue.message}`)
    .join('; ');

  const badPeriod = error.issues.some(
    (issue) => issue.path.length === 1 && PERIOD_KEYS.has(issue.path[0] ?? '')
  );

  return badPeriod
    ? IndicatorError.invalidSize(`invalid ${label}: ${detail}`)
    : IndicatorError.invalidData(`invalid ${label}: ${detail}`);
}

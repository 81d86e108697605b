import { z } from 'zod';

/**
 * Zod schema for Candle validation
 */
export const CandleSchema = z.object({
  timestamp: z.number().int().nonnegative().optional(),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().nonnegative().optional(),
});

/**
 * Candle field (or blend) used as the scalar input of an indicator
 */
export const PriceSourceSchema = z.enum(['open', 'high', 'low', 'close', 'hl2', 'hlc3', 'ohlc4']);

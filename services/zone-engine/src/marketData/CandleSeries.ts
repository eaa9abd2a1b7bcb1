/**
 * CandleSeries - input boundary for OHLCV data
 *
 * Accepts candle objects or exchange kline rows ([openTime, open, high, low, close, volume, ...])
 * and returns a validated, time-ordered Candle[]. Everything past this point assumes well-formed input.
 */

import { z } from 'zod';
import { Candle } from '@confluence/shared-types';
import { Logger, ValidationError } from '@confluence/shared-utils';

const logger = new Logger('CandleSeries');

// Exchanges send prices as decimal strings
const NumericSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

const PriceSchema = NumericSchema.pipe(z.number().nonnegative());

const TimestampSchema = z.union([
  z.number().int().nonnegative(),
  z.string().datetime({ offset: true }).transform(s => Date.parse(s)),
  z.date().transform(d => d.getTime()),
]);

const CandleObjectSchema = z.object({
  timestamp: TimestampSchema,
  open: PriceSchema,
  high: PriceSchema,
  low: PriceSchema,
  close: PriceSchema,
  volume: PriceSchema,
});

const KlineRowSchema = z
  .tuple([TimestampSchema, PriceSchema, PriceSchema, PriceSchema, PriceSchema, PriceSchema])
  .rest(z.unknown())
  .transform(([timestamp, open, high, low, close, volume]): Candle => ({
    timestamp,
    open,
    high,
    low,
    close,
    volume,
  }));

export const CandleSchema = z
  .union([CandleObjectSchema, KlineRowSchema])
  .superRefine((candle, ctx) => {
    if (candle.low > Math.min(candle.open, candle.close)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['low'],
        message: 'low must not exceed open or close',
      });
    }
    if (candle.high < Math.max(candle.open, candle.close)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['high'],
        message: 'high must not be below open or close',
      });
    }
  });

export const CandleSeriesSchema = z.array(CandleSchema).superRefine((candles, ctx) => {
  for (let i = 1; i < candles.length; i++) {
    if (candles[i].timestamp <= candles[i - 1].timestamp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'timestamp'],
        message: 'timestamps must be strictly increasing',
      });
      return;
    }
  }
});

/**
 * Validate raw OHLCV input and return an ordered candle series.
 * Throws ValidationError naming the first offending field.
 */
export function parseCandleSeries(raw: unknown): Candle[] {
  const result = CandleSeriesSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    logger.warn(`Rejected candle series: ${field || '(root)'} ${issue.message}`);
    throw new ValidationError(
      `Invalid candle series${field ? ` at ${field}` : ''}: ${issue.message}`,
      field || undefined
    );
  }
  return result.data.map(c => ({ ...c }));
}

export function isCandleSeriesValid(raw: unknown): boolean {
  return CandleSeriesSchema.safeParse(raw).success;
}

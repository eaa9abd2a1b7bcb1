import { CandleSeries } from '@confluence/shared-types';

/**
 * Wilder ATR. out[i] is null until `period` true ranges exist (the first candle has none).
 */
export function averageTrueRange(candles: CandleSeries, period: number = 14): Array<number | null> {
  const out: Array<number | null> = new Array<number | null>(candles.length).fill(null);
  if (period < 1 || candles.length <= period) return out;

  const trueRange = (i: number): number => {
    const { high, low } = candles[i];
    const prevClose = candles[i - 1].close;
    return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
  };

  let sum = 0;
  for (let i = 1; i <= period; i++) sum += trueRange(i);
  let atr = sum / period;
  out[period] = atr;

  for (let i = period + 1; i < candles.length; i++) {
    atr = (atr * (period - 1) + trueRange(i)) / period;
    out[i] = atr;
  }
  return out;
}

export function latestAtr(candles: CandleSeries, period: number = 14): number | null {
  const series = averageTrueRange(candles, period);
  return series.length > 0 ? series[series.length - 1] : null;
}

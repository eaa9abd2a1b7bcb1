import { Candle } from '@confluence/shared-types';

export const BASE_TIME = Date.UTC(2024, 0, 1);
export const HOUR_MS = 60 * 60 * 1000;

export function buildCandle(
  index: number,
  open: number,
  high: number,
  low: number,
  close: number,
  volume: number = 100
): Candle {
  return { timestamp: BASE_TIME + index * HOUR_MS, open, high, low, close, volume };
}

/**
 * Candle from [low, high], opening at the low and closing at the high
 */
export function risingCandle(index: number, low: number, high: number, volume: number = 100): Candle {
  return buildCandle(index, low, high, low, high, volume);
}

/**
 * Candles from [high, low, close] triples; open equals close
 */
export function fromHlc(rows: Array<[number, number, number]>, volume: number = 100): Candle[] {
  return rows.map(([high, low, close], i) => buildCandle(i, close, high, low, close, volume));
}

export function flatSeries(count: number, price: number, volume: number = 100): Candle[] {
  return Array.from({ length: count }, (_, i) => buildCandle(i, price, price, price, price, volume));
}

/**
 * 100 candles: a steady climb, a five-candle flat consolidation at 100 (indices 20-24),
 * then a climb away from it.
 *
 * - 0..19:  low = 58 + 2k, high = low + 2
 * - 20..24: open = close = 100, high 100.2, low 99.8
 * - 25..99: low = 101 + 2(k - 25), high = low + 2
 */
export function consolidationThenImpulse(): Candle[] {
  const candles: Candle[] = [];
  for (let k = 0; k < 100; k++) {
    if (k < 20) {
      const low = 58 + 2 * k;
      candles.push(risingCandle(k, low, low + 2));
    } else if (k < 25) {
      candles.push(buildCandle(k, 100, 100.2, 99.8, 100));
    } else {
      const low = 101 + 2 * (k - 25);
      candles.push(risingCandle(k, low, low + 2));
    }
  }
  return candles;
}

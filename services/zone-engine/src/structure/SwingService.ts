/**
 * SwingService - Fractal swing detection
 *
 * A candle at index i is a swing high if its high is the maximum of
 * [i - lookback, ..., i + lookback] (ties qualify); swing lows are symmetric.
 * Non-repainting but delayed: a swing is only known at i + lookback.
 */

import { CandleSeries, SwingPoint } from '@confluence/shared-types';

export class SwingService {
  constructor(private readonly lookback: number) {}

  /**
   * Returns SwingPoint[] sorted by index (a high before a low on the same candle)
   */
  detectSwings(candles: CandleSeries): SwingPoint[] {
    const swings: SwingPoint[] = [];
    const L = this.lookback;

    // Cannot detect swings until we have enough candles
    if (L < 1 || candles.length < 2 * L + 1) {
      return swings;
    }

    for (let i = L; i < candles.length - L; i++) {
      const current = candles[i];
      let isSwingHigh = true;
      let isSwingLow = true;

      for (let j = i - L; j <= i + L; j++) {
        if (candles[j].high > current.high) isSwingHigh = false;
        if (candles[j].low < current.low) isSwingLow = false;
        if (!isSwingHigh && !isSwingLow) break;
      }

      if (isSwingHigh) {
        swings.push({
          index: i,
          type: 'high',
          price: current.high,
          timestamp: current.timestamp,
          confirmedIndex: i + L,
        });
      }
      if (isSwingLow) {
        swings.push({
          index: i,
          type: 'low',
          price: current.low,
          timestamp: current.timestamp,
          confirmedIndex: i + L,
        });
      }
    }

    return swings;
  }
}

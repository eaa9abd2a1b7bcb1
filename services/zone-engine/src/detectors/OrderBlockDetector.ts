/**
 * OrderBlockDetector - Consolidation-before-impulse zones
 *
 * An order block is a tight consolidation window ending at candle i that is followed,
 * within `lookback` candles, by a move of at least `impulseThresholdPct` away from close[i].
 * Bullish when the move is up (future high), bearish when down (future low).
 *
 * Zones are causal: active from the origin candle until the first close through the
 * band (invalidated) or until `maxAge` candles have passed (expired).
 */

import { Candle, CandleSeries, OrderBlockZone, ZoneDirection } from '@confluence/shared-types';
import { DEFAULT_ORDER_BLOCK_CONFIG, OrderBlockConfig } from '@confluence/shared-config';
import { Logger } from '@confluence/shared-utils';
import { averageRange, forwardWindowExtreme } from './zoneUtils';

const logger = new Logger('OrderBlockDetector');

const MAX_STRENGTH = 3;

interface ConsolidationWindow {
  start: number;
  end: number;
  low: number;
  high: number;
}

export class OrderBlockDetector {
  private config: OrderBlockConfig;

  constructor(config: Partial<OrderBlockConfig> = {}) {
    const d = DEFAULT_ORDER_BLOCK_CONFIG;
    this.config = {
      minCandles: config.minCandles ?? d.minCandles,
      maxCandles: config.maxCandles ?? d.maxCandles,
      impulseThresholdPct: config.impulseThresholdPct ?? d.impulseThresholdPct,
      lookback: config.lookback ?? d.lookback,
      maxAge: config.maxAge ?? d.maxAge,
      consolidationRangeMultiplier: config.consolidationRangeMultiplier ?? d.consolidationRangeMultiplier,
    };
  }

  getConfig(): Readonly<OrderBlockConfig> {
    return this.config;
  }

  /**
   * Detect order blocks, ordered by origin index
   */
  detect(candles: CandleSeries): OrderBlockZone[] {
    const { maxCandles, lookback, impulseThresholdPct } = this.config;
    const n = candles.length;

    if (n === 0 || n < lookback + maxCandles) {
      logger.debug(`Insufficient data: ${n} candles, need ${lookback + maxCandles}`);
      return [];
    }

    const avgRange = averageRange(candles);
    const rangeLimit = this.config.consolidationRangeMultiplier * avgRange;
    const futureHigh = forwardWindowExtreme(candles.map(c => c.high), lookback, 'max');
    const futureLow = forwardWindowExtreme(candles.map(c => c.low), lookback, 'min');

    const zones: OrderBlockZone[] = [];
    let lastBullish: OrderBlockZone | null = null;
    let lastBearish: OrderBlockZone | null = null;

    for (let i = lookback; i < n - maxCandles; i++) {
      const close = candles[i].close;
      if (close <= 0) continue;

      const bullishPct = ((futureHigh[i] - close) / close) * 100;
      const bearishPct = ((close - futureLow[i]) / close) * 100;
      const bullish = bullishPct >= impulseThresholdPct;
      const bearish = bearishPct >= impulseThresholdPct;
      if (!bullish && !bearish) continue;

      const window = this.findConsolidation(candles, i, rangeLimit);
      if (!window) continue;

      if (bullish) {
        lastBullish = this.addOrMerge(zones, lastBullish, 'bullish', window, candles[i], bullishPct, rangeLimit);
      }
      if (bearish) {
        lastBearish = this.addOrMerge(zones, lastBearish, 'bearish', window, candles[i], bearishPct, rangeLimit);
      }
    }

    for (const zone of zones) {
      this.resolveValidity(zone, candles);
    }
    zones.sort((a, b) => a.originIndex - b.originIndex || a.direction.localeCompare(b.direction));

    logger.debug(`Detected ${zones.length} order blocks over ${n} candles`);
    return zones;
  }

  /**
   * Longest window ending at i (maxCandles down to minCandles) whose total range is tight
   * relative to the series' average candle range
   */
  private findConsolidation(
    candles: CandleSeries,
    i: number,
    limit: number
  ): ConsolidationWindow | null {
    const { minCandles, maxCandles } = this.config;

    for (let length = maxCandles; length >= minCandles; length--) {
      const start = i - length + 1;
      if (start < 0) continue;

      let low = Infinity;
      let high = -Infinity;
      for (let j = start; j <= i; j++) {
        low = Math.min(low, candles[j].low);
        high = Math.max(high, candles[j].high);
      }
      if (high - low <= limit) {
        return { start, end: i, low, high };
      }
    }
    return null;
  }

  /**
   * Consecutive windows over the same consolidation collapse into one zone whose origin
   * is the last candle before the impulse. A merge that would widen the band past the
   * consolidation range limit starts a new zone instead.
   */
  private addOrMerge(
    zones: OrderBlockZone[],
    previous: OrderBlockZone | null,
    direction: ZoneDirection,
    window: ConsolidationWindow,
    origin: Candle,
    impulsePct: number,
    rangeLimit: number
  ): OrderBlockZone {
    const strength = Math.min(impulsePct / this.config.impulseThresholdPct, MAX_STRENGTH);

    const merged = previous
      ? { low: Math.min(previous.band.low, window.low), high: Math.max(previous.band.high, window.high) }
      : null;
    if (
      previous &&
      merged &&
      window.start <= previous.consolidationEndIndex &&
      merged.high - merged.low <= rangeLimit
    ) {
      previous.band = merged;
      previous.consolidationEndIndex = window.end;
      previous.originIndex = window.end;
      previous.validFromIndex = window.end;
      previous.timestamp = origin.timestamp;
      previous.impulsePct = Math.max(previous.impulsePct, impulsePct);
      previous.strength = Math.max(previous.strength, strength);
      return previous;
    }

    const zone: OrderBlockZone = {
      kind: 'order_block',
      direction,
      band: { low: window.low, high: window.high },
      originIndex: window.end,
      validFromIndex: window.end,
      validUntilIndex: null,
      endReason: null,
      strength,
      timestamp: origin.timestamp,
      consolidationStartIndex: window.start,
      consolidationEndIndex: window.end,
      impulsePct,
    };
    zones.push(zone);
    return zone;
  }

  private resolveValidity(zone: OrderBlockZone, candles: CandleSeries): void {
    const { maxAge } = this.config;
    const lastScan = Math.min(zone.originIndex + maxAge, candles.length - 1);

    for (let j = zone.originIndex + 1; j <= lastScan; j++) {
      const close = candles[j].close;
      const broken = zone.direction === 'bullish' ? close < zone.band.low : close > zone.band.high;
      if (broken) {
        zone.validUntilIndex = j;
        zone.endReason = 'invalidated';
        return;
      }
    }

    const expiry = zone.originIndex + maxAge + 1;
    if (expiry < candles.length) {
      zone.validUntilIndex = expiry;
      zone.endReason = 'expired';
    } else {
      zone.validUntilIndex = null;
      zone.endReason = null;
    }
  }
}

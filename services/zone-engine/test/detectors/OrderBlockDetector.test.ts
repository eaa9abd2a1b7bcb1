/**
 * OrderBlockDetector Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { Candle } from '@confluence/shared-types';
import { OrderBlockDetector } from '../../src/detectors/OrderBlockDetector';
import { isZoneActiveAt } from '../../src/detectors/zoneUtils';
import { buildCandle, consolidationThenImpulse, flatSeries, risingCandle } from '../helpers/candles';

function mirror(candles: Candle[]): Candle[] {
  return candles.map(c => ({
    ...c,
    open: 200 - c.open,
    high: 200 - c.low,
    low: 200 - c.high,
    close: 200 - c.close,
  }));
}

function withBreakdownAt(index: number): Candle[] {
  const candles = consolidationThenImpulse();
  candles[index] = buildCandle(index, 100, 100, 98.5, 99);
  return candles;
}

/**
 * 75 candles: a steady climb, a 25-candle consolidation that drifts up 0.15 per candle
 * (indices 20-44), then a climb away from it
 */
function driftingConsolidation(): Candle[] {
  const candles: Candle[] = [];
  for (let k = 0; k < 75; k++) {
    if (k < 20) {
      const low = 58 + 2 * k;
      candles.push(risingCandle(k, low, low + 2));
    } else if (k < 45) {
      const low = 100 + 0.15 * (k - 20);
      candles.push(buildCandle(k, low + 0.1, low + 0.2, low, low + 0.1));
    } else {
      const low = 104 + 2 * (k - 45);
      candles.push(risingCandle(k, low, low + 2));
    }
  }
  return candles;
}

describe('OrderBlockDetector', () => {
  let detector: OrderBlockDetector;

  beforeEach(() => {
    detector = new OrderBlockDetector();
  });

  describe('detect', () => {
    it('finds exactly one bullish zone for a flat consolidation followed by an impulse', () => {
      const zones = detector.detect(consolidationThenImpulse());

      expect(zones).toHaveLength(1);
      const zone = zones[0];
      expect(zone.kind).toBe('order_block');
      expect(zone.direction).toBe('bullish');
      expect(zone.band).toEqual({ low: 99.8, high: 100.2 });
      expect(zone.consolidationStartIndex).toBe(20);
      expect(zone.consolidationEndIndex).toBe(24);
      expect(zone.originIndex).toBe(24);
      expect(zone.validFromIndex).toBe(24);
      expect(zone.strength).toBe(3);
    });

    it('splits a drifting consolidation instead of merging past the range limit', () => {
      const candles = driftingConsolidation();
      const meanRange = candles.reduce((sum, c) => sum + (c.high - c.low), 0) / candles.length;
      const limit = 1.5 * meanRange;

      const zones = detector.detect(candles);

      expect(zones.length).toBeGreaterThanOrEqual(2);
      for (const zone of zones) {
        expect(zone.direction).toBe('bullish');
        expect(zone.band.high - zone.band.low).toBeLessThanOrEqual(limit + 1e-9);
      }
    });

    it('expires a zone maxAge candles after its origin', () => {
      const [zone] = detector.detect(consolidationThenImpulse());

      expect(zone.validUntilIndex).toBe(75);
      expect(zone.endReason).toBe('expired');
      expect(isZoneActiveAt(zone, 74)).toBe(true);
      expect(isZoneActiveAt(zone, 75)).toBe(false);
    });

    it('finds the mirrored bearish zone on a falling series', () => {
      const zones = detector.detect(mirror(consolidationThenImpulse()));

      expect(zones).toHaveLength(1);
      expect(zones[0].direction).toBe('bearish');
      expect(zones[0].band.low).toBeCloseTo(99.8, 10);
      expect(zones[0].band.high).toBeCloseTo(100.2, 10);
      expect(zones[0].originIndex).toBe(24);
    });

    it('invalidates a bullish zone on the first close below its band', () => {
      const [zone] = detector.detect(withBreakdownAt(60));

      expect(zone.validUntilIndex).toBe(60);
      expect(zone.endReason).toBe('invalidated');
      expect(isZoneActiveAt(zone, 59)).toBe(true);
      expect(isZoneActiveAt(zone, 60)).toBe(false);
      expect(isZoneActiveAt(zone, 23)).toBe(false);
    });

    it('never reopens an invalidated zone when the series grows', () => {
      const full = withBreakdownAt(60);

      for (const length of [61, 80, 100]) {
        const zones = detector.detect(full.slice(0, length));
        expect(zones).toHaveLength(1);
        expect(zones[0].validUntilIndex).toBe(60);
        expect(zones[0].endReason).toBe('invalidated');
      }
    });

    it('leaves validUntilIndex open while the zone is still valid at the last candle', () => {
      const [zone] = detector.detect(consolidationThenImpulse().slice(0, 60));

      expect(zone.validUntilIndex).toBeNull();
      expect(zone.endReason).toBeNull();
    });

    it('emits nothing when the impulse threshold is not reached', () => {
      const strict = new OrderBlockDetector({ impulseThresholdPct: 50 });

      expect(strict.detect(consolidationThenImpulse())).toEqual([]);
    });

    it('returns an empty result for empty or short series', () => {
      expect(detector.detect([])).toEqual([]);
      expect(detector.detect(consolidationThenImpulse().slice(0, 24))).toEqual([]);
    });

    it('emits nothing for a flat series with no impulse', () => {
      expect(detector.detect(flatSeries(60, 100))).toEqual([]);
    });
  });
});

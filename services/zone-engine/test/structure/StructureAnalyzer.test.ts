/**
 * StructureAnalyzer Unit Tests
 *
 * Zigzag fixture with swingLookback = 1:
 * swing highs 12 (1), 11.5 (3), 10.5 (5); swing lows 8 (2), 7 (4), 6 (6)
 */

import { describe, it, expect } from '@jest/globals';
import { Candle } from '@confluence/shared-types';
import { StructureAnalyzer } from '../../src/structure/StructureAnalyzer';
import { consolidationThenImpulse, fromHlc } from '../helpers/candles';

function fallingZigzag(): Candle[] {
  return fromHlc([
    [10, 9, 9.5],
    [12, 10, 11],
    [11, 8, 8.5],
    [11.5, 9, 11],
    [10, 7, 7.5],
    [10.5, 8, 10],
    [9, 6, 6.5],
    [9.5, 7, 9],
  ]);
}

function mirror(candles: Candle[]): Candle[] {
  return candles.map(c => ({
    ...c,
    open: 200 - c.open,
    high: 200 - c.low,
    low: 200 - c.high,
    close: 200 - c.close,
  }));
}

describe('StructureAnalyzer', () => {
  const analyzer = new StructureAnalyzer({ swingLookback: 1 });

  describe('detectSwings', () => {
    it('finds alternating swing highs and lows with their confirmation index', () => {
      const swings = analyzer.detectSwings(fallingZigzag());

      expect(swings.map(s => [s.type, s.index, s.price, s.confirmedIndex])).toEqual([
        ['high', 1, 12, 2],
        ['low', 2, 8, 3],
        ['high', 3, 11.5, 4],
        ['low', 4, 7, 5],
        ['high', 5, 10.5, 6],
        ['low', 6, 6, 7],
      ]);
    });

    it('counts equal highs in the window as separate swings', () => {
      const swings = analyzer.detectSwings(
        fromHlc([
          [10, 9, 9.5],
          [12, 10, 11],
          [12, 10, 11],
          [10, 9, 9.5],
        ])
      );

      expect(swings.filter(s => s.type === 'high').map(s => s.index)).toEqual([1, 2]);
    });
  });

  describe('analyze', () => {
    it('returns one state per candle', () => {
      const states = analyzer.analyze(fallingZigzag());

      expect(states).toHaveLength(8);
      expect(states.map(s => s.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('only uses swings once they are confirmed', () => {
      const states = analyzer.analyze(fallingZigzag());

      expect(states[1].lastSwingHigh).toBeNull();
      expect(states[2].lastSwingHigh).toBe(12);
      expect(states[2].lastSwingLow).toBeNull();
      expect(states[3].lastSwingLow).toBe(8);
    });

    it('fires a bearish BOS on the close below the reference low and consumes it', () => {
      const states = analyzer.analyze(fallingZigzag());

      expect(states[3].bos).toBeNull();
      expect(states[4].bos).toEqual({ kind: 'BOS', direction: 'bearish', level: 8, swingIndex: 2 });
      expect(states[5].bos).toBeNull();
      expect(states[6].bos).toEqual({ kind: 'BOS', direction: 'bearish', level: 7, swingIndex: 4 });
      expect(states[7].bos).toBeNull();
    });

    it('holds a bearish ChoCH while the last two swing highs fall', () => {
      const states = analyzer.analyze(fallingZigzag());
      const lower = { kind: 'ChoCH', direction: 'bearish', level: 11.5, swingIndex: 3 };
      const lowerStill = { kind: 'ChoCH', direction: 'bearish', level: 10.5, swingIndex: 5 };

      expect(states[2].choch).toBeNull();
      expect(states[3].choch).toBeNull();
      expect(states[4].choch).toEqual(lower);
      expect(states[5].choch).toEqual(lower);
      expect(states[6].choch).toEqual(lowerStill);
      expect(states[7].choch).toEqual(lowerStill);
    });

    it('lets the bearish ChoCH win when highs fall and lows rise together', () => {
      // highs 14 (1), 13 (3); lows 6 (2), 7 (4)
      const states = analyzer.analyze(
        fromHlc([
          [10, 9, 9.5],
          [14, 10, 12],
          [12, 6, 7],
          [13, 8, 12],
          [11, 7, 8],
          [12, 9, 11],
        ])
      );

      expect(states[3].choch).toBeNull();
      expect(states[4].choch).toEqual({ kind: 'ChoCH', direction: 'bearish', level: 13, swingIndex: 3 });
      expect(states[5].choch).toEqual({ kind: 'ChoCH', direction: 'bearish', level: 13, swingIndex: 3 });
    });

    it('classifies the trend from the last two swing highs and lows', () => {
      const states = analyzer.analyze(fallingZigzag());

      expect(states[4].trend).toBe('range');
      expect(states[5].trend).toBe('bearish');
      expect(states[7].trend).toBe('bearish');
    });

    it('forward-fills liquidity levels offset from the last swings', () => {
      const states = analyzer.analyze(fallingZigzag());

      expect(states[0].liquidityHigh).toBeNull();
      expect(states[7].liquidityHigh).toBeCloseTo(10.5105, 10);
      expect(states[7].liquidityLow).toBeCloseTo(5.994, 10);
    });

    it('mirrors into bullish BOS, ChoCH and trend', () => {
      const states = analyzer.analyze(mirror(fallingZigzag()));

      expect(states[4].bos).toEqual({ kind: 'BOS', direction: 'bullish', level: 192, swingIndex: 2 });
      expect(states[4].choch).toEqual({ kind: 'ChoCH', direction: 'bullish', level: 188.5, swingIndex: 3 });
      expect(states[7].trend).toBe('bullish');
    });

    it('reports a range with no swings for fewer than 2L+1 candles', () => {
      const defaultAnalyzer = new StructureAnalyzer();
      const candles = consolidationThenImpulse().slice(0, 10);

      expect(defaultAnalyzer.detectSwings(candles)).toEqual([]);
      const states = defaultAnalyzer.analyze(candles);
      expect(states).toHaveLength(10);
      expect(states.every(s => s.trend === 'range' && s.bos === null && s.choch === null)).toBe(true);
    });
  });

  describe('summarize', () => {
    it('returns the latest state or null', () => {
      const states = analyzer.analyze(fallingZigzag());

      expect(analyzer.summarize(states)).toBe(states[7]);
      expect(analyzer.summarize([])).toBeNull();
    });
  });
});

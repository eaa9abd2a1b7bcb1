/**
 * StructureAnalyzer - Causal market structure per candle
 *
 * Walks the series once, admitting each swing only at its confirmation index, and reports
 * trend, break of structure (BOS), change of character (ChoCH) and liquidity levels.
 *
 * BOS: close beyond the reference swing (the most recent confirmed, not yet broken swing).
 * A broken reference is consumed; the next confirmed swing of that side replaces it.
 * ChoCH: on every candle where the last two confirmed swing lows rise (bullish) or the last
 * two confirmed swing highs fall (bearish), independent of BOS.
 */

import {
  CandleSeries,
  StructureBreak,
  StructureState,
  SwingPoint,
  TrendBias,
} from '@confluence/shared-types';
import { DEFAULT_STRUCTURE_CONFIG, StructureConfig } from '@confluence/shared-config';
import { Logger } from '@confluence/shared-utils';
import { SwingService } from './SwingService';

const logger = new Logger('StructureAnalyzer');

export class StructureAnalyzer {
  private config: StructureConfig;
  private swingService: SwingService;

  constructor(config: Partial<StructureConfig> = {}) {
    this.config = {
      swingLookback: config.swingLookback ?? DEFAULT_STRUCTURE_CONFIG.swingLookback,
      liquidityBufferPct: config.liquidityBufferPct ?? DEFAULT_STRUCTURE_CONFIG.liquidityBufferPct,
    };
    this.swingService = new SwingService(this.config.swingLookback);
  }

  detectSwings(candles: CandleSeries): SwingPoint[] {
    return this.swingService.detectSwings(candles);
  }

  /**
   * One StructureState per candle
   */
  analyze(candles: CandleSeries): StructureState[] {
    const swings = this.detectSwings(candles);
    const states: StructureState[] = [];
    const buffer = this.config.liquidityBufferPct / 100;

    let next = 0;
    let lastHigh: SwingPoint | null = null;
    let prevHigh: SwingPoint | null = null;
    let lastLow: SwingPoint | null = null;
    let prevLow: SwingPoint | null = null;
    let referenceHigh: SwingPoint | null = null;
    let referenceLow: SwingPoint | null = null;

    for (let t = 0; t < candles.length; t++) {
      while (next < swings.length && swings[next].confirmedIndex <= t) {
        const swing = swings[next++];
        if (swing.type === 'high') {
          prevHigh = lastHigh;
          lastHigh = swing;
          referenceHigh = swing;
        } else {
          prevLow = lastLow;
          lastLow = swing;
          referenceLow = swing;
        }
      }

      const close = candles[t].close;
      // Both references cannot break together: a surviving reference high is never below a
      // surviving reference low
      let bos: StructureBreak | null = null;
      if (referenceHigh && close > referenceHigh.price) {
        bos = { kind: 'BOS', direction: 'bullish', level: referenceHigh.price, swingIndex: referenceHigh.index };
        referenceHigh = null;
      } else if (referenceLow && close < referenceLow.price) {
        bos = { kind: 'BOS', direction: 'bearish', level: referenceLow.price, swingIndex: referenceLow.index };
        referenceLow = null;
      }

      states.push({
        index: t,
        trend: this.classifyTrend(lastHigh, prevHigh, lastLow, prevLow),
        lastSwingHigh: lastHigh ? lastHigh.price : null,
        lastSwingLow: lastLow ? lastLow.price : null,
        bos,
        choch: this.changeOfCharacter(lastHigh, prevHigh, lastLow, prevLow),
        liquidityHigh: lastHigh ? lastHigh.price * (1 + buffer) : null,
        liquidityLow: lastLow ? lastLow.price * (1 - buffer) : null,
      });
    }

    logger.debug(`Analyzed ${candles.length} candles, ${swings.length} swings`);
    return states;
  }

  /**
   * Latest state, or null for an empty series
   */
  summarize(states: readonly StructureState[]): StructureState | null {
    return states.length > 0 ? states[states.length - 1] : null;
  }

  /**
   * Holds while the last two confirmed lows rise (bullish) or the last two highs fall
   * (bearish); bearish wins when both hold
   */
  private changeOfCharacter(
    lastHigh: SwingPoint | null,
    prevHigh: SwingPoint | null,
    lastLow: SwingPoint | null,
    prevLow: SwingPoint | null
  ): StructureBreak | null {
    if (lastHigh && prevHigh && lastHigh.price < prevHigh.price) {
      return { kind: 'ChoCH', direction: 'bearish', level: lastHigh.price, swingIndex: lastHigh.index };
    }
    if (lastLow && prevLow && lastLow.price > prevLow.price) {
      return { kind: 'ChoCH', direction: 'bullish', level: lastLow.price, swingIndex: lastLow.index };
    }
    return null;
  }

  private classifyTrend(
    lastHigh: SwingPoint | null,
    prevHigh: SwingPoint | null,
    lastLow: SwingPoint | null,
    prevLow: SwingPoint | null
  ): TrendBias {
    if (!lastHigh || !prevHigh || !lastLow || !prevLow) {
      return 'range';
    }
    if (lastHigh.price > prevHigh.price && lastLow.price > prevLow.price) {
      return 'bullish';
    }
    if (lastHigh.price < prevHigh.price && lastLow.price < prevLow.price) {
      return 'bearish';
    }
    return 'range';
  }
}

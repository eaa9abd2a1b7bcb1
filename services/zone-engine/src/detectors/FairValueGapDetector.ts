/**
 * FairValueGapDetector - Three-candle price imbalances
 *
 * Bullish gap: candle i-2 high below candle i low, band [high[i-2], low[i]].
 * Bearish gap: candle i-2 low above candle i high, band [high[i], low[i-2]].
 * A gap is filled by the first later close inside the band, or expires after maxAgeBars.
 */

import { CandleSeries, FairValueGapZone, PriceBand, ZoneDirection } from '@confluence/shared-types';
import { DEFAULT_FAIR_VALUE_GAP_CONFIG, FairValueGapConfig } from '@confluence/shared-config';
import { Logger } from '@confluence/shared-utils';
import { isPriceInBand } from './zoneUtils';

const logger = new Logger('FairValueGapDetector');

const STRONG_STRENGTH = 1.0;
const WEAK_STRENGTH = 0.5;

export class FairValueGapDetector {
  private config: FairValueGapConfig;

  constructor(config: Partial<FairValueGapConfig> = {}) {
    const d = DEFAULT_FAIR_VALUE_GAP_CONFIG;
    this.config = {
      minSizePct: config.minSizePct ?? d.minSizePct,
      strongThresholdPct: config.strongThresholdPct ?? d.strongThresholdPct,
      maxAgeBars: config.maxAgeBars ?? d.maxAgeBars,
    };
  }

  /**
   * Detect gaps, ordered by origin index
   */
  detect(candles: CandleSeries): FairValueGapZone[] {
    if (candles.length < 3) return [];

    const { minSizePct, strongThresholdPct } = this.config;
    const gaps: FairValueGapZone[] = [];

    for (let i = 2; i < candles.length; i++) {
      const first = candles[i - 2];
      const third = candles[i];

      let direction: ZoneDirection;
      let band: PriceBand;
      if (first.high < third.low) {
        direction = 'bullish';
        band = { low: first.high, high: third.low };
      } else if (first.low > third.high) {
        direction = 'bearish';
        band = { low: third.high, high: first.low };
      } else {
        continue;
      }

      if (band.low <= 0) continue;
      const sizePct = ((band.high - band.low) / band.low) * 100;
      if (sizePct < minSizePct) continue;

      const strong = sizePct >= strongThresholdPct;
      const gap: FairValueGapZone = {
        kind: 'fair_value_gap',
        direction,
        band,
        originIndex: i,
        validFromIndex: i,
        validUntilIndex: null,
        endReason: null,
        strength: strong ? STRONG_STRENGTH : WEAK_STRENGTH,
        timestamp: third.timestamp,
        grade: strong ? 'strong' : 'weak',
        sizePct,
      };
      this.resolveValidity(gap, candles);
      gaps.push(gap);
    }

    logger.debug(`Detected ${gaps.length} fair value gaps over ${candles.length} candles`);
    return gaps;
  }

  private resolveValidity(gap: FairValueGapZone, candles: CandleSeries): void {
    const { maxAgeBars } = this.config;
    const lastScan = Math.min(gap.originIndex + maxAgeBars, candles.length - 1);

    for (let j = gap.originIndex + 1; j <= lastScan; j++) {
      if (isPriceInBand(candles[j].close, gap.band)) {
        gap.validUntilIndex = j;
        gap.endReason = 'filled';
        return;
      }
    }

    const expiry = gap.originIndex + maxAgeBars + 1;
    if (expiry < candles.length) {
      gap.validUntilIndex = expiry;
      gap.endReason = 'expired';
    }
  }
}

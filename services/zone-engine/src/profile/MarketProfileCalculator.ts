/**
 * MarketProfileCalculator - Time/volume profile with TPO summary
 *
 * Same binning as the volume profile, plus:
 * - market state: trending when the last close sits outside the value area
 * - single prints: bins touched by exactly one candle
 * - poor high / poor low: single prints at the extremes of the range
 * - initial balance: high/low of the first ibPeriods candles
 */

import { CandleSeries, MarketProfile, MarketState, Profile, TpoSummary } from '@confluence/shared-types';
import { DEFAULT_MARKET_PROFILE_CONFIG, MarketProfileConfig } from '@confluence/shared-config';
import { buildProfile, priceRange } from './ProfileBinning';

// Single prints in the top/bottom fifth of the bins are poor extremes
const POOR_EXTREME_FRACTION = 0.2;

export class MarketProfileCalculator {
  private config: MarketProfileConfig;

  constructor(config: Partial<MarketProfileConfig> = {}) {
    const d = DEFAULT_MARKET_PROFILE_CONFIG;
    this.config = {
      bins: Math.max(1, config.bins ?? d.bins),
      valueAreaPercent: config.valueAreaPercent ?? d.valueAreaPercent,
      period: config.period ?? d.period,
      ibPeriods: config.ibPeriods ?? d.ibPeriods,
    };
  }

  getConfig(): Readonly<MarketProfileConfig> {
    return this.config;
  }

  compute(candles: CandleSeries): MarketProfile {
    const initialBalance = this.initialBalance(candles);
    const { profile, touches } = buildProfile(candles, this.config.bins, this.config.valueAreaPercent);

    // A flat window is its own poor high and low
    const flatPrice = profile.profileLow !== null && profile.profileLow === profile.profileHigh
      ? profile.profileLow
      : null;
    const tpo: TpoSummary = flatPrice !== null
      ? { singlePrints: [], poorHigh: flatPrice, poorLow: flatPrice, initialBalance }
      : this.summarizeTpo(touches, profile.bins.map(b => b.center), initialBalance);

    const lastClose = candles.length > 0 ? candles[candles.length - 1].close : null;
    return { ...profile, marketState: this.classifyState(lastClose, profile), tpo };
  }

  /**
   * Profile at every index i >= period over candles[i - period .. i]; null before that
   */
  computeRolling(candles: CandleSeries, period: number = this.config.period): Array<MarketProfile | null> {
    const out: Array<MarketProfile | null> = [];
    for (let i = 0; i < candles.length; i++) {
      out.push(i >= period ? this.compute(candles.slice(i - period, i + 1)) : null);
    }
    return out;
  }

  /**
   * Whether a price lies inside the initial balance, widened by tolerancePct percent
   */
  isPriceInInitialBalance(price: number, profile: MarketProfile, tolerancePct: number = 0): boolean {
    const ib = profile.tpo.initialBalance;
    if (!ib) return false;
    const low = ib.low * (1 - tolerancePct / 100);
    const high = ib.high * (1 + tolerancePct / 100);
    return price >= low && price <= high;
  }

  private classifyState(lastClose: number | null, profile: Profile): MarketState {
    if (lastClose === null || profile.val === null || profile.vah === null) {
      return 'balanced';
    }
    return lastClose < profile.val || lastClose > profile.vah ? 'trending' : 'balanced';
  }

  private initialBalance(candles: CandleSeries): TpoSummary['initialBalance'] {
    const count = Math.min(candles.length, this.config.ibPeriods);
    if (count <= 0) return null;
    const { min, max } = priceRange(candles.slice(0, count));
    return { high: max, low: min };
  }

  private summarizeTpo(
    touches: readonly number[],
    centers: readonly number[],
    initialBalance: TpoSummary['initialBalance']
  ): TpoSummary {
    const singleBins: number[] = [];
    touches.forEach((count, k) => {
      if (count === 1) singleBins.push(k);
    });

    const binCount = touches.length;
    let poorHigh: number | null = null;
    let poorLow: number | null = null;
    if (singleBins.length > 0) {
      const highest = singleBins[singleBins.length - 1];
      const lowest = singleBins[0];
      if (highest >= binCount * (1 - POOR_EXTREME_FRACTION)) poorHigh = centers[highest];
      if (lowest <= binCount * POOR_EXTREME_FRACTION) poorLow = centers[lowest];
    }

    return {
      singlePrints: singleBins.map(k => centers[k]),
      poorHigh,
      poorLow,
      initialBalance,
    };
  }
}

/**
 * Price binning shared by the volume and market profiles
 *
 * Bin k spans [min + k*w, min + (k+1)*w] with w = (max - min) / bins. A candle touches the
 * bins its [low, high] range overlaps; its volume is split evenly across them.
 */

import { CandleSeries, Profile, ProfileBin } from '@confluence/shared-types';

// Guards bin-edge comparisons against floating point drift
const EDGE_EPSILON = 1e-9;

export interface BinnedProfile {
  min: number;
  max: number;
  width: number;
  bins: ProfileBin[];
  touches: number[]; // candles touching each bin
}

export function priceRange(candles: CandleSeries): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const candle of candles) {
    min = Math.min(min, candle.low);
    max = Math.max(max, candle.high);
  }
  return { min, max };
}

export function totalVolume(candles: CandleSeries): number {
  let total = 0;
  for (const candle of candles) total += candle.volume;
  return total;
}

/**
 * Inclusive bin index range touched by [low, high]; assumes max > min
 */
export function touchedBins(
  low: number,
  high: number,
  min: number,
  width: number,
  binCount: number
): [number, number] {
  const clamp = (k: number) => Math.max(0, Math.min(binCount - 1, k));
  const first = clamp(Math.floor((low - min) / width + EDGE_EPSILON));
  let last = clamp(Math.ceil((high - min) / width - EDGE_EPSILON) - 1);
  if (last < first) last = first;
  return [first, last];
}

/**
 * Bin a non-degenerate window (max > min)
 */
export function binCandles(candles: CandleSeries, binCount: number): BinnedProfile {
  const { min, max } = priceRange(candles);
  const width = (max - min) / binCount;

  const bins: ProfileBin[] = [];
  for (let k = 0; k < binCount; k++) {
    bins.push({
      index: k,
      low: min + k * width,
      high: min + (k + 1) * width,
      center: min + (k + 0.5) * width,
      volume: 0,
    });
  }
  const touches = new Array<number>(binCount).fill(0);

  for (const candle of candles) {
    const [first, last] = touchedBins(candle.low, candle.high, min, width, binCount);
    const share = candle.volume / (last - first + 1);
    for (let k = first; k <= last; k++) {
      bins[k].volume += share;
      touches[k] += 1;
    }
  }

  return { min, max, width, bins, touches };
}

/**
 * Index of the highest-volume bin; ties resolve to the lowest index
 */
export function pocIndex(bins: readonly ProfileBin[]): number {
  let best = 0;
  for (let k = 1; k < bins.length; k++) {
    if (bins[k].volume > bins[best].volume) best = k;
  }
  return best;
}

/**
 * Grow outward from the POC until the covered volume reaches the target fraction.
 * The larger neighbour is taken first; ties go to the lower side.
 */
export function valueAreaRange(
  bins: readonly ProfileBin[],
  poc: number,
  fraction: number
): [number, number] {
  const total = bins.reduce((sum, bin) => sum + bin.volume, 0);
  const target = total * fraction;
  const lastIndex = bins.length - 1;

  let lo = poc;
  let hi = poc;
  let covered = bins[poc].volume;

  while (covered < target && (lo > 0 || hi < lastIndex)) {
    const lower = lo > 0 ? bins[lo - 1].volume : -1;
    const upper = hi < lastIndex ? bins[hi + 1].volume : -1;
    if (lower >= upper) {
      lo -= 1;
      covered += lower;
    } else {
      hi += 1;
      covered += upper;
    }
  }

  return [lo, hi];
}

export function emptyProfile(): Profile {
  return {
    status: 'insufficient_data',
    poc: null,
    val: null,
    vah: null,
    bins: [],
    totalVolume: 0,
    hvn: [],
    lvn: [],
    profileHigh: null,
    profileLow: null,
  };
}

/**
 * Volume node thresholds as multiples of the mean bin volume
 */
export interface NodeThresholds {
  hvnMultiplier: number;
  lvnMultiplier: number;
}

export interface ProfileBuild {
  profile: Profile;
  touches: number[];
}

/**
 * Bin a window and derive POC and value area.
 *
 * Zero total volume has no value area, flat or not. A flat window that traded
 * collapses onto its single price.
 */
export function buildProfile(
  candles: CandleSeries,
  binCount: number,
  valueAreaPercent: number,
  nodes: NodeThresholds | null = null
): ProfileBuild {
  if (candles.length === 0) {
    return { profile: emptyProfile(), touches: [] };
  }

  const { min, max } = priceRange(candles);
  const volume = totalVolume(candles);
  const flat = max === min;

  const binned = flat
    ? {
        bins: [{ index: 0, low: min, high: min, center: min, volume }],
        touches: [candles.length],
      }
    : binCandles(candles, binCount);
  const { bins, touches } = binned;

  const base = { bins, hvn: [], lvn: [], profileHigh: max, profileLow: min };

  if (volume <= 0) {
    return {
      profile: { ...base, status: 'no_value_area', poc: null, val: null, vah: null, totalVolume: 0 },
      touches,
    };
  }

  if (flat) {
    return {
      profile: { ...base, status: 'degenerate_range', poc: min, val: min, vah: min, totalVolume: volume },
      touches,
    };
  }

  const poc = pocIndex(bins);
  const [lo, hi] = valueAreaRange(bins, poc, valueAreaPercent);

  let hvn: number[] = [];
  let lvn: number[] = [];
  if (nodes) {
    const mean = volume / bins.length;
    hvn = bins.filter(b => b.volume >= nodes.hvnMultiplier * mean).map(b => b.center);
    lvn = bins.filter(b => b.volume > 0 && b.volume <= nodes.lvnMultiplier * mean).map(b => b.center);
  }

  return {
    profile: {
      ...base,
      status: 'ok',
      poc: bins[poc].center,
      val: bins[lo].center,
      vah: bins[hi].center,
      totalVolume: volume,
      hvn,
      lvn,
    },
    touches,
  };
}

/**
 * Helpers shared by the zone detectors
 */

import { CandleSeries, PriceBand, Zone } from '@confluence/shared-types';

/**
 * A zone is active at index t when validFromIndex <= t < validUntilIndex (open-ended when null).
 */
export function isZoneActiveAt(zone: Zone, index: number): boolean {
  if (index < zone.validFromIndex) return false;
  return zone.validUntilIndex === null || index < zone.validUntilIndex;
}

export function activeZonesAt<T extends Zone>(zones: readonly T[], index: number): T[] {
  return zones.filter(zone => isZoneActiveAt(zone, index));
}

export function isPriceInBand(price: number, band: PriceBand): boolean {
  return price >= band.low && price <= band.high;
}

/**
 * First zone whose band contains the price, or null
 */
export function findZoneContaining<T extends Zone>(price: number, zones: readonly T[]): T | null {
  return zones.find(zone => isPriceInBand(price, zone.band)) ?? null;
}

export function bandMidpoint(band: PriceBand): number {
  return (band.low + band.high) / 2;
}

export function averageRange(candles: CandleSeries): number {
  if (candles.length === 0) return 0;
  let sum = 0;
  for (const candle of candles) {
    sum += candle.high - candle.low;
  }
  return sum / candles.length;
}

/**
 * Extreme of values over the forward window (i, i + window] for every i, in one pass.
 * NaN where the window is empty (the last index).
 */
export function forwardWindowExtreme(
  values: readonly number[],
  window: number,
  mode: 'max' | 'min'
): number[] {
  const n = values.length;
  const out = new Array<number>(n).fill(NaN);
  if (window < 1) return out;
  const dominates = mode === 'max'
    ? (a: number, b: number) => a >= b
    : (a: number, b: number) => a <= b;

  // Monotonic deque of indices; deque[head] holds the current extreme
  const deque: number[] = [];
  let head = 0;

  for (let i = n - 2; i >= 0; i--) {
    const incoming = i + 1;
    while (deque.length > head && dominates(values[incoming], values[deque[deque.length - 1]])) {
      deque.pop();
    }
    deque.push(incoming);
    while (deque[head] > i + window) {
      head++;
    }
    out[i] = values[deque[head]];
  }

  return out;
}

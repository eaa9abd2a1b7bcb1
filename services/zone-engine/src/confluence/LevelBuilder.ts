/**
 * LevelBuilder - Turn detector and profile output into weighted levels for clustering
 *
 * Zones contribute their midpoint and band scaled by detector strength; profile and
 * structure levels are single-price bands. Absent ("no value") fields are skipped.
 */

import {
  FairValueGapZone,
  MarketProfile,
  OrderBlockZone,
  PriceBand,
  Profile,
  SignalTag,
  StructureState,
  WeightedLevel,
} from '@confluence/shared-types';
import { bandMidpoint } from '../detectors/zoneUtils';

export const LEVEL_WEIGHTS: Readonly<Record<SignalTag, number>> = {
  order_block: 1.0,
  fair_value_gap: 1.0,
  vp_poc: 2.0,
  vp_vah: 1.0,
  vp_val: 1.0,
  vp_hvn: 1.5,
  mp_poc: 2.0,
  mp_vah: 1.0,
  mp_val: 1.0,
  liquidity_high: 1.0,
  liquidity_low: 1.0,
};

export interface LevelSources {
  orderBlocks?: readonly OrderBlockZone[];
  fairValueGaps?: readonly FairValueGapZone[];
  volumeProfile?: Profile | null;
  marketProfile?: MarketProfile | null;
  structure?: StructureState | null;
}

function pointLevel(price: number, tag: SignalTag): WeightedLevel {
  const band: PriceBand = { low: price, high: price };
  return { price, band, tag, strength: LEVEL_WEIGHTS[tag] };
}

function pushPoint(levels: WeightedLevel[], price: number | null, tag: SignalTag): void {
  if (price !== null && Number.isFinite(price)) {
    levels.push(pointLevel(price, tag));
  }
}

export function buildWeightedLevels(sources: LevelSources): WeightedLevel[] {
  const levels: WeightedLevel[] = [];

  for (const zone of sources.orderBlocks ?? []) {
    levels.push({
      price: bandMidpoint(zone.band),
      band: { ...zone.band },
      tag: 'order_block',
      strength: LEVEL_WEIGHTS.order_block * zone.strength,
    });
  }

  for (const gap of sources.fairValueGaps ?? []) {
    levels.push({
      price: bandMidpoint(gap.band),
      band: { ...gap.band },
      tag: 'fair_value_gap',
      strength: LEVEL_WEIGHTS.fair_value_gap * gap.strength,
    });
  }

  const vp = sources.volumeProfile;
  if (vp) {
    pushPoint(levels, vp.poc, 'vp_poc');
    pushPoint(levels, vp.vah, 'vp_vah');
    pushPoint(levels, vp.val, 'vp_val');
    for (const node of vp.hvn) pushPoint(levels, node, 'vp_hvn');
  }

  const mp = sources.marketProfile;
  if (mp) {
    pushPoint(levels, mp.poc, 'mp_poc');
    pushPoint(levels, mp.vah, 'mp_vah');
    pushPoint(levels, mp.val, 'mp_val');
  }

  const structure = sources.structure;
  if (structure) {
    pushPoint(levels, structure.liquidityHigh, 'liquidity_high');
    pushPoint(levels, structure.liquidityLow, 'liquidity_low');
  }

  return levels;
}

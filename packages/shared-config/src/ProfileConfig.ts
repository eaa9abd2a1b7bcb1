/**
 * Profile Configuration
 *
 * Volume profile and market profile (TPO) settings
 */

import { envInt, envNumber } from './env';

export interface VolumeProfileConfig {
  bins: number;
  valueAreaPercent: number; // fraction of volume inside the value area
  hvnMultiplier: number;
  lvnMultiplier: number;
  /**
   * Trailing window used by the pipeline
   * Default: 100 candles
   */
  period: number;
}

export const DEFAULT_VOLUME_PROFILE_CONFIG: VolumeProfileConfig = {
  bins: 70,
  valueAreaPercent: 0.7,
  hvnMultiplier: 1.5,
  lvnMultiplier: 0.5,
  period: 100,
};

export interface MarketProfileConfig {
  bins: number;
  valueAreaPercent: number;
  period: number;
  ibPeriods: number; // candles forming the initial balance
}

export const DEFAULT_MARKET_PROFILE_CONFIG: MarketProfileConfig = {
  bins: 30,
  valueAreaPercent: 0.7,
  period: 24,
  ibPeriods: 4,
};

export function getVolumeProfileConfig(): VolumeProfileConfig {
  const d = DEFAULT_VOLUME_PROFILE_CONFIG;
  return {
    bins: envInt('VP_BINS', d.bins),
    valueAreaPercent: envNumber('VP_VALUE_AREA_PERCENT', d.valueAreaPercent),
    hvnMultiplier: envNumber('VP_HVN_MULTIPLIER', d.hvnMultiplier),
    lvnMultiplier: envNumber('VP_LVN_MULTIPLIER', d.lvnMultiplier),
    period: envInt('VP_PERIOD', d.period),
  };
}

export function getMarketProfileConfig(): MarketProfileConfig {
  const d = DEFAULT_MARKET_PROFILE_CONFIG;
  return {
    bins: envInt('MP_BINS', d.bins),
    valueAreaPercent: envNumber('MP_VALUE_AREA_PERCENT', d.valueAreaPercent),
    period: envInt('MP_PERIOD', d.period),
    ibPeriods: envInt('MP_IB_PERIODS', d.ibPeriods),
  };
}

/**
 * VolumeProfileCalculator - Volume at price over a window
 *
 * POC, value area (VAL/VAH), high and low volume nodes.
 */

import { CandleSeries, Profile } from '@confluence/shared-types';
import { DEFAULT_VOLUME_PROFILE_CONFIG, VolumeProfileConfig } from '@confluence/shared-config';
import { Logger } from '@confluence/shared-utils';
import { buildProfile } from './ProfileBinning';

const logger = new Logger('VolumeProfileCalculator');

export class VolumeProfileCalculator {
  private config: VolumeProfileConfig;

  constructor(config: Partial<VolumeProfileConfig> = {}) {
    const d = DEFAULT_VOLUME_PROFILE_CONFIG;
    this.config = {
      bins: Math.max(1, config.bins ?? d.bins),
      valueAreaPercent: config.valueAreaPercent ?? d.valueAreaPercent,
      hvnMultiplier: config.hvnMultiplier ?? d.hvnMultiplier,
      lvnMultiplier: config.lvnMultiplier ?? d.lvnMultiplier,
      period: config.period ?? d.period,
    };
  }

  getConfig(): Readonly<VolumeProfileConfig> {
    return this.config;
  }

  compute(candles: CandleSeries): Profile {
    const { bins, valueAreaPercent, hvnMultiplier, lvnMultiplier } = this.config;
    return buildProfile(candles, bins, valueAreaPercent, { hvnMultiplier, lvnMultiplier }).profile;
  }

  /**
   * Profile at every index i >= period over candles[i - period .. i]; null before that
   */
  computeRolling(candles: CandleSeries, period: number = this.config.period): Array<Profile | null> {
    const out: Array<Profile | null> = [];
    for (let i = 0; i < candles.length; i++) {
      out.push(i >= period ? this.compute(candles.slice(i - period, i + 1)) : null);
    }
    logger.debug(`Computed rolling volume profile over ${candles.length} candles (period ${period})`);
    return out;
  }
}

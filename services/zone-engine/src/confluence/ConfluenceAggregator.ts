/**
 * ConfluenceAggregator - Cluster weighted levels into confluence zones
 *
 * Levels are sorted by price and grouped in one pass: a level joins the open cluster while
 * it is within tolerancePct of the previous level added (chained tolerance, so a cluster may
 * span more than tolerancePct overall). Clusters with fewer distinct signal tags than
 * minSignals are dropped; the rest are sorted by strength.
 */

import { ConfluenceZone, PriceBand, SignalTag, WeightedLevel } from '@confluence/shared-types';
import { ConfluenceConfig, DEFAULT_CONFLUENCE_CONFIG } from '@confluence/shared-config';
import { Logger } from '@confluence/shared-utils';

const logger = new Logger('ConfluenceAggregator');

const DEFAULT_ZONE_TOLERANCE_PCT = 0.2;

/**
 * Total order on levels so that permuted input clusters identically
 */
function compareLevels(a: WeightedLevel, b: WeightedLevel): number {
  return (
    a.price - b.price ||
    a.tag.localeCompare(b.tag) ||
    a.strength - b.strength ||
    a.band.low - b.band.low ||
    a.band.high - b.band.high
  );
}

export class ConfluenceAggregator {
  private config: ConfluenceConfig;

  constructor(config: Partial<ConfluenceConfig> = {}) {
    this.config = {
      tolerancePct: config.tolerancePct ?? DEFAULT_CONFLUENCE_CONFIG.tolerancePct,
      minSignals: config.minSignals ?? DEFAULT_CONFLUENCE_CONFIG.minSignals,
    };
  }

  getConfig(): Readonly<ConfluenceConfig> {
    return this.config;
  }

  findZones(levels: readonly WeightedLevel[], minSignals: number = this.config.minSignals): ConfluenceZone[] {
    if (levels.length === 0) return [];

    const sorted = [...levels].sort(compareLevels);
    const tolerance = this.config.tolerancePct / 100;

    const clusters: WeightedLevel[][] = [];
    let current: WeightedLevel[] = [sorted[0]];
    for (let i = 1; i < sorted.length; i++) {
      const previous = current[current.length - 1];
      if (Math.abs(sorted[i].price - previous.price) <= Math.abs(previous.price) * tolerance) {
        current.push(sorted[i]);
      } else {
        clusters.push(current);
        current = [sorted[i]];
      }
    }
    clusters.push(current);

    const zones = clusters
      .map(cluster => this.toZone(cluster))
      .filter(zone => zone.signalCount >= minSignals)
      .sort((a, b) => b.strength - a.strength || a.level - b.level);

    logger.debug(`Clustered ${levels.length} levels into ${clusters.length} clusters, kept ${zones.length}`);
    return zones;
  }

  /**
   * Whether price lies within the zone band widened by tolerancePct percent
   */
  isPriceInZone(price: number, zone: ConfluenceZone, tolerancePct: number = DEFAULT_ZONE_TOLERANCE_PCT): boolean {
    const low = zone.band.low * (1 - tolerancePct / 100);
    const high = zone.band.high * (1 + tolerancePct / 100);
    return price >= low && price <= high;
  }

  private toZone(cluster: readonly WeightedLevel[]): ConfluenceZone {
    let priceSum = 0;
    let strength = 0;
    const band: PriceBand = { low: Infinity, high: -Infinity };
    const tags = new Set<SignalTag>();

    for (const level of cluster) {
      priceSum += level.price;
      strength += level.strength;
      band.low = Math.min(band.low, level.band.low);
      band.high = Math.max(band.high, level.band.high);
      tags.add(level.tag);
    }

    const contributingSignals = [...tags].sort();
    return {
      level: priceSum / cluster.length,
      band,
      contributingSignals,
      strength,
      signalCount: contributingSignals.length,
    };
  }
}

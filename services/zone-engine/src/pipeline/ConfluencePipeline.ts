/**
 * ConfluencePipeline - One symbol, one candle window, one snapshot
 *
 * Runs every detector over the window, builds weighted levels from what is active at the
 * last candle, clusters them into confluence zones and plans a trade per zone.
 * Pure: no I/O, no state kept between runs.
 */

import {
  AccountState,
  CandleSeries,
  ConfluenceZone,
  EngineSnapshot,
  OpenPosition,
  PriceBand,
  SnapshotRecord,
  TradeDirection,
  TradePlan,
  TradeRejection,
  TrendBias,
} from '@confluence/shared-types';
import { Logger, formatTimestamp } from '@confluence/shared-utils';
import { EngineConfig } from '../config';
import { OrderBlockDetector } from '../detectors/OrderBlockDetector';
import { FairValueGapDetector } from '../detectors/FairValueGapDetector';
import { activeZonesAt } from '../detectors/zoneUtils';
import { StructureAnalyzer } from '../structure/StructureAnalyzer';
import { VolumeProfileCalculator } from '../profile/VolumeProfileCalculator';
import { MarketProfileCalculator } from '../profile/MarketProfileCalculator';
import { ConfluenceAggregator } from '../confluence/ConfluenceAggregator';
import { buildWeightedLevels } from '../confluence/LevelBuilder';
import { RiskManager } from '../risk/RiskManager';
import { latestAtr } from '../indicators/atr';

const logger = new Logger('ConfluencePipeline');

export class ConfluencePipeline {
  private orderBlocks: OrderBlockDetector;
  private fairValueGaps: FairValueGapDetector;
  private structure: StructureAnalyzer;
  private volumeProfile: VolumeProfileCalculator;
  private marketProfile: MarketProfileCalculator;
  private aggregator: ConfluenceAggregator;
  private riskManager: RiskManager;
  private perSymbolRiskOverrides: Record<string, number>;

  constructor(config: Partial<EngineConfig> = {}) {
    this.orderBlocks = new OrderBlockDetector(config.orderBlock);
    this.fairValueGaps = new FairValueGapDetector(config.fairValueGap);
    this.structure = new StructureAnalyzer(config.structure);
    this.volumeProfile = new VolumeProfileCalculator(config.volumeProfile);
    this.marketProfile = new MarketProfileCalculator(config.marketProfile);
    this.aggregator = new ConfluenceAggregator(config.confluence);
    this.riskManager = new RiskManager(config.risk);
    this.perSymbolRiskOverrides = config.perSymbolRiskOverrides ?? {};
  }

  /**
   * Snapshot at the last candle; null for an empty series
   */
  run(symbol: string, candles: CandleSeries, account: AccountState): EngineSnapshot | null {
    const n = candles.length;
    if (n === 0) {
      logger.warn(`[${symbol}] Empty candle series, nothing to analyze`);
      return null;
    }

    const last = n - 1;
    const lastCandle = candles[last];
    const close = lastCandle.close;

    const orderBlocks = activeZonesAt(this.orderBlocks.detect(candles), last);
    const fairValueGaps = activeZonesAt(this.fairValueGaps.detect(candles), last);
    const structure = this.structure.summarize(this.structure.analyze(candles));
    const trend: TrendBias = structure ? structure.trend : 'range';

    const vpPeriod = this.volumeProfile.getConfig().period;
    const mpPeriod = this.marketProfile.getConfig().period;
    const volumeProfile = this.volumeProfile.compute(candles.slice(Math.max(0, n - vpPeriod - 1)));
    const marketProfile = this.marketProfile.compute(candles.slice(Math.max(0, n - mpPeriod - 1)));

    const levels = buildWeightedLevels({ orderBlocks, fairValueGaps, volumeProfile, marketProfile, structure });
    const zones = this.aggregator.findZones(levels);
    const atr = latestAtr(candles, this.riskManager.getConfig().atrPeriod);

    const plans: TradePlan[] = [];
    const rejections: TradeRejection[] = [];
    const openPositions: OpenPosition[] = [...(account.openPositions ?? [])];
    const riskPct = this.perSymbolRiskOverrides[symbol.toUpperCase()];

    for (const zone of zones) {
      const direction = this.directionFor(zone, close, trend);
      const entry = this.aggregator.isPriceInZone(close, zone)
        ? close
        : direction === 'buy' ? zone.band.high : zone.band.low;

      const wantedDirection = direction === 'buy' ? 'bullish' : 'bearish';
      const protectiveZones: PriceBand[] = [
        zone.band,
        ...orderBlocks.filter(ob => ob.direction === wantedDirection).map(ob => ob.band),
      ];

      const result = this.riskManager.planTrade({
        symbol,
        direction,
        entry,
        zone,
        account: { ...account, openPositions },
        atr,
        protectiveZones,
        hvnLevels: volumeProfile.hvn,
        fvgZones: fairValueGaps.map(gap => gap.band),
        oppositeZone: this.opposingZone(zones, zone, direction),
        overrides: riskPct !== undefined ? { riskPct } : {},
      });

      if (result.ok) {
        plans.push(result.plan);
        openPositions.push({ symbol, riskAmount: result.plan.riskAmount });
      } else {
        rejections.push({ zoneLevel: zone.level, direction, error: result.error, reason: result.reason });
      }
    }

    logger.info(
      `[${symbol}] ${zones.length} confluence zones, ${plans.length} plans, ${rejections.length} rejected (trend ${trend})`
    );

    return {
      symbol,
      timestamp: lastCandle.timestamp,
      lastClose: close,
      trend,
      zones,
      plans,
      rejections,
    };
  }

  /**
   * Support below price is bought, resistance above is sold; a zone around price follows the trend
   */
  private directionFor(zone: ConfluenceZone, close: number, trend: TrendBias): TradeDirection {
    if (zone.band.high < close) return 'buy';
    if (zone.band.low > close) return 'sell';
    return trend === 'bearish' ? 'sell' : 'buy';
  }

  /**
   * Nearest other zone on the profit side of this one
   */
  private opposingZone(
    zones: readonly ConfluenceZone[],
    zone: ConfluenceZone,
    direction: TradeDirection
  ): PriceBand | null {
    const candidates = zones.filter(other =>
      other !== zone && (direction === 'buy' ? other.band.low > zone.band.high : other.band.high < zone.band.low)
    );
    if (candidates.length === 0) return null;
    const nearest = candidates.reduce((best, other) =>
      Math.abs(other.level - zone.level) < Math.abs(best.level - zone.level) ? other : best
    );
    return nearest.band;
  }
}

/**
 * Plain record for dashboards, reports and bots
 */
export function toSnapshotRecord(snapshot: EngineSnapshot): SnapshotRecord {
  return {
    symbol: snapshot.symbol,
    generated_at: formatTimestamp(snapshot.timestamp),
    last_close: snapshot.lastClose,
    trend: snapshot.trend,
    zones: snapshot.zones.map(zone => ({
      level: zone.level,
      low: zone.band.low,
      high: zone.band.high,
      strength: zone.strength,
      signal_count: zone.signalCount,
      signals: [...zone.contributingSignals],
    })),
    trades: snapshot.plans.map(plan => ({
      symbol: plan.symbol,
      direction: plan.direction,
      entry: plan.entry,
      stop_loss: plan.stopLoss,
      take_profit_1: plan.takeProfit1,
      take_profit_2: plan.takeProfit2,
      size: plan.size,
      risk_amount: plan.riskAmount,
      risk_reward: plan.riskReward,
      strength: plan.zone.strength,
      signals: [...plan.zone.contributingSignals],
    })),
    rejections: snapshot.rejections.map(r => ({ ...r })),
  };
}

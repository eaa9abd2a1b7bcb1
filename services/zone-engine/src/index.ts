/**
 * Zone Engine - public surface
 */

import { ConfluencePipeline } from './pipeline/ConfluencePipeline';
import { CandleProvider, ZoneScanService } from './pipeline/ZoneScanService';
import { getEngineConfig } from './config';

export { parseCandleSeries, isCandleSeriesValid, CandleSchema, CandleSeriesSchema } from './marketData/CandleSeries';
export { OrderBlockDetector } from './detectors/OrderBlockDetector';
export { FairValueGapDetector } from './detectors/FairValueGapDetector';
export { activeZonesAt, isZoneActiveAt, findZoneContaining, isPriceInBand } from './detectors/zoneUtils';
export { SwingService } from './structure/SwingService';
export { StructureAnalyzer } from './structure/StructureAnalyzer';
export { VolumeProfileCalculator } from './profile/VolumeProfileCalculator';
export { MarketProfileCalculator } from './profile/MarketProfileCalculator';
export { averageTrueRange, latestAtr } from './indicators/atr';
export { ConfluenceAggregator } from './confluence/ConfluenceAggregator';
export { buildWeightedLevels, LEVEL_WEIGHTS, LevelSources } from './confluence/LevelBuilder';
export { RiskManager, RiskOverrides, TakeProfitLevels, TradePlanRequest } from './risk/RiskManager';
export { ConfluencePipeline, toSnapshotRecord } from './pipeline/ConfluencePipeline';
export { ZoneScanService, CandleProvider } from './pipeline/ZoneScanService';
export { getEngineConfig, parseRiskOverrides, EngineConfig } from './config';

/**
 * Scan service wired from environment configuration
 */
export function createZoneScanService(provider: CandleProvider): ZoneScanService {
  const config = getEngineConfig();
  return new ZoneScanService(provider, new ConfluencePipeline(config), config.scan);
}

import {
  ConfluenceConfig,
  FairValueGapConfig,
  MarketProfileConfig,
  OrderBlockConfig,
  RiskConfig,
  ScanConfig,
  StructureConfig,
  VolumeProfileConfig,
  getConfluenceConfig,
  getFairValueGapConfig,
  getMarketProfileConfig,
  getOrderBlockConfig,
  getRiskConfig,
  getScanConfig,
  getStructureConfig,
  getVolumeProfileConfig,
} from '@confluence/shared-config';

export interface EngineConfig {
  orderBlock: OrderBlockConfig;
  fairValueGap: FairValueGapConfig;
  structure: StructureConfig;
  volumeProfile: VolumeProfileConfig;
  marketProfile: MarketProfileConfig;
  confluence: ConfluenceConfig;
  risk: RiskConfig;
  scan: ScanConfig;

  // Per-Symbol Risk Overrides
  perSymbolRiskOverrides: Record<string, number>; // Symbol -> risk fraction override
}

/**
 * Parse "SYMBOL:fraction,SYMBOL:fraction" (e.g. "BTCUSDT:0.005,ETHUSDT:0.0075")
 */
export function parseRiskOverrides(raw: string): Record<string, number> {
  const overrides: Record<string, number> = {};
  for (const pair of raw.split(',')) {
    const [symbol, value] = pair.split(':').map(s => s.trim());
    if (!symbol || !value) continue;
    const riskPct = Number(value);
    if (Number.isFinite(riskPct) && riskPct > 0) {
      overrides[symbol.toUpperCase()] = riskPct;
    }
  }
  return overrides;
}

export function getEngineConfig(): EngineConfig {
  return {
    orderBlock: getOrderBlockConfig(),
    fairValueGap: getFairValueGapConfig(),
    structure: getStructureConfig(),
    volumeProfile: getVolumeProfileConfig(),
    marketProfile: getMarketProfileConfig(),
    confluence: getConfluenceConfig(),
    risk: getRiskConfig(),
    scan: getScanConfig(),
    perSymbolRiskOverrides: parseRiskOverrides(process.env.RISK_PER_SYMBOL_OVERRIDES || ''),
  };
}

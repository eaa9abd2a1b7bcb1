import { envInt, envNumber } from './env';

export interface RiskConfig {
  riskPerTrade: number; // fraction of balance, e.g. 0.01
  maxRiskPerTrade: number; // hard cap on riskPerTrade and overrides
  minRiskRewardRatio: number;
  atrStopMultiplier: number;
  zoneBufferPct: number; // stop offset beyond a protective zone, percent
  fallbackStopPct: number; // stop distance when no zone and no ATR, percent
  trailingAtrMultiplier: number;
  trailingDistancePct: number; // trailing distance when no ATR, percent
  trailingFloorPct: number; // trailing stop never looser than entry -/+ this, percent
  maxPortfolioRisk: number; // fraction of balance across open positions
  dailyLossLimit: number; // fraction of balance
  atrPeriod: number;
}

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  riskPerTrade: 0.01,
  maxRiskPerTrade: 0.02,
  minRiskRewardRatio: 2.0,
  atrStopMultiplier: 1.5,
  zoneBufferPct: 0.1,
  fallbackStopPct: 2,
  trailingAtrMultiplier: 1.0,
  trailingDistancePct: 0.5,
  trailingFloorPct: 1,
  maxPortfolioRisk: 0.05,
  dailyLossLimit: 0.03,
  atrPeriod: 14,
};

export function getRiskConfig(): RiskConfig {
  const d = DEFAULT_RISK_CONFIG;
  return {
    riskPerTrade: envNumber('RISK_PER_TRADE', d.riskPerTrade),
    maxRiskPerTrade: envNumber('RISK_MAX_PER_TRADE', d.maxRiskPerTrade),
    minRiskRewardRatio: envNumber('RISK_MIN_RR', d.minRiskRewardRatio),
    atrStopMultiplier: envNumber('RISK_ATR_STOP_MULTIPLIER', d.atrStopMultiplier),
    zoneBufferPct: envNumber('RISK_ZONE_BUFFER_PCT', d.zoneBufferPct),
    fallbackStopPct: envNumber('RISK_FALLBACK_STOP_PCT', d.fallbackStopPct),
    trailingAtrMultiplier: envNumber('RISK_TRAILING_ATR_MULTIPLIER', d.trailingAtrMultiplier),
    trailingDistancePct: envNumber('RISK_TRAILING_DISTANCE_PCT', d.trailingDistancePct),
    trailingFloorPct: envNumber('RISK_TRAILING_FLOOR_PCT', d.trailingFloorPct),
    maxPortfolioRisk: envNumber('RISK_MAX_PORTFOLIO_RISK', d.maxPortfolioRisk),
    dailyLossLimit: envNumber('RISK_DAILY_LOSS_LIMIT', d.dailyLossLimit),
    atrPeriod: envInt('RISK_ATR_PERIOD', d.atrPeriod),
  };
}

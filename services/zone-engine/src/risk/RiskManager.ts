/**
 * RiskManager - Position sizing, stop/target placement and trade validation
 *
 * - Size from a fixed fraction of balance (capped at maxRiskPerTrade)
 * - Stop beyond the nearest protective zone, else ATR-based, else a flat percentage
 * - TP1 never tighter than minRiskRewardRatio; TP2 at the opposing zone or a farther FVG
 * - Portfolio guards: daily loss limit and total open risk
 *
 * Configuration is never mutated; per-call overrides come from the caller (e.g. a calibration loop).
 */

import {
  AccountState,
  ConfluenceZone,
  PriceBand,
  RiskValidation,
  TradeDirection,
  TradePlanResult,
} from '@confluence/shared-types';
import { DEFAULT_RISK_CONFIG, RiskConfig } from '@confluence/shared-config';
import { Logger } from '@confluence/shared-utils';

const logger = new Logger('RiskManager');

// Absorbs float error when a target sits exactly on the minimum ratio
const RATIO_EPSILON = 1e-9;

export interface RiskOverrides {
  riskPct?: number;
  minRiskRewardRatio?: number;
  atrStopMultiplier?: number;
  trailingAtrMultiplier?: number;
}

export interface TakeProfitLevels {
  takeProfit1: number;
  takeProfit2: number | null;
}

export interface TradePlanRequest {
  symbol: string;
  direction: TradeDirection;
  entry: number;
  zone: ConfluenceZone;
  account: AccountState;
  atr: number | null;
  protectiveZones?: readonly PriceBand[];
  hvnLevels?: readonly number[];
  fvgZones?: readonly PriceBand[];
  oppositeZone?: PriceBand | null;
  overrides?: RiskOverrides;
}

export class RiskManager {
  private config: RiskConfig;

  constructor(config: Partial<RiskConfig> = {}) {
    const d = DEFAULT_RISK_CONFIG;
    this.config = {
      riskPerTrade: config.riskPerTrade ?? d.riskPerTrade,
      maxRiskPerTrade: config.maxRiskPerTrade ?? d.maxRiskPerTrade,
      minRiskRewardRatio: config.minRiskRewardRatio ?? d.minRiskRewardRatio,
      atrStopMultiplier: config.atrStopMultiplier ?? d.atrStopMultiplier,
      zoneBufferPct: config.zoneBufferPct ?? d.zoneBufferPct,
      fallbackStopPct: config.fallbackStopPct ?? d.fallbackStopPct,
      trailingAtrMultiplier: config.trailingAtrMultiplier ?? d.trailingAtrMultiplier,
      trailingDistancePct: config.trailingDistancePct ?? d.trailingDistancePct,
      trailingFloorPct: config.trailingFloorPct ?? d.trailingFloorPct,
      maxPortfolioRisk: config.maxPortfolioRisk ?? d.maxPortfolioRisk,
      dailyLossLimit: config.dailyLossLimit ?? d.dailyLossLimit,
      atrPeriod: config.atrPeriod ?? d.atrPeriod,
    };
  }

  getConfig(): Readonly<RiskConfig> {
    return this.config;
  }

  /**
   * Units to trade so that hitting the stop loses balance * riskPct (capped). 0 when entry == stop.
   */
  positionSize(entry: number, stop: number, balance: number, riskPct: number = this.config.riskPerTrade): number {
    const riskPerUnit = Math.abs(entry - stop);
    if (riskPerUnit === 0 || balance <= 0 || riskPct <= 0) {
      return 0;
    }
    const riskAmount = balance * Math.min(riskPct, this.config.maxRiskPerTrade);
    return riskAmount / riskPerUnit;
  }

  stopLoss(
    entry: number,
    protectiveZones: readonly PriceBand[],
    atr: number | null,
    direction: TradeDirection,
    overrides: RiskOverrides = {}
  ): number {
    const buffer = this.config.zoneBufferPct / 100;
    const atrMultiplier = overrides.atrStopMultiplier ?? this.config.atrStopMultiplier;
    const candidates: Array<{ price: number; reason: string }> = [];

    if (direction === 'buy') {
      // Nearest zone edge below entry
      const edges = protectiveZones.map(z => z.low).filter(low => low < entry);
      if (edges.length > 0) {
        candidates.push({ price: Math.max(...edges) * (1 - buffer), reason: 'Protective zone low' });
      }
      if (atr !== null && atr > 0) {
        candidates.push({ price: entry - atr * atrMultiplier, reason: `ATR-based SL (${atrMultiplier}x ATR)` });
      }
      candidates.push({ price: entry * (1 - this.config.fallbackStopPct / 100), reason: 'Fallback percentage' });
    } else {
      const edges = protectiveZones.map(z => z.high).filter(high => high > entry);
      if (edges.length > 0) {
        candidates.push({ price: Math.min(...edges) * (1 + buffer), reason: 'Protective zone high' });
      }
      if (atr !== null && atr > 0) {
        candidates.push({ price: entry + atr * atrMultiplier, reason: `ATR-based SL (${atrMultiplier}x ATR)` });
      }
      candidates.push({ price: entry * (1 + this.config.fallbackStopPct / 100), reason: 'Fallback percentage' });
    }

    const chosen = candidates[0];
    logger.debug(`Stop loss ${chosen.price} for ${direction} @ ${entry}: ${chosen.reason}`);
    return chosen.price;
  }

  /**
   * TP1: nearest favorable HVN or FVG edge at least minRR * risk away, else exactly minRR * risk.
   * TP2: opposing zone edge beyond TP1, else the next FVG edge beyond TP1.
   */
  takeProfit(
    entry: number,
    stop: number,
    hvnLevels: readonly number[],
    fvgZones: readonly PriceBand[],
    oppositeZone: PriceBand | null,
    direction: TradeDirection,
    overrides: RiskOverrides = {}
  ): TakeProfitLevels {
    const risk = Math.abs(entry - stop);
    if (risk === 0) {
      return { takeProfit1: entry, takeProfit2: null };
    }

    const minRR = overrides.minRiskRewardRatio ?? this.config.minRiskRewardRatio;
    const isBuy = direction === 'buy';
    const minimumTarget = isBuy ? entry + risk * minRR : entry - risk * minRR;

    // Distance in the trade's favour; negative means against it
    const gain = (price: number) => (isBuy ? price - entry : entry - price);
    const nearest = (prices: number[]): number | null =>
      prices.length === 0 ? null : prices.reduce((best, p) => (gain(p) < gain(best) ? p : best));

    const fvgEdges = fvgZones.map(z => (isBuy ? z.low : z.high));
    const qualifying = [...hvnLevels, ...fvgEdges].filter(
      p => gain(p) >= gain(minimumTarget) - RATIO_EPSILON * risk
    );
    const takeProfit1 = nearest(qualifying) ?? minimumTarget;

    let takeProfit2: number | null = null;
    if (oppositeZone) {
      const edge = isBuy ? oppositeZone.high : oppositeZone.low;
      if (gain(edge) > gain(takeProfit1)) {
        takeProfit2 = edge;
      }
    }
    if (takeProfit2 === null) {
      takeProfit2 = nearest(fvgEdges.filter(p => gain(p) > gain(takeProfit1)));
    }

    return { takeProfit1, takeProfit2 };
  }

  /**
   * Ratchet a stop toward price. Long stops never move down and never sit below
   * entry * (1 - trailingFloorPct); short stops mirror.
   */
  trailingStop(
    currentPrice: number,
    entry: number,
    currentStop: number,
    atr: number | null,
    direction: TradeDirection,
    overrides: RiskOverrides = {}
  ): number {
    const atrMultiplier = overrides.trailingAtrMultiplier ?? this.config.trailingAtrMultiplier;
    const distance = atr !== null && atr > 0
      ? atr * atrMultiplier
      : currentPrice * (this.config.trailingDistancePct / 100);
    const floor = this.config.trailingFloorPct / 100;

    if (direction === 'buy') {
      return Math.max(currentPrice - distance, currentStop, entry * (1 - floor));
    }
    return Math.min(currentPrice + distance, currentStop, entry * (1 + floor));
  }

  /**
   * The trade side follows from the stop: a stop below entry is a long.
   */
  validate(entry: number, stop: number, takeProfit: number, overrides: RiskOverrides = {}): RiskValidation {
    const risk = Math.abs(entry - stop);
    if (risk === 0) {
      return { valid: false, error: 'DEGENERATE_STOP', reason: `Stop equals entry (${entry})` };
    }

    const minRR = overrides.minRiskRewardRatio ?? this.config.minRiskRewardRatio;
    const reward = stop < entry ? takeProfit - entry : entry - takeProfit;
    const riskReward = reward / risk;

    if (riskReward < minRR - RATIO_EPSILON) {
      return {
        valid: false,
        error: 'INSUFFICIENT_REWARD_RATIO',
        reason: `Risk:reward ${riskReward.toFixed(2)} below minimum ${minRR}`,
      };
    }
    return { valid: true, riskReward };
  }

  /**
   * Full plan for one zone, or the reason it was rejected
   */
  planTrade(request: TradePlanRequest): TradePlanResult {
    const { symbol, direction, entry, zone, account, atr } = request;
    const overrides = request.overrides ?? {};
    const balance = account.balance;

    const dailyPnl = account.dailyPnl ?? 0;
    if (dailyPnl < 0 && -dailyPnl >= balance * this.config.dailyLossLimit) {
      return {
        ok: false,
        error: 'DAILY_LOSS_LIMIT',
        reason: `Daily loss ${(-dailyPnl).toFixed(2)} reached limit ${(balance * this.config.dailyLossLimit).toFixed(2)}`,
      };
    }

    const stopLoss = this.stopLoss(entry, request.protectiveZones ?? [zone.band], atr, direction, overrides);
    const { takeProfit1, takeProfit2 } = this.takeProfit(
      entry,
      stopLoss,
      request.hvnLevels ?? [],
      request.fvgZones ?? [],
      request.oppositeZone ?? null,
      direction,
      overrides
    );

    const validation = this.validate(entry, stopLoss, takeProfit1, overrides);
    if (!validation.valid) {
      return { ok: false, error: validation.error, reason: validation.reason };
    }

    const size = this.positionSize(entry, stopLoss, balance, overrides.riskPct ?? this.config.riskPerTrade);
    if (size <= 0) {
      return { ok: false, error: 'INVALID_SIZE', reason: `No position size for balance ${balance}` };
    }
    const riskAmount = size * Math.abs(entry - stopLoss);

    const openRisk = (account.openPositions ?? []).reduce((sum, p) => sum + p.riskAmount, 0);
    const riskBudget = balance * this.config.maxPortfolioRisk;
    if (openRisk + riskAmount > riskBudget + RATIO_EPSILON) {
      return {
        ok: false,
        error: 'PORTFOLIO_RISK_LIMIT',
        reason: `Open risk ${(openRisk + riskAmount).toFixed(2)} would exceed budget ${riskBudget.toFixed(2)}`,
      };
    }

    return {
      ok: true,
      plan: {
        symbol,
        direction,
        entry,
        stopLoss,
        takeProfit1,
        takeProfit2,
        size,
        riskAmount,
        riskReward: validation.riskReward,
        zone,
      },
    };
  }
}

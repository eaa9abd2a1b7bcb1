import { envInt, envNumber } from './env';

/**
 * Order block detection settings
 */
export interface OrderBlockConfig {
  minCandles: number; // shortest consolidation window
  maxCandles: number; // longest consolidation window
  impulseThresholdPct: number; // percent move required after the consolidation
  lookback: number; // candles examined for the impulse
  maxAge: number; // candles a zone stays valid
  consolidationRangeMultiplier: number; // window range vs. average candle range
}

export const DEFAULT_ORDER_BLOCK_CONFIG: OrderBlockConfig = {
  minCandles: 3,
  maxCandles: 5,
  impulseThresholdPct: 1.5,
  lookback: 20,
  maxAge: 50,
  consolidationRangeMultiplier: 1.5,
};

export function getOrderBlockConfig(): OrderBlockConfig {
  const d = DEFAULT_ORDER_BLOCK_CONFIG;
  return {
    minCandles: envInt('OB_MIN_CANDLES', d.minCandles),
    maxCandles: envInt('OB_MAX_CANDLES', d.maxCandles),
    impulseThresholdPct: envNumber('OB_IMPULSE_THRESHOLD_PCT', d.impulseThresholdPct),
    lookback: envInt('OB_LOOKBACK', d.lookback),
    maxAge: envInt('OB_MAX_AGE', d.maxAge),
    consolidationRangeMultiplier: envNumber('OB_CONSOLIDATION_RANGE_MULTIPLIER', d.consolidationRangeMultiplier),
  };
}

/**
 * Fair value gap detection settings
 */
export interface FairValueGapConfig {
  minSizePct: number;
  strongThresholdPct: number;
  maxAgeBars: number;
}

export const DEFAULT_FAIR_VALUE_GAP_CONFIG: FairValueGapConfig = {
  minSizePct: 0.1,
  strongThresholdPct: 0.5,
  maxAgeBars: 50,
};

export function getFairValueGapConfig(): FairValueGapConfig {
  const d = DEFAULT_FAIR_VALUE_GAP_CONFIG;
  return {
    minSizePct: envNumber('FVG_MIN_SIZE_PCT', d.minSizePct),
    strongThresholdPct: envNumber('FVG_STRONG_THRESHOLD_PCT', d.strongThresholdPct),
    maxAgeBars: envInt('FVG_MAX_AGE_BARS', d.maxAgeBars),
  };
}

/**
 * Market structure settings
 */
export interface StructureConfig {
  swingLookback: number; // candles on each side of a swing
  liquidityBufferPct: number; // liquidity level offset from the last swing, percent
}

export const DEFAULT_STRUCTURE_CONFIG: StructureConfig = {
  swingLookback: 5,
  liquidityBufferPct: 0.1,
};

export function getStructureConfig(): StructureConfig {
  const d = DEFAULT_STRUCTURE_CONFIG;
  return {
    swingLookback: envInt('STRUCTURE_SWING_LOOKBACK', d.swingLookback),
    liquidityBufferPct: envNumber('STRUCTURE_LIQUIDITY_BUFFER_PCT', d.liquidityBufferPct),
  };
}

export * from './ProfileConfig';
export * from './ConfluenceConfig';
export * from './RiskConfig';
export * from './ScanConfig';
export { envInt, envNumber, envList } from './env';

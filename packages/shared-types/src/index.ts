// Market data types
export interface Candle {
  timestamp: number; // epoch milliseconds
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type CandleSeries = readonly Candle[];

/**
 * Closed price interval. A single price is a band with low === high.
 */
export interface PriceBand {
  low: number;
  high: number;
}

export type PriceLevel = number | PriceBand;

export type ZoneDirection = 'bullish' | 'bearish';
export type TradeDirection = 'buy' | 'sell';

// Zone types
export type ZoneKind = 'order_block' | 'fair_value_gap';
export type ZoneEndReason = 'invalidated' | 'filled' | 'expired';
export type FvgGrade = 'strong' | 'weak';

interface ZoneBase {
  direction: ZoneDirection;
  band: PriceBand;
  originIndex: number;
  validFromIndex: number;
  validUntilIndex: number | null; // first index where the zone is no longer valid; null = still valid
  endReason: ZoneEndReason | null;
  strength: number;
  timestamp: number; // timestamp of the origin candle
}

export interface OrderBlockZone extends ZoneBase {
  kind: 'order_block';
  consolidationStartIndex: number;
  consolidationEndIndex: number;
  impulsePct: number;
}

export interface FairValueGapZone extends ZoneBase {
  kind: 'fair_value_gap';
  grade: FvgGrade;
  sizePct: number;
}

export type Zone = OrderBlockZone | FairValueGapZone;

// Market structure types
export type TrendBias = 'bullish' | 'bearish' | 'range';
export type SwingType = 'high' | 'low';

export interface SwingPoint {
  index: number;
  type: SwingType;
  price: number;
  timestamp: number;
  confirmedIndex: number; // first index at which the swing is known
}

export type StructureBreakKind = 'BOS' | 'ChoCH';

export interface StructureBreak {
  kind: StructureBreakKind;
  direction: ZoneDirection;
  level: number;
  swingIndex: number;
}

export interface StructureState {
  index: number;
  trend: TrendBias;
  lastSwingHigh: number | null;
  lastSwingLow: number | null;
  bos: StructureBreak | null;
  choch: StructureBreak | null;
  liquidityHigh: number | null;
  liquidityLow: number | null;
}

// Profile types
export type ProfileStatus = 'ok' | 'insufficient_data' | 'degenerate_range' | 'no_value_area';

export interface ProfileBin {
  index: number;
  low: number;
  high: number;
  center: number;
  volume: number;
}

export interface Profile {
  status: ProfileStatus;
  poc: number | null;
  val: number | null;
  vah: number | null;
  bins: ProfileBin[];
  totalVolume: number;
  hvn: number[];
  lvn: number[];
  profileHigh: number | null;
  profileLow: number | null;
}

export type MarketState = 'trending' | 'balanced';

export interface InitialBalance {
  high: number;
  low: number;
}

export interface TpoSummary {
  singlePrints: number[];
  poorHigh: number | null;
  poorLow: number | null;
  initialBalance: InitialBalance | null;
}

export interface MarketProfile extends Profile {
  marketState: MarketState;
  tpo: TpoSummary;
}

// Confluence types
export type SignalTag =
  | 'order_block'
  | 'fair_value_gap'
  | 'vp_poc'
  | 'vp_vah'
  | 'vp_val'
  | 'vp_hvn'
  | 'mp_poc'
  | 'mp_vah'
  | 'mp_val'
  | 'liquidity_high'
  | 'liquidity_low';

export interface WeightedLevel {
  price: number;
  band: PriceBand;
  strength: number;
  tag: SignalTag;
}

export interface ConfluenceZone {
  level: number;
  band: PriceBand;
  contributingSignals: SignalTag[];
  strength: number;
  signalCount: number;
}

// Risk types
export type RiskErrorCode =
  | 'DEGENERATE_STOP'
  | 'INSUFFICIENT_REWARD_RATIO'
  | 'DAILY_LOSS_LIMIT'
  | 'PORTFOLIO_RISK_LIMIT'
  | 'INVALID_SIZE';

export type RiskValidation =
  | { valid: true; riskReward: number }
  | { valid: false; error: RiskErrorCode; reason: string };

export interface OpenPosition {
  symbol: string;
  riskAmount: number;
}

export interface AccountState {
  balance: number;
  dailyPnl?: number;
  openPositions?: OpenPosition[];
}

export interface TradePlan {
  symbol: string;
  direction: TradeDirection;
  entry: number;
  stopLoss: number;
  takeProfit1: number;
  takeProfit2: number | null;
  size: number;
  riskAmount: number;
  riskReward: number;
  zone: ConfluenceZone;
}

export type TradePlanResult =
  | { ok: true; plan: TradePlan }
  | { ok: false; error: RiskErrorCode; reason: string };

// Engine output
export interface TradeRejection {
  zoneLevel: number;
  direction: TradeDirection;
  error: RiskErrorCode;
  reason: string;
}

export interface EngineSnapshot {
  symbol: string;
  timestamp: number;
  lastClose: number;
  trend: TrendBias;
  zones: ConfluenceZone[];
  plans: TradePlan[];
  rejections: TradeRejection[];
}

/**
 * Plain record handed to presentation collaborators (chart, report, bot).
 */
export interface SnapshotRecord {
  symbol: string;
  generated_at: string;
  last_close: number;
  trend: TrendBias;
  zones: Array<{
    level: number;
    low: number;
    high: number;
    strength: number;
    signal_count: number;
    signals: SignalTag[];
  }>;
  trades: Array<{
    symbol: string;
    direction: TradeDirection;
    entry: number;
    stop_loss: number;
    take_profit_1: number;
    take_profit_2: number | null;
    size: number;
    risk_amount: number;
    risk_reward: number;
    strength: number;
    signals: SignalTag[];
  }>;
  rejections: TradeRejection[];
}

export interface ScanSkip {
  symbol: string;
  reason: string;
}

export interface ScanResult {
  snapshots: EngineSnapshot[];
  skipped: ScanSkip[];
}

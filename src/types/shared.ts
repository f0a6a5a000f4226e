// Shared types used across the analysis pipeline and the API server

// Price data types
export interface PriceObservation {
  timestamp: number;  // Milliseconds since epoch
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type PriceSeries = readonly PriceObservation[];

export type PriceField = 'open' | 'high' | 'low' | 'close';

export const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const satisfies readonly PriceField[];

// Pivot and wave types
export interface PivotPoint {
  index: number;  // Index into the analyzed series
  price: number;
}

export type WaveKind = 'impulse' | 'corrective' | 'motive' | 'diagonal';

/** Projected price range as (near, far) */
export type TargetRange = readonly [near: number, far: number];

export interface WavePatternLike {
  readonly kind: WaveKind;
  readonly points: readonly PivotPoint[];
  readonly isValid: boolean;
  getNextTarget(): TargetRange | null;
}

export interface WaveRecord {
  kind: WaveKind;
  indices: number[];                // Absolute pivot indices
  points: PivotPoint[];
  pattern: WavePatternLike;
  waveCount: number;                // 1-based running count within its kind
}

export type WaveRecords = Record<WaveKind, WaveRecord[]>;

export interface CurrentWave {
  kind: 'impulse' | 'corrective';
  indices: number[];
  points: PivotPoint[];
  pattern: WavePatternLike;
  target: TargetRange | null;
}

// Prediction and recommendation types
export type PredictionLabel = 'trend-continuation-expected' | 'correction-expected' | 'undetermined';

export interface Prediction {
  label: PredictionLabel;
  confidence: number;
  target: TargetRange | null;
}

export type RecommendationAction = 'buy' | 'sell' | 'take-profit' | 'close-short' | 'caution' | 'neutral';

export interface PriceTarget {
  price: number;
  changePercent: number;
}

export interface Recommendation {
  action: RecommendationAction;
  rationale: string;
  entry: number;
  targets: PriceTarget[];
  stopLoss: number | null;
  riskReward: number[];
}

// Backtest types
export type TradeAction = 'buy' | 'sell';

export interface Trade {
  timestamp: number;
  action: TradeAction;
  price: number;
  shares: number;
  value: number;
}

export interface EquityPoint {
  timestamp: number;
  equity: number;
}

export interface BacktestResult {
  initialInvestment: number;
  finalEquity: number;
  totalReturn: number;       // Percent
  maxDrawdown: number;       // Percent, always >= 0
  numTrades: number;         // Completed buy + sell pairs
  winRate: number;           // Percent of completed trades with a positive return
  avgTradeReturn: number;    // Percent
  trades: Trade[];
  equityCurve: EquityPoint[];
}

// Backend related types
export interface BackendHealthCheck {
  status: 'ok' | 'error';
  message: string;
  version?: string;
  timestamp?: Date;
}

export interface HistoryRequest {
  symbol: string;
  /** Calendar days back from `endDate` */
  days: number;
  endDate?: Date;
  /** German exchange code (e.g. 'XETR', 'FRA') for symbols without a suffix */
  exchange?: string;
}

export interface QuoteRequest {
  symbol: string;
  exchange?: string;
}

// Latest market quote; fields the provider omits are null
export interface LiveQuote {
  symbol: string;
  timestamp: number;
  price: number;
  change: number | null;
  changePercent: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  previousClose: number | null;
  volume: number | null;
  marketCap: number | null;
}

// Anything that can deliver a daily price history and a live quote for a symbol
export interface PriceDataSource {
  fetchHistory(request: HistoryRequest): Promise<PriceSeries>;
  fetchQuote(request: QuoteRequest): Promise<LiveQuote>;
}

import type { CurrentWave, Prediction, PriceField, PriceSeries, WaveRecords, BacktestResult } from '@/types/shared';
import {
  DEFAULT_LOOK_BACK,
  DEFAULT_WINDOW_SIZE,
  DEFAULT_ZIGZAG_THRESHOLD,
  WaveAnalyzer
} from '@/utils/elliottWaveAnalysis';
import {
  DEFAULT_INITIAL_INVESTMENT,
  type DateInput,
  runBacktest
} from '@/services/backtestService';

/**
 * Every valid impulse and corrective pattern in `series`
 */
export const analyze = (
  series: PriceSeries,
  priceField: PriceField = 'close',
  zigzagThreshold: number = DEFAULT_ZIGZAG_THRESHOLD,
  windowSize: number = DEFAULT_WINDOW_SIZE
): WaveRecords => new WaveAnalyzer(series, priceField).analyze(zigzagThreshold, windowSize);

export const findCurrentWave = (
  series: PriceSeries,
  lookBack: number = DEFAULT_LOOK_BACK,
  priceField: PriceField = 'close'
): CurrentWave | null => new WaveAnalyzer(series, priceField).findCurrentWave(lookBack);

export const predictNextMove = (
  series: PriceSeries,
  lookBack: number = DEFAULT_LOOK_BACK,
  priceField: PriceField = 'close'
): Prediction => new WaveAnalyzer(series, priceField).predictNextMove(lookBack);

export const backtest = (
  series: PriceSeries,
  startDate?: DateInput,
  endDate?: DateInput,
  initialInvestment: number = DEFAULT_INITIAL_INVESTMENT
): BacktestResult => runBacktest(series, { startDate, endDate, initialInvestment });

export { recommend, DEFAULT_RISK_TOLERANCE, MIN_CONFIDENCE } from '@/utils/recommendations';
export type { OpenPosition, RecommendOptions } from '@/utils/recommendations';
export { WaveAnalyzer, PREDICTION_CONFIDENCE } from '@/utils/elliottWaveAnalysis';
export type { WaveAnalyzerOptions } from '@/utils/elliottWaveAnalysis';
export { WavePattern, IMPULSE_RULES, MIN_POINTS } from '@/utils/wavePattern';
export type { ImpulseRule } from '@/utils/wavePattern';
export { ZigzagTracker, zigzag, localExtrema } from '@/utils/pivots';
export { calculateFibonacciLevels, FIBONACCI_RATIOS } from '@/utils/fibonacci';
export type { FibonacciLevels } from '@/utils/fibonacci';
export { runBacktest, DEFAULT_WARMUP } from '@/services/backtestService';
export type { BacktestOptions, DateInput } from '@/services/backtestService';
export { summarizeBacktest, backtestToCsv, tradesToCsv, summaryToCsv } from '@/utils/exportUtils';
export { normalizeSymbol } from '@/utils/marketData';
export * from '@/lib/errors';
export type * from '@/types/shared';

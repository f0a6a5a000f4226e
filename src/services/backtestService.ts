import type {
  BacktestResult,
  EquityPoint,
  Prediction,
  PriceField,
  PriceSeries,
  Trade
} from '@/types/shared';
import { InsufficientDataError, ValidationError } from '@/lib/errors';
import { type Logger, silentLogger } from '@/lib/logger';
import { DEFAULT_LOOK_BACK, WaveAnalyzer } from '@/utils/elliottWaveAnalysis';
import { MIN_CONFIDENCE } from '@/utils/recommendations';

export const DEFAULT_INITIAL_INVESTMENT = 10000;

// Minimum history before the first trading decision
export const DEFAULT_WARMUP = 60;

export type DateInput = Date | string | number;

export interface BacktestOptions {
  startDate?: DateInput;
  endDate?: DateInput;
  initialInvestment?: number;
  priceField?: PriceField;
  warmup?: number;
  lookBack?: number;
  /**
   * 'incremental' walks one analyzer forward by appending each day;
   * 'rescan' builds a fresh analyzer over the truncated history every day.
   * Both produce the same result.
   */
  mode?: 'incremental' | 'rescan';
  logger?: Logger;
}

const toTimestamp = (input: DateInput): number => {
  const timestamp = input instanceof Date ? input.getTime() : typeof input === 'number' ? input : Date.parse(input);
  if (Number.isNaN(timestamp)) {
    throw new ValidationError(`Invalid date: ${String(input)}`);
  }
  return timestamp;
};

/**
 * Index of the observation closest in time to `date`; ties resolve to the earlier one
 */
export const findNearestIndex = (series: PriceSeries, date: DateInput): number => {
  const target = toTimestamp(date);
  let nearest = 0;
  let bestDistance = Infinity;

  series.forEach((observation, index) => {
    const distance = Math.abs(observation.timestamp - target);
    if (distance < bestDistance) {
      bestDistance = distance;
      nearest = index;
    }
  });

  return nearest;
};

/**
 * Max percentage decline from the running peak, where the peak starts at the initial investment
 */
export const calculateMaxDrawdown = (equityCurve: readonly EquityPoint[], initialInvestment: number): number => {
  let peak = initialInvestment;
  let maxDrawdown = 0;

  for (const { equity } of equityCurve) {
    if (equity > peak) {
      peak = equity;
    }
    const drawdown = peak > 0 ? ((peak - equity) / peak) * 100 : 0;
    maxDrawdown = Math.max(maxDrawdown, drawdown);
  }

  return maxDrawdown;
};

/**
 * Percent return of each completed (buy, sell) pair, taken in log order
 */
export const calculateTradeReturns = (trades: readonly Trade[]): number[] => {
  const returns: number[] = [];

  for (let i = 0; i + 1 < trades.length; i += 2) {
    const entry = trades[i];
    const exit = trades[i + 1];
    if (entry.action === 'buy' && exit.action === 'sell' && entry.value > 0) {
      returns.push(((exit.value - entry.value) / entry.value) * 100);
    }
  }

  return returns;
};

/**
 * Walk the series day by day and trade a long-only, single-position rule:
 * buy everything when a trend continuation is expected, sell everything when a
 * correction is expected.
 *
 * @param series - Full price history, ascending by time
 * @param options - Date range, capital and walk settings
 * @returns Summary metrics, trade log and daily equity curve
 */
export const runBacktest = (series: PriceSeries, options: BacktestOptions = {}): BacktestResult => {
  const {
    initialInvestment = DEFAULT_INITIAL_INVESTMENT,
    priceField = 'close',
    warmup = DEFAULT_WARMUP,
    lookBack = DEFAULT_LOOK_BACK,
    mode = 'incremental',
    logger = silentLogger
  } = options;

  if (!Number.isInteger(warmup) || warmup < 0) {
    throw new ValidationError(`Warmup must be a non-negative integer, got ${warmup}`);
  }
  if (series.length === 0) {
    throw new InsufficientDataError('Cannot backtest an empty price series', 0, warmup + 1);
  }
  if (!(initialInvestment > 0)) {
    throw new ValidationError(`Initial investment must be positive, got ${initialInvestment}`);
  }

  const startIndex = options.startDate !== undefined ? findNearestIndex(series, options.startDate) : 0;
  const endIndex = options.endDate !== undefined ? findNearestIndex(series, options.endDate) : series.length - 1;

  if (startIndex > endIndex) {
    throw new InsufficientDataError('Backtest start date falls after its end date', 0, warmup + 1);
  }

  const data = series.slice(startIndex, endIndex + 1);
  logger.info(`Backtesting ${data.length} observations with ${initialInvestment.toFixed(2)} initial capital`);

  if (data.length <= warmup) {
    logger.warn(`Only ${data.length} observations, at least ${warmup + 1} needed before the first decision`);
  }

  let cash = initialInvestment;
  let shares = 0;
  const trades: Trade[] = [];
  const equityCurve: EquityPoint[] = [];

  // Seeded on the first decision day, then extended one observation at a time
  let walker: WaveAnalyzer | null = null;

  const predictAt = (i: number): Prediction => {
    if (mode === 'rescan') {
      return new WaveAnalyzer(data.slice(0, i + 1), priceField).predictNextMove(lookBack);
    }
    if (walker) {
      walker.append(data[i]);
    } else {
      walker = new WaveAnalyzer(data.slice(0, i + 1), priceField);
    }
    return walker.predictNextMove(lookBack);
  };

  for (let i = warmup; i < data.length; i++) {
    const prediction = predictAt(i);
    const { timestamp } = data[i];
    const price = data[i][priceField];

    if (prediction.label === 'trend-continuation-expected' && prediction.confidence > MIN_CONFIDENCE) {
      if (shares === 0 && cash > 0 && price > 0) {
        shares = cash / price;
        cash = 0;
        trades.push({ timestamp, action: 'buy', price, shares, value: shares * price });
        logger.debug(`BUY ${shares.toFixed(4)} @ ${price.toFixed(2)}`);
      }
    } else if (prediction.label === 'correction-expected' && prediction.confidence > MIN_CONFIDENCE) {
      if (shares > 0) {
        cash = shares * price;
        trades.push({ timestamp, action: 'sell', price, shares, value: cash });
        logger.debug(`SELL ${shares.toFixed(4)} @ ${price.toFixed(2)}`);
        shares = 0;
      }
    }

    equityCurve.push({ timestamp, equity: cash + shares * price });
  }

  const finalEquity = equityCurve.length > 0 ? equityCurve[equityCurve.length - 1].equity : initialInvestment;
  const tradeReturns = calculateTradeReturns(trades);
  const wins = tradeReturns.filter(tradeReturn => tradeReturn > 0).length;

  const result: BacktestResult = {
    initialInvestment,
    finalEquity,
    totalReturn: ((finalEquity - initialInvestment) / initialInvestment) * 100,
    maxDrawdown: calculateMaxDrawdown(equityCurve, initialInvestment),
    numTrades: Math.floor(trades.length / 2),
    winRate: tradeReturns.length > 0 ? (wins / tradeReturns.length) * 100 : 0,
    avgTradeReturn: tradeReturns.length > 0
      ? tradeReturns.reduce((sum, tradeReturn) => sum + tradeReturn, 0) / tradeReturns.length
      : 0,
    trades,
    equityCurve
  };

  logger.info(`Backtest complete: ${result.numTrades} trades, ${result.totalReturn.toFixed(2)}% return`);
  return result;
};

import type { BacktestResult, Trade } from '@/types/shared';
import { formatDate } from '@/utils/marketData';

export interface BacktestSummary {
  initialInvestment: number;
  finalEquity: number;
  totalReturn: number;
  maxDrawdown: number;
  numTrades: number;
  winRate: number;
  avgTradeReturn: number;
}

export interface TradeRow {
  date: string;
  action: Trade['action'];
  price: number;
  shares: number;
  value: number;
}

const round = (value: number, digits: number = 2): number => Number(value.toFixed(digits));

/**
 * Backtest metrics rounded for display, without the trade log or equity curve
 */
export const summarizeBacktest = (result: BacktestResult): BacktestSummary => ({
  initialInvestment: round(result.initialInvestment),
  finalEquity: round(result.finalEquity),
  totalReturn: round(result.totalReturn),
  maxDrawdown: round(result.maxDrawdown),
  numTrades: result.numTrades,
  winRate: round(result.winRate),
  avgTradeReturn: round(result.avgTradeReturn)
});

export const toTradeRows = (trades: readonly Trade[]): TradeRow[] =>
  trades.map(trade => ({
    date: formatDate(trade.timestamp),
    action: trade.action,
    price: round(trade.price),
    shares: round(trade.shares, 4),
    value: round(trade.value)
  }));

const escapeCsv = (value: string | number): string => {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const toCsv = (header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string =>
  [header, ...rows].map(row => row.map(escapeCsv).join(',')).join('\n');

/**
 * Render the summary as a two-column metric,value CSV
 */
export const summaryToCsv = (summary: BacktestSummary): string =>
  toCsv(['metric', 'value'], Object.entries(summary));

/**
 * Render the trade log as CSV, one trade per line
 */
export const tradesToCsv = (trades: readonly Trade[]): string =>
  toCsv(
    ['date', 'action', 'price', 'shares', 'value'],
    toTradeRows(trades).map(row => [row.date, row.action, row.price, row.shares, row.value])
  );

/**
 * Summary and trade log as one CSV document, separated by a blank line
 */
export const backtestToCsv = (result: BacktestResult): string =>
  `${summaryToCsv(summarizeBacktest(result))}\n\n${tradesToCsv(result.trades)}\n`;

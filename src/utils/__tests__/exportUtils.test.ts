import type { BacktestResult } from '@/types/shared';
import { backtestToCsv, summarizeBacktest, toTradeRows, tradesToCsv } from '@/utils/exportUtils';

const result: BacktestResult = {
  initialInvestment: 10000,
  finalEquity: 10512.3456,
  totalReturn: 5.123456,
  maxDrawdown: 3.14159,
  numTrades: 1,
  winRate: 100,
  avgTradeReturn: 5.123456,
  trades: [
    { timestamp: Date.UTC(2024, 0, 2), action: 'buy', price: 100.123, shares: 99.876543, value: 10000 },
    { timestamp: Date.UTC(2024, 1, 15), action: 'sell', price: 105.25, shares: 99.876543, value: 10512.3456 }
  ],
  equityCurve: []
};

describe('summarizeBacktest', () => {
  it('rounds metrics to two decimals', () => {
    expect(summarizeBacktest(result)).toEqual({
      initialInvestment: 10000,
      finalEquity: 10512.35,
      totalReturn: 5.12,
      maxDrawdown: 3.14,
      numTrades: 1,
      winRate: 100,
      avgTradeReturn: 5.12
    });
  });
});

describe('toTradeRows', () => {
  it('formats dates and rounds prices and shares', () => {
    expect(toTradeRows(result.trades)[0]).toEqual({
      date: '2024-01-02',
      action: 'buy',
      price: 100.12,
      shares: 99.8765,
      value: 10000
    });
  });
});

describe('CSV export', () => {
  it('writes one trade per line under a header', () => {
    expect(tradesToCsv(result.trades)).toBe(
      'date,action,price,shares,value\n' +
        '2024-01-02,buy,100.12,99.8765,10000\n' +
        '2024-02-15,sell,105.25,99.8765,10512.35'
    );
  });

  it('joins the summary and the trade log', () => {
    const csv = backtestToCsv({ ...result, trades: [] });

    expect(csv).toBe(
      'metric,value\n' +
        'initialInvestment,10000\n' +
        'finalEquity,10512.35\n' +
        'totalReturn,5.12\n' +
        'maxDrawdown,3.14\n' +
        'numTrades,1\n' +
        'winRate,100\n' +
        'avgTradeReturn,5.12\n' +
        '\n' +
        'date,action,price,shares,value\n'
    );
  });
});

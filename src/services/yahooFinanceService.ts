import yahooFinance from 'yahoo-finance2';
import type { HistoryRequest, LiveQuote, PriceDataSource, PriceSeries, QuoteRequest } from '@/types/shared';
import { DataSourceError } from '@/lib/errors';
import { type Logger, silentLogger } from '@/lib/logger';
import { CacheService } from '@/services/cacheService';
import { type ChartQuote, type MarketQuote, formatDate, normalizeSymbol, toLiveQuote, toPriceSeries } from '@/utils/marketData';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface YahooDataSourceOptions {
  cache?: CacheService<PriceSeries>;
  cacheTtlMinutes?: number;
  logger?: Logger;
}

/**
 * Daily price history from Yahoo Finance, cached per symbol and range,
 * and uncached live quotes
 */
export const createYahooDataSource = (options: YahooDataSourceOptions = {}): PriceDataSource => {
  const logger = options.logger ?? silentLogger;
  const cache = options.cache ?? new CacheService<PriceSeries>({ logger });
  const ttlMinutes = options.cacheTtlMinutes ?? 60;

  yahooFinance.suppressNotices(['yahooSurvey']);

  const fetchHistory = async ({ symbol, days, endDate, exchange }: HistoryRequest): Promise<PriceSeries> => {
    const ticker = normalizeSymbol(symbol, exchange);
    const period2 = endDate ?? new Date();
    const period1 = new Date(period2.getTime() - days * DAY_MS);
    const cacheKey = `historical_${ticker}_${formatDate(period1.getTime())}_${formatDate(period2.getTime())}`;

    return cache.getCachedData(cacheKey, async () => {
      logger.info(`Fetching ${days} days of history for ${ticker}`);

      let quotes: ChartQuote[];
      try {
        const result = await yahooFinance.chart(ticker, { period1, period2, interval: '1d' });
        quotes = result.quotes;
      } catch (error) {
        throw new DataSourceError(
          `Failed to fetch historical data for ${ticker}: ${error instanceof Error ? error.message : 'Unknown error'}`,
          ticker,
          error
        );
      }

      const series = toPriceSeries(quotes);
      if (series.length === 0) {
        throw new DataSourceError(`No historical data available for ${ticker}`, ticker);
      }

      logger.info(`Received ${series.length} observations for ${ticker}`);
      return series;
    }, ttlMinutes);
  };

  const fetchQuote = async ({ symbol, exchange }: QuoteRequest): Promise<LiveQuote> => {
    const ticker = normalizeSymbol(symbol, exchange);
    logger.info(`Fetching live quote for ${ticker}`);

    let quote: MarketQuote;
    try {
      quote = await yahooFinance.quote(ticker);
    } catch (error) {
      throw new DataSourceError(
        `Failed to fetch quote for ${ticker}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        ticker,
        error
      );
    }

    const live = toLiveQuote(ticker, quote);
    if (!live) {
      throw new DataSourceError(`No live price available for ${ticker}`, ticker);
    }
    return live;
  };

  return { fetchHistory, fetchQuote };
};

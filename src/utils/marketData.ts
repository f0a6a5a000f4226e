import type { LiveQuote, PriceObservation } from '@/types/shared';
import symbols from '@/config/symbols.json';

const GERMAN_EXCHANGES: Record<string, string> = symbols.germanExchanges;
const GERMAN_INDICES: Record<string, string> = symbols.germanIndices;
const US_SYMBOLS = new Set<string>(symbols.usSymbols);
const US_INDICES = new Set<string>(symbols.usIndices);

export const isUsSymbol = (symbol: string): boolean => {
  const base = symbol.split('.')[0];
  return US_SYMBOLS.has(base) || US_INDICES.has(symbol) || symbol.startsWith('^');
};

const hasExchangeSuffix = (symbol: string): boolean =>
  Object.values(GERMAN_EXCHANGES).some(suffix => symbol.endsWith(suffix));

/**
 * Map a user-facing symbol to the Yahoo Finance ticker:
 * German index names become their ^-tickers, known US symbols pass through,
 * anything else is treated as a German share and gets an exchange suffix.
 *
 * @param symbol - e.g. 'DAX', 'AAPL', 'SAP', 'SAP.F'
 * @param exchange - German exchange code; Xetra when omitted or unknown
 */
export const normalizeSymbol = (symbol: string, exchange?: string): string => {
  const trimmed = symbol.trim();

  const index = GERMAN_INDICES[trimmed];
  if (index) {
    return index;
  }

  if (isUsSymbol(trimmed) || hasExchangeSuffix(trimmed)) {
    return trimmed;
  }

  const suffix = (exchange && GERMAN_EXCHANGES[exchange]) || GERMAN_EXCHANGES[symbols.defaultGermanExchange];
  return `${trimmed}${suffix}`;
};

export interface ChartQuote {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
}

/**
 * Convert chart quotes to observations sorted by time, dropping rows with a missing price
 */
export const toPriceSeries = (quotes: readonly ChartQuote[]): PriceObservation[] => {
  const series: PriceObservation[] = [];

  for (const quote of quotes) {
    const { open, high, low, close, volume } = quote;
    if (open == null || high == null || low == null || close == null) {
      continue;
    }
    series.push({
      timestamp: new Date(quote.date).getTime(),
      open,
      high,
      low,
      close,
      volume: volume ?? 0
    });
  }

  return series.sort((a, b) => a.timestamp - b.timestamp);
};

export interface MarketQuote {
  regularMarketPrice?: number;
  regularMarketTime?: Date;
  regularMarketChange?: number;
  regularMarketChangePercent?: number;
  regularMarketOpen?: number;
  regularMarketDayHigh?: number;
  regularMarketDayLow?: number;
  regularMarketPreviousClose?: number;
  regularMarketVolume?: number;
  marketCap?: number;
}

/**
 * Flatten a market quote; null when it carries no price
 *
 * @param now - Timestamp used when the quote has no market time
 */
export const toLiveQuote = (symbol: string, quote: MarketQuote, now: number = Date.now()): LiveQuote | null => {
  if (quote.regularMarketPrice == null) {
    return null;
  }

  return {
    symbol,
    timestamp: quote.regularMarketTime ? new Date(quote.regularMarketTime).getTime() : now,
    price: quote.regularMarketPrice,
    change: quote.regularMarketChange ?? null,
    changePercent: quote.regularMarketChangePercent ?? null,
    open: quote.regularMarketOpen ?? null,
    dayHigh: quote.regularMarketDayHigh ?? null,
    dayLow: quote.regularMarketDayLow ?? null,
    previousClose: quote.regularMarketPreviousClose ?? null,
    volume: quote.regularMarketVolume ?? null,
    marketCap: quote.marketCap ?? null
  };
};

/**
 * Formats a timestamp as YYYY-MM-DD (UTC)
 */
export const formatDate = (timestamp: number): string => new Date(timestamp).toISOString().slice(0, 10);

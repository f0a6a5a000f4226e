import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z, ZodError } from 'zod';
import type {
  BackendHealthCheck,
  CurrentWave,
  PriceDataSource,
  PriceSeries,
  WaveRecord,
  WaveRecords
} from '@/types/shared';
import { PRICE_FIELDS } from '@/types/shared';
import type { AppConfig } from '@/config/appConfig';
import { DataSourceError, InsufficientDataError, ValidationError } from '@/lib/errors';
import { type Logger, silentLogger } from '@/lib/logger';
import { WaveAnalyzer } from '@/utils/elliottWaveAnalysis';
import { recommend } from '@/utils/recommendations';
import { runBacktest } from '@/services/backtestService';
import { backtestToCsv, summarizeBacktest, toTradeRows } from '@/utils/exportUtils';

export const API_VERSION = '1.0.0';

// History analyzed behind a live quote unless `days` is given
export const LIVE_HISTORY_DAYS = 90;

const historyQuerySchema = z.object({
  days: z.coerce.number().int().positive().max(36500).optional(),
  exchange: z.string().min(2).max(5).optional()
});

const analysisParamsSchema = z.object({
  priceField: z.enum(PRICE_FIELDS).default('close'),
  zigzagThreshold: z.coerce.number().min(0).optional(),
  windowSize: z.coerce.number().int().positive().optional(),
  lookBack: z.coerce.number().int().positive().optional(),
  riskTolerance: z.coerce.number().min(0).lt(1).optional(),
  openPosition: z.enum(['long', 'short', 'none']).default('none')
});

const analysisQuerySchema = historyQuerySchema.merge(analysisParamsSchema);

const observationSchema = z.object({
  timestamp: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().default(0)
});

const analysisBodySchema = analysisParamsSchema.extend({
  symbol: z.string().default('custom'),
  series: z.array(observationSchema).min(1)
});

const backtestQuerySchema = historyQuerySchema.extend({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  initialInvestment: z.coerce.number().positive().optional(),
  priceField: z.enum(PRICE_FIELDS).default('close'),
  mode: z.enum(['incremental', 'rescan']).default('incremental'),
  format: z.enum(['json', 'csv']).default('json')
});

type AnalysisParams = z.infer<typeof analysisParamsSchema>;

const serializeWave = ({ kind, waveCount, indices, points }: WaveRecord) => ({ kind, waveCount, indices, points });

const serializeWaves = (waves: WaveRecords) => ({
  impulse: waves.impulse.map(serializeWave),
  corrective: waves.corrective.map(serializeWave),
  motive: waves.motive.map(serializeWave),
  diagonal: waves.diagonal.map(serializeWave)
});

const serializeCurrentWave = (wave: CurrentWave | null) =>
  wave && { kind: wave.kind, indices: wave.indices, points: wave.points, target: wave.target };

/**
 * Map an error to an HTTP status and the `{ error, details }` body
 */
export const toErrorResponse = (error: unknown): { status: number; body: { error: string; details: string | string[] } } => {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        details: error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      }
    };
  }
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: 'Invalid request', details: error.details ?? error.message } };
  }
  if (error instanceof InsufficientDataError) {
    return { status: 400, body: { error: 'Insufficient data', details: error.message } };
  }
  if (error instanceof DataSourceError) {
    return { status: 502, body: { error: 'Failed to fetch market data', details: error.message } };
  }
  return {
    status: 500,
    body: { error: 'Server error', details: error instanceof Error ? error.message : 'Unknown error' }
  };
};

export interface AppOptions {
  logger?: Logger;
}

/**
 * Build the HTTP API around a price data source.
 * Listening is left to the caller.
 */
export const createApp = (dataSource: PriceDataSource, config: AppConfig, options: AppOptions = {}) => {
  const logger = options.logger ?? silentLogger;
  const app = express();

  app.use(cors({ methods: ['GET', 'POST'] }));
  app.use(express.json({ limit: '5mb' }));

  app.use('/api', (req, _res, next) => {
    logger.info(`API request: ${req.method} ${req.path}`);
    next();
  });

  const fetchSeries = (symbol: string, days: number | undefined, exchange: string | undefined) =>
    dataSource.fetchHistory({ symbol, days: days ?? config.historyDays, exchange });

  const analyzeSeries = (symbol: string, series: PriceSeries, params: AnalysisParams) => {
    const analyzer = new WaveAnalyzer(series, params.priceField, { logger });
    const lookBack = params.lookBack ?? config.analysis.lookBack;

    const waves = analyzer.analyze(
      params.zigzagThreshold ?? config.analysis.zigzagThreshold,
      params.windowSize ?? config.analysis.windowSize
    );
    const currentWave = analyzer.findCurrentWave(lookBack);
    const prediction = analyzer.predictNextMove(lookBack);
    const currentPrice = series[series.length - 1][params.priceField];
    const recommendation = recommend(
      currentWave,
      prediction,
      currentPrice,
      params.riskTolerance ?? config.analysis.riskTolerance,
      { openPosition: params.openPosition }
    );

    return {
      symbol,
      observations: series.length,
      currentPrice,
      waves: serializeWaves(waves),
      currentWave: serializeCurrentWave(currentWave),
      prediction,
      recommendation
    };
  };

  const sendError = (res: Response, error: unknown, context: string) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      logger.error(`Error in ${context}:`, error);
    } else {
      logger.warn(`${context} rejected: ${body.error}`);
    }
    res.status(status).json(body);
  };

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    const health: BackendHealthCheck = {
      status: 'ok',
      message: 'API server is online',
      version: API_VERSION,
      timestamp: new Date()
    };
    res.status(200).json(health);
  });

  // Historical data endpoint
  app.get('/api/historical', async (req, res) => {
    try {
      const symbol = z.string().min(1).parse(req.query.symbol);
      const query = historyQuerySchema.parse(req.query);
      const series = await fetchSeries(symbol, query.days, query.exchange);
      res.json(series);
    } catch (error) {
      sendError(res, error, '/api/historical');
    }
  });

  app.get('/api/analysis/:symbol', async (req, res) => {
    try {
      const query = analysisQuerySchema.parse(req.query);
      const series = await fetchSeries(req.params.symbol, query.days, query.exchange);
      res.json(analyzeSeries(req.params.symbol, series, query));
    } catch (error) {
      sendError(res, error, '/api/analysis');
    }
  });

  // Analysis of a series supplied by the caller
  app.post('/api/analysis', (req, res) => {
    try {
      const body = analysisBodySchema.parse(req.body);
      const series = [...body.series].sort((a, b) => a.timestamp - b.timestamp);
      res.json(analyzeSeries(body.symbol, series, body));
    } catch (error) {
      sendError(res, error, 'POST /api/analysis');
    }
  });

  // Live quote with the wave picture of recent history, priced at the quote
  app.get('/api/live/:symbol', async (req, res) => {
    try {
      const { symbol } = req.params;
      const query = analysisQuerySchema.parse(req.query);
      const [quote, series] = await Promise.all([
        dataSource.fetchQuote({ symbol, exchange: query.exchange }),
        fetchSeries(symbol, query.days ?? LIVE_HISTORY_DAYS, query.exchange)
      ]);

      const analyzer = new WaveAnalyzer(series, query.priceField, { logger });
      const lookBack = query.lookBack ?? config.analysis.lookBack;
      const currentWave = analyzer.findCurrentWave(lookBack);
      const prediction = analyzer.predictNextMove(lookBack);
      const recommendation = recommend(
        currentWave,
        prediction,
        quote.price,
        query.riskTolerance ?? config.analysis.riskTolerance,
        { openPosition: query.openPosition }
      );

      res.json({
        symbol,
        quote,
        observations: series.length,
        currentWave: serializeCurrentWave(currentWave),
        prediction,
        recommendation
      });
    } catch (error) {
      sendError(res, error, '/api/live');
    }
  });

  app.get('/api/backtest/:symbol', async (req, res) => {
    try {
      const query = backtestQuerySchema.parse(req.query);
      const series = await fetchSeries(req.params.symbol, query.days, query.exchange);
      const result = runBacktest(series, {
        startDate: query.startDate,
        endDate: query.endDate,
        initialInvestment: query.initialInvestment ?? config.initialInvestment,
        priceField: query.priceField,
        lookBack: config.analysis.lookBack,
        mode: query.mode,
        logger
      });

      if (query.format === 'csv') {
        res.type('text/csv').send(backtestToCsv(result));
        return;
      }

      res.json({
        symbol: req.params.symbol,
        summary: summarizeBacktest(result),
        trades: toTradeRows(result.trades),
        equityCurve: result.equityCurve
      });
    } catch (error) {
      sendError(res, error, '/api/backtest');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'Not found', details: `No route for ${req.method} ${req.originalUrl}` });
  });

  // Malformed JSON bodies and anything else express raises
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid request', details: error.message });
      return;
    }
    sendError(res, error, 'request');
  });

  return app;
};

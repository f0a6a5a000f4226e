import { loadConfig } from '@/config/appConfig';
import { createLogger } from '@/lib/logger';
import { CacheService } from '@/services/cacheService';
import { createYahooDataSource } from '@/services/yahooFinanceService';
import type { PriceSeries } from '@/types/shared';
import { createApp } from './app';

const config = loadConfig();
const logger = createLogger('API', config.verbose);

const cache = new CacheService<PriceSeries>({
  enabled: config.enableCaching,
  logger: createLogger('Cache', config.verbose)
});

const dataSource = createYahooDataSource({
  cache,
  cacheTtlMinutes: config.cacheTtlMinutes,
  logger: createLogger('Yahoo', config.verbose)
});

const app = createApp(dataSource, config, { logger });

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port} (${config.nodeEnv})`);
});

// Expired entries would otherwise stay until their key is requested again
const pruneTimer = setInterval(() => {
  const removed = cache.prune();
  if (removed > 0) {
    logger.debug(`Pruned ${removed} expired cache entries`);
  }
}, config.cacheTtlMinutes * 60 * 1000);
pruneTimer.unref();

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  clearInterval(pruneTimer);
  server.close(error => {
    if (error) {
      logger.error('Error while closing server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

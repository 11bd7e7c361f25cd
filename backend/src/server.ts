/**
 * Relative Strength Tournament - Entrypoint
 *
 * Run: npm run dev
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { errorMessage } from './common/errors.js';
import { getEnv } from './config/env.js';
import { createBootLogger, createLogger } from './core/logger.js';
import { RATE_LIMITS, RateLimiterRegistry } from './modules/network/rateLimiter.js';
import { createPriceProviders } from './modules/prices/index.js';
import {
  RankingService,
  RefreshScheduler,
  UniverseCatalog,
  cronExpressionForHours,
  intervalMsForHours,
} from './modules/rankings/index.js';

async function main(): Promise<void> {
  const env = getEnv();
  const logger = createLogger('server');

  const catalog = UniverseCatalog.load({
    stocks: env.SP500_LIMIT,
    etfs: env.ETF_LIMIT,
    commodityEtfs: env.COMMODITY_ETF_LIMIT,
    crypto: env.CRYPTO_LIMIT,
  });

  if (!env.POLYGON_API_KEY) {
    logger.warn({}, 'POLYGON_API_KEY not set, equities refresh will fail');
  }

  const limiters = new RateLimiterRegistry(RATE_LIMITS, env.FETCH_CONCURRENCY);
  const scheduler = new RefreshScheduler({
    catalog,
    providers: createPriceProviders(env, catalog.coinCapAssetIds()),
    limiters,
    maPeriod: env.MA_PERIOD,
    historyBufferWeeks: env.HISTORY_BUFFER_WEEKS,
    intervalMs: intervalMsForHours(env.UPDATE_INTERVAL_HOURS),
    timeoutMs: env.REFRESH_TIMEOUT_MS,
    cronExpression: cronExpressionForHours(env.UPDATE_INTERVAL_HOURS),
    runOnStart: env.REFRESH_ON_START,
    logger: createLogger('refresh'),
  });

  const service = new RankingService(scheduler, { bigBoardCrypto: env.BIG_BOARD_CRYPTO });
  const app = buildApp({ service, config: env });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    scheduler.stop();
    await app.close();
    await limiters.disconnect();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
  logger.info(
    {
      port: env.PORT,
      equities: catalog.members('equities').length,
      crypto: catalog.members('crypto').length,
      maPeriod: env.MA_PERIOD,
    },
    'Server listening'
  );

  scheduler.start();
}

main().catch(err => {
  createBootLogger('server').error({ error: errorMessage(err) }, 'Fatal startup error');
  process.exit(1);
});

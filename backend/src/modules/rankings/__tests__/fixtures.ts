/**
 * Shared test doubles for the rankings module
 */

import { vi } from 'vitest';
import { ProviderError } from '../../../common/errors.js';
import type { Logger } from '../../../core/logger.js';
import { RateLimiterRegistry } from '../../network/rateLimiter.js';
import { WEEK_MS } from '../../prices/price-series.js';
import type { PricePoint, PriceProvider, ProviderId } from '../../prices/price.types.js';
import { RefreshScheduler, type RefreshSchedulerOptions } from '../refresh.scheduler.js';
import { UniverseCatalog, type CatalogFile } from '../universe.catalog.js';

export const MONDAY = Date.UTC(2024, 0, 1);

export const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * In-memory provider: closes per symbol, one point per week from MONDAY.
 */
export class FakeProvider implements PriceProvider {
  readonly calls: string[] = [];
  failAll = false;
  delayMs = 0;

  constructor(
    readonly id: ProviderId,
    private readonly closes: Record<string, number[]>,
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async fetchWeeklyCloses(symbol: string, weeks: number): Promise<PricePoint[]> {
    this.calls.push(symbol);
    if (this.delayMs > 0) await sleep(this.delayMs);

    const closes = this.closes[symbol];
    if (this.failAll || this.failing.has(symbol) || !closes) {
      throw new ProviderError(symbol, 'HTTP 500');
    }
    return closes
      .map((close, i) => ({ ts: MONDAY + i * WEEK_MS, close }))
      .slice(-weeks);
  }
}

export const CATALOG_FILE: CatalogFile = {
  stocks: [
    { symbol: 'AAA', name: 'Alpha Corp' },
    { symbol: 'BBB', name: 'Beta Corp' },
  ],
  etfs: [{ symbol: 'CCC', name: 'Gamma ETF' }],
  commodityEtfs: [],
  crypto: [
    { symbol: 'BTC', name: 'Bitcoin', provider: 'COINCAP', coinCapId: 'bitcoin' },
    { symbol: 'ETH', name: 'Ethereum', provider: 'COINCAP', coinCapId: 'ethereum' },
  ],
};

export const NO_LIMITS = { stocks: 500, etfs: 100, commodityEtfs: 20, crypto: 200 };

export const createTestCatalog = (file: CatalogFile = CATALOG_FILE) => new UniverseCatalog(file, NO_LIMITS);

export const createProviders = () => ({
  POLYGON: new FakeProvider('POLYGON', {
    AAA: [1, 2, 3],
    BBB: [1, 1, 1],
    CCC: [3, 2, 1],
  }),
  COINCAP: new FakeProvider('COINCAP', {
    BTC: [1, 2, 3],
    ETH: [3, 2, 1],
  }),
});

export const createTestLimiters = () =>
  new RateLimiterRegistry({ DEFAULT: { minTime: 0, maxConcurrent: 10 } });

export const createTestScheduler = (overrides: Partial<RefreshSchedulerOptions> = {}) =>
  new RefreshScheduler({
    catalog: createTestCatalog(),
    providers: createProviders(),
    limiters: createTestLimiters(),
    maPeriod: 3,
    historyBufferWeeks: 0,
    intervalMs: 60_000,
    timeoutMs: 5_000,
    runOnStart: false,
    ...overrides,
  });

/**
 * Refresh scheduler tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { NoDataYetError, RefreshError } from '../../../common/errors.js';
import {
  RefreshScheduler,
  cronExpressionForHours,
  intervalMsForHours,
} from '../refresh.scheduler.js';
import type { CatalogFile } from '../universe.catalog.js';
import {
  FakeProvider,
  createMockLogger,
  createProviders,
  createTestCatalog,
  createTestLimiters,
  createTestScheduler,
  sleep,
} from './fixtures.js';

describe('RefreshScheduler', () => {
  let scheduler: RefreshScheduler | undefined;

  afterEach(() => {
    scheduler?.stop();
    scheduler = undefined;
  });

  // ═══════════════════════════════════════════════════════════════
  // READ BEFORE DATA
  // ═══════════════════════════════════════════════════════════════

  it('throws NoDataYetError before the first refresh', () => {
    scheduler = createTestScheduler();

    expect(() => scheduler?.getCurrent('equities')).toThrow(NoDataYetError);
    expect(scheduler.state('equities')).toBe('EMPTY');
  });

  // ═══════════════════════════════════════════════════════════════
  // REFRESH
  // ═══════════════════════════════════════════════════════════════

  it('publishes a ranked snapshot with display names', async () => {
    scheduler = createTestScheduler();
    const snapshot = await scheduler.refresh('equities');

    expect(snapshot.entries.map(e => e.symbol)).toEqual(['AAA', 'BBB', 'CCC']);
    expect(snapshot.entries[0]).toMatchObject({ rank: 1, wins: 2, name: 'Alpha Corp', assetType: 'stock' });
    expect(snapshot.entries[2]).toMatchObject({ name: 'Gamma ETF', assetType: 'etf' });
    expect(snapshot).toMatchObject({ version: 1, universeId: 'equities', assetCount: 3, requestedCount: 3 });
    expect(scheduler.getCurrent('equities')).toBe(snapshot);
    expect(scheduler.state('equities')).toBe('FRESH');
  });

  it('still publishes when a few symbols fail to fetch', async () => {
    const symbols = Array.from({ length: 20 }, (_, i) => `S${String(i).padStart(2, '0')}`);
    const file: CatalogFile = {
      stocks: symbols.map(symbol => ({ symbol, name: symbol })),
      etfs: [],
      commodityEtfs: [],
      crypto: [],
    };
    const closes = Object.fromEntries(symbols.map((s, i): [string, number[]] => [s, [10, 10 + i, 10 + 2 * i]]));
    const polygon = new FakeProvider('POLYGON', closes, new Set(['S07']));

    scheduler = createTestScheduler({ catalog: createTestCatalog(file), providers: { POLYGON: polygon } });
    const snapshot = await scheduler.refresh('equities');

    expect(snapshot.assetCount).toBe(19);
    expect(snapshot.requestedCount).toBe(20);
    expect(snapshot.excluded).toEqual([{ symbol: 'S07', code: 'PROVIDER_ERROR', reason: 'S07: HTTP 500' }]);
    expect(snapshot.entries.some(e => e.symbol === 'S07')).toBe(false);

    const health = scheduler.health('equities');
    expect(health).toMatchObject({ state: 'FRESH', assetCount: 19, requestedCount: 20, excludedCount: 1, lastError: null });
  });

  it('keeps the previous snapshot when every fetch fails', async () => {
    const providers = createProviders();
    scheduler = createTestScheduler({ providers });
    const first = await scheduler.refresh('equities');

    providers.POLYGON.failAll = true;
    await expect(scheduler.refresh('equities')).rejects.toThrow(
      'Refresh of equities failed: no price data fetched for any of 3 symbols'
    );

    expect(scheduler.getCurrent('equities')).toBe(first);
    expect(scheduler.health('equities').lastError).toBe(
      'Refresh of equities failed: no price data fetched for any of 3 symbols'
    );
  });

  it('fails with RefreshError when no symbol has enough history', async () => {
    const short = new FakeProvider('COINCAP', { BTC: [1, 2], ETH: [2, 1] });
    scheduler = createTestScheduler({ providers: { COINCAP: short } });

    const attempt = scheduler.refresh('crypto');
    await expect(attempt).rejects.toBeInstanceOf(RefreshError);
    await expect(attempt).rejects.toThrow('Refresh of crypto failed: no symbol had enough history to rank');
    expect(scheduler.peek('crypto')).toBeUndefined();
  });

  it('excludes symbols whose provider is not configured', async () => {
    scheduler = createTestScheduler({ providers: { POLYGON: createProviders().POLYGON } });

    await expect(scheduler.refresh('crypto')).rejects.toBeInstanceOf(RefreshError);
    const equities = await scheduler.refresh('equities');
    expect(equities.excluded).toEqual([]);
  });

  it('records symbols excluded for short history', async () => {
    const polygon = new FakeProvider('POLYGON', { AAA: [1, 2, 3], BBB: [1, 1, 1], CCC: [2, 1] });
    scheduler = createTestScheduler({ providers: { POLYGON: polygon } });

    const snapshot = await scheduler.refresh('equities');

    expect(snapshot.entries.map(e => e.symbol)).toEqual(['AAA', 'BBB']);
    expect(snapshot.excluded).toEqual([
      { symbol: 'CCC', code: 'INSUFFICIENT_DATA', reason: 'CCC: need 3 points, got 2' },
    ]);
  });

  // ═══════════════════════════════════════════════════════════════
  // CONCURRENCY
  // ═══════════════════════════════════════════════════════════════

  it('joins concurrent refreshes of the same universe', async () => {
    const providers = createProviders();
    providers.POLYGON.delayMs = 20;
    scheduler = createTestScheduler({ providers });

    const a = scheduler.refresh('equities');
    const b = scheduler.refresh('equities');
    expect(b).toBe(a);
    expect(scheduler.isRefreshing('equities')).toBe(true);

    const [sa, sb] = await Promise.all([a, b]);
    expect(sa).toBe(sb);
    expect([...providers.POLYGON.calls].sort()).toEqual(['AAA', 'BBB', 'CCC']);
    expect(scheduler.isRefreshing('equities')).toBe(false);
  });

  it('times out a slow refresh and never publishes its late result', async () => {
    const providers = createProviders();
    providers.POLYGON.delayMs = 100;
    scheduler = createTestScheduler({ providers, timeoutMs: 20 });

    await expect(scheduler.refresh('equities')).rejects.toThrow('Refresh of equities failed: timed out after 20ms');

    await sleep(150);
    expect(scheduler.peek('equities')).toBeUndefined();
    expect(scheduler.state('equities')).toBe('EMPTY');
  });

  it('keeps a timed-out refresh in flight until its fetches finish', async () => {
    const providers = createProviders();
    providers.POLYGON.delayMs = 100;
    scheduler = createTestScheduler({ providers, timeoutMs: 20 });

    await expect(scheduler.refresh('equities')).rejects.toThrow('timed out after 20ms');
    expect(scheduler.isRefreshing('equities')).toBe(true);

    await expect(scheduler.refresh('equities')).rejects.toThrow('timed out after 20ms');
    expect(providers.POLYGON.calls).toHaveLength(3);

    await sleep(150);
    expect(scheduler.isRefreshing('equities')).toBe(false);
    expect(scheduler.peek('equities')).toBeUndefined();

    providers.POLYGON.delayMs = 0;
    const snapshot = await scheduler.refresh('equities');
    expect(snapshot.assetCount).toBe(3);
    expect(providers.POLYGON.calls).toHaveLength(6);
  });

  // ═══════════════════════════════════════════════════════════════
  // STALENESS
  // ═══════════════════════════════════════════════════════════════

  it('serves a stale snapshot and revalidates in the background', async () => {
    const clock = { t: 1_000_000 };
    scheduler = createTestScheduler({ intervalMs: 1_000, now: () => clock.t });

    const first = await scheduler.refresh('equities');
    clock.t += 1_001;

    expect(scheduler.state('equities')).toBe('STALE');
    expect(scheduler.getCurrent('equities')).toBe(first);
    expect(scheduler.isRefreshing('equities')).toBe(true);

    const second = await scheduler.refresh('equities');
    expect(second.version).toBe(2);
    expect(scheduler.state('equities')).toBe('FRESH');
  });

  it('logs a failed background revalidation', async () => {
    const clock = { t: 1_000_000 };
    const logger = createMockLogger();
    const providers = createProviders();
    scheduler = createTestScheduler({ providers, logger, intervalMs: 1_000, now: () => clock.t });

    await scheduler.refresh('equities');
    clock.t += 5_000;
    providers.POLYGON.failAll = true;

    scheduler.getCurrent('equities');
    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledWith(
        { universe: 'equities', error: 'Refresh of equities failed: no price data fetched for any of 3 symbols' },
        'Background refresh failed'
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  it('refreshes every universe on start when asked to', async () => {
    scheduler = createTestScheduler({ runOnStart: true });
    scheduler.start();

    expect(scheduler.isStarted()).toBe(true);
    await vi.waitFor(() => {
      expect(scheduler?.peek('equities')).toBeDefined();
      expect(scheduler?.peek('crypto')).toBeDefined();
    });

    scheduler.stop();
    expect(scheduler.isStarted()).toBe(false);
  });

  it('reports every universe outcome from refreshAll', async () => {
    const providers = createProviders();
    providers.COINCAP.failAll = true;
    scheduler = new RefreshScheduler({
      catalog: createTestCatalog(),
      providers,
      limiters: createTestLimiters(),
      maPeriod: 3,
      historyBufferWeeks: 0,
      intervalMs: 60_000,
      timeoutMs: 5_000,
    });

    const outcomes = await scheduler.refreshAll();

    expect(outcomes.map(o => [o.universeId, o.ok])).toEqual([
      ['equities', true],
      ['crypto', false],
    ]);
  });
});

describe('schedule helpers', () => {
  it('builds an hourly cron expression', () => {
    expect(cronExpressionForHours(1)).toBe('0 */1 * * *');
    expect(cronExpressionForHours(6)).toBe('0 */6 * * *');
    expect(cronExpressionForHours(24)).toBe('0 0 * * *');
  });

  it('converts hours to milliseconds', () => {
    expect(intervalMsForHours(2)).toBe(7_200_000);
  });
});

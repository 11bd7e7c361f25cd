/**
 * REFRESH SCHEDULER
 * =================
 *
 * Owns the ranking snapshots and keeps them current.
 *
 *   EMPTY ──refresh ok──▶ FRESH ──interval passes──▶ STALE ──refresh ok──▶ FRESH
 *                           ▲                          │
 *                           └──── refresh failed: last good snapshot kept
 *
 * - Reads never wait on a refresh; a stale read kicks one off in the
 *   background (stale-while-revalidate).
 * - At most one refresh per universe runs at a time; concurrent callers
 *   join it.
 * - A refresh publishes only when it completes inside REFRESH_TIMEOUT_MS;
 *   a timed-out run still holds its universe until its fetches finish.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { v4 as uuidv4 } from 'uuid';
import {
  AppError,
  EmptyUniverseError,
  NoDataYetError,
  ProviderError,
  RefreshError,
  errorMessage,
} from '../../common/errors.js';
import type { Logger } from '../../core/logger.js';
import { silentLogger } from '../../core/logger.js';
import { RateLimiterRegistry } from '../network/rateLimiter.js';
import { buildPriceUniverse, createPriceSeries } from '../prices/price-series.js';
import type { PriceProviderRegistry, PriceSeries } from '../prices/price.types.js';
import { RankBuilder, TournamentRunner, formatRankingsSummary, type AssetMeta } from '../tournament/index.js';
import { InflightRegistry, type InflightTask } from './inflight.registry.js';
import { SnapshotStore } from './snapshot.store.js';
import {
  UNIVERSE_IDS,
  type ExcludedSymbol,
  type RankingSnapshot,
  type SnapshotDraft,
  type SnapshotState,
  type UniverseHealth,
  type UniverseId,
  type UniverseMember,
} from './rankings.types.js';

export interface UniverseSource {
  members(universeId: UniverseId): readonly UniverseMember[];
  metadata(universeId: UniverseId): ReadonlyMap<string, AssetMeta>;
}

export interface RefreshSchedulerOptions {
  catalog: UniverseSource;
  providers: PriceProviderRegistry;
  maPeriod: number;
  historyBufferWeeks: number;
  intervalMs: number;
  timeoutMs: number;
  cronExpression?: string;
  runOnStart?: boolean;
  universes?: readonly UniverseId[];
  limiters?: RateLimiterRegistry;
  store?: SnapshotStore;
  logger?: Logger;
  now?: () => number;
}

export type RefreshOutcome =
  | { universeId: UniverseId; ok: true; snapshot: RankingSnapshot }
  | { universeId: UniverseId; ok: false; error: RefreshError };

interface AttemptRecord {
  lastAttemptAt: number;
  lastError: string | null;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Top of the hour, every `hours` hours (UTC). `hours` divides 24, so the
 * gaps stay even across midnight.
 */
export function cronExpressionForHours(hours: number): string {
  return hours >= 24 ? '0 0 * * *' : `0 */${hours} * * *`;
}

export function intervalMsForHours(hours: number): number {
  return hours * HOUR_MS;
}

export class RefreshScheduler {
  private readonly catalog: UniverseSource;
  private readonly providers: PriceProviderRegistry;
  private readonly limiters: RateLimiterRegistry;
  private readonly store: SnapshotStore;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly runner: TournamentRunner;
  private readonly rankBuilder = new RankBuilder();
  private readonly inflight = new InflightRegistry<UniverseId, RankingSnapshot>();
  private readonly attempts = new Map<UniverseId, AttemptRecord>();

  private readonly historyWeeks: number;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly cronExpression: string;
  private readonly runOnStart: boolean;
  readonly universes: readonly UniverseId[];

  private task: ScheduledTask | null = null;

  constructor(options: RefreshSchedulerOptions) {
    this.catalog = options.catalog;
    this.providers = options.providers;
    this.limiters = options.limiters ?? new RateLimiterRegistry();
    this.store = options.store ?? new SnapshotStore();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.runner = new TournamentRunner({ maPeriod: options.maPeriod, logger: this.logger, now: this.now });

    this.historyWeeks = options.maPeriod + options.historyBufferWeeks;
    this.intervalMs = options.intervalMs;
    this.timeoutMs = options.timeoutMs;
    this.cronExpression = options.cronExpression ?? '0 * * * *';
    this.runOnStart = options.runOnStart ?? true;
    this.universes = options.universes ?? UNIVERSE_IDS;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.task) {
      this.logger.info({}, 'Refresh scheduler already running');
      return;
    }

    this.task = cron.schedule(this.cronExpression, () => {
      void this.refreshAll();
    }, { timezone: 'UTC' });

    this.logger.info({ cron: this.cronExpression, universes: this.universes }, 'Refresh scheduler started');

    if (this.runOnStart) {
      void this.refreshAll();
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info({}, 'Refresh scheduler stopped');
    }
  }

  isStarted(): boolean {
    return this.task !== null;
  }

  // ═══════════════════════════════════════════════════════════════
  // READ
  // ═══════════════════════════════════════════════════════════════

  /**
   * Latest snapshot, even when stale. Never waits on a refresh.
   */
  getCurrent(universeId: UniverseId): RankingSnapshot {
    const snapshot = this.store.get(universeId);
    if (!snapshot) {
      throw new NoDataYetError(universeId);
    }

    if (this.state(universeId) === 'STALE') {
      this.revalidateInBackground(universeId);
    }

    return snapshot;
  }

  peek(universeId: UniverseId): RankingSnapshot | undefined {
    return this.store.get(universeId);
  }

  state(universeId: UniverseId): SnapshotState {
    return this.store.state(universeId, this.now(), this.intervalMs);
  }

  isRefreshing(universeId: UniverseId): boolean {
    return this.inflight.has(universeId);
  }

  health(universeId: UniverseId): UniverseHealth {
    const snapshot = this.store.get(universeId);
    const attempt = this.attempts.get(universeId);
    return {
      state: this.state(universeId),
      lastSuccessfulRefreshAt: snapshot ? new Date(snapshot.computedAt).toISOString() : null,
      lastAttemptAt: attempt ? new Date(attempt.lastAttemptAt).toISOString() : null,
      assetCount: snapshot?.assetCount ?? 0,
      requestedCount: snapshot?.requestedCount ?? this.catalog.members(universeId).length,
      excludedCount: snapshot?.excluded.length ?? 0,
      refreshing: this.isRefreshing(universeId),
      lastError: attempt?.lastError ?? null,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // REFRESH
  // ═══════════════════════════════════════════════════════════════

  /**
   * Recompute one universe. Joins a refresh already in flight.
   * Rejects with RefreshError; the previous snapshot stays published.
   */
  refresh(universeId: UniverseId): Promise<RankingSnapshot> {
    return this.inflight.run(universeId, () => this.startRefresh(universeId));
  }

  /**
   * Refresh every universe; waits for all of them to settle.
   */
  async refreshAll(): Promise<RefreshOutcome[]> {
    const settled = await Promise.allSettled(this.universes.map(id => this.refresh(id)));

    return settled.map((r, i): RefreshOutcome => {
      const universeId = this.universes[i];
      if (r.status === 'fulfilled') {
        return { universeId, ok: true, snapshot: r.value };
      }
      return { universeId, ok: false, error: toRefreshError(universeId, r.reason) };
    });
  }

  private revalidateInBackground(universeId: UniverseId): void {
    if (this.inflight.has(universeId)) return;

    this.logger.debug({ universe: universeId }, 'Snapshot stale, revalidating');
    void this.refresh(universeId).catch(err => {
      this.logger.warn({ universe: universeId, error: errorMessage(err) }, 'Background refresh failed');
    });
  }

  private startRefresh(universeId: UniverseId): InflightTask<RankingSnapshot> {
    const runId = uuidv4();
    const startedAt = this.now();
    const previousError = this.attempts.get(universeId)?.lastError ?? null;
    this.attempts.set(universeId, { lastAttemptAt: startedAt, lastError: previousError });

    this.logger.info({ universe: universeId, runId }, 'Refresh started');

    let abandoned = false;
    const work = this.compute(universeId, runId, startedAt).then(draft => {
      if (abandoned) {
        this.logger.warn({ universe: universeId, runId }, 'Late refresh result discarded');
        throw new RefreshError(universeId, `timed out after ${this.timeoutMs}ms`);
      }
      return this.publish(universeId, runId, startedAt, draft);
    });

    // The universe stays in flight until the work itself settles, past any timeout
    const settled = work.then(noop, noop);

    const result = this.withTimeout(universeId, settled.then(() => work), () => {
      abandoned = true;
    }).catch((err: unknown) => {
      const error = toRefreshError(universeId, err);
      this.attempts.set(universeId, { lastAttemptAt: startedAt, lastError: error.message });
      this.logger.error({ universe: universeId, runId, error: error.message }, 'Refresh failed');
      throw error;
    });

    return { result, settled };
  }

  private publish(universeId: UniverseId, runId: string, startedAt: number, draft: SnapshotDraft): RankingSnapshot {
    const snapshot = this.store.publish(draft);
    this.attempts.set(universeId, { lastAttemptAt: startedAt, lastError: null });

    this.logger.info(
      {
        universe: universeId,
        runId,
        version: snapshot.version,
        ranked: snapshot.assetCount,
        requested: snapshot.requestedCount,
        excluded: snapshot.excluded.length,
        durationMs: snapshot.durationMs,
      },
      'Refresh published'
    );
    this.logger.info({ universe: universeId }, `Top ${universeId}\n${formatRankingsSummary(snapshot.entries)}`);

    return snapshot;
  }

  private async compute(universeId: UniverseId, runId: string, startedAt: number): Promise<SnapshotDraft> {
    const members = this.catalog.members(universeId);
    if (members.length === 0) {
      throw new RefreshError(universeId, 'universe has no members');
    }

    const settled = await Promise.allSettled(members.map(m => this.fetchMember(m)));

    const series: PriceSeries[] = [];
    const excluded: ExcludedSymbol[] = [];
    settled.forEach((r, i) => {
      if (r.status === 'fulfilled') {
        series.push(r.value);
      } else {
        excluded.push({
          symbol: members[i].symbol,
          code: r.reason instanceof AppError ? r.reason.code : 'PROVIDER_ERROR',
          reason: errorMessage(r.reason),
        });
      }
    });

    if (excluded.length > 0) {
      this.logger.warn(
        { universe: universeId, failed: excluded.length, sample: excluded.slice(0, 5).map(e => e.reason) },
        'Some symbols could not be fetched'
      );
    }

    if (series.length === 0) {
      throw new RefreshError(universeId, `no price data fetched for any of ${members.length} symbols`);
    }

    const result = this.runner.run(buildPriceUniverse(series));
    for (const err of result.excluded) {
      excluded.push({ symbol: err.symbol ?? '', code: err.code, reason: err.message });
    }

    const entries = this.rankBuilder.build(result.tallies.values(), this.catalog.metadata(universeId));
    const computedAt = this.now();

    return {
      id: runId,
      universeId,
      computedAt,
      entries,
      assetCount: entries.length,
      requestedCount: members.length,
      excluded,
      stats: result.stats,
      durationMs: computedAt - startedAt,
    };
  }

  private async fetchMember(member: UniverseMember): Promise<PriceSeries> {
    const provider = this.providers[member.provider];
    if (!provider) {
      throw new ProviderError(member.symbol, `provider ${member.provider} not configured`);
    }

    const points = await this.limiters.schedule(member.provider, () =>
      provider.fetchWeeklyCloses(member.symbol, this.historyWeeks)
    );
    return createPriceSeries(member.symbol, points);
  }

  /**
   * Settles with the task, or rejects with RefreshError once the budget
   * runs out and calls `onTimeout`. The task's own late outcome is dropped.
   */
  private withTimeout<T>(universeId: UniverseId, task: Promise<T>, onTimeout: () => void): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        onTimeout();
        reject(new RefreshError(universeId, `timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      task
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch(err => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }
}

function noop(): void {}

function toRefreshError(universeId: UniverseId, err: unknown): RefreshError {
  if (err instanceof RefreshError) return err;
  if (err instanceof EmptyUniverseError) {
    return new RefreshError(universeId, 'no symbol had enough history to rank', { cause: err });
  }
  return new RefreshError(universeId, errorMessage(err), { cause: err });
}

/**
 * RANKINGS SERVICE
 * ================
 *
 * Read and refresh contract over the scheduler's snapshots.
 * Asset lookups search equities first, then crypto.
 *
 * Big board = every ranked equity + the top BIG_BOARD_CRYPTO coins, merged
 * by win rate (the two universes play separate tournaments, so raw win
 * counts are not comparable).
 */

import { NoDataYetError, NotFoundError, RefreshError, ValidationError } from '../../common/errors.js';
import type { RankedEntry } from '../tournament/tournament.types.js';
import type { RefreshScheduler } from './refresh.scheduler.js';
import {
  UNIVERSE_IDS,
  type HealthReport,
  type HealthStatus,
  type RankingSnapshot,
  type SnapshotState,
  type UniverseHealth,
  type UniverseId,
} from './rankings.types.js';

export interface RankingsView {
  universeId: UniverseId;
  state: SnapshotState;
  computedAt: string;
  version: number;
  totalRanked: number;
  requestedCount: number;
  excludedCount: number;
  entries: RankedEntry[];
}

export interface AssetDetail {
  universeId: UniverseId;
  computedAt: string;
  entry: RankedEntry;
}

export interface BoardEntry extends RankedEntry {
  readonly universeId: UniverseId;
  /** Rank inside the entry's own universe. */
  readonly universeRank: number;
}

export interface BoardSource {
  state: SnapshotState;
  version: number;
  computedAt: string;
}

export interface BigBoardView {
  computedAt: string;
  sources: Partial<Record<UniverseId, BoardSource>>;
  totalRanked: number;
  cryptoIncluded: number;
  entries: BoardEntry[];
}

export interface RankingServiceOptions {
  /** Top crypto entries merged into the big board; 0 leaves it equities only. */
  bigBoardCrypto?: number;
  now?: () => number;
}

export const DEFAULT_BIG_BOARD_CRYPTO = 20;

export class RankingService {
  private readonly bigBoardCrypto: number;
  private readonly now: () => number;

  constructor(
    private readonly scheduler: RefreshScheduler,
    options: RankingServiceOptions = {}
  ) {
    this.bigBoardCrypto = options.bigBoardCrypto ?? DEFAULT_BIG_BOARD_CRYPTO;
    this.now = options.now ?? Date.now;
  }

  /**
   * First `limit` entries of the current snapshot (all when omitted).
   */
  getCurrentRankings(universeId: UniverseId, limit?: number): RankingsView {
    assertLimit(limit);

    const snapshot = this.scheduler.getCurrent(universeId);
    return {
      universeId,
      state: this.scheduler.state(universeId),
      computedAt: new Date(snapshot.computedAt).toISOString(),
      version: snapshot.version,
      totalRanked: snapshot.assetCount,
      requestedCount: snapshot.requestedCount,
      excludedCount: snapshot.excluded.length,
      entries: snapshot.entries.slice(0, limit ?? snapshot.entries.length),
    };
  }

  /**
   * Equities plus the top crypto entries, re-ranked by win rate. Needs the
   * equities snapshot; crypto joins once it has been computed.
   */
  getBigBoard(limit?: number): BigBoardView {
    assertLimit(limit);

    const equities = this.scheduler.getCurrent('equities');
    const crypto = this.bigBoardCrypto > 0 && this.scheduler.peek('crypto') ? this.scheduler.getCurrent('crypto') : undefined;
    const included = crypto ? crypto.entries.slice(0, this.bigBoardCrypto) : [];

    const seen = new Set<string>();
    const pool: BoardEntry[] = [];
    const add = (universeId: UniverseId, entries: readonly RankedEntry[]) => {
      for (const e of entries) {
        if (seen.has(e.symbol)) continue;
        seen.add(e.symbol);
        pool.push({ ...e, universeId, universeRank: e.rank });
      }
    };
    add('equities', equities.entries);
    add('crypto', included);

    const ranked = pool.sort(compareBoardEntries).map((e, i): BoardEntry => ({ ...e, rank: i + 1 }));

    const sources: Partial<Record<UniverseId, BoardSource>> = { equities: this.source('equities', equities) };
    if (crypto) sources.crypto = this.source('crypto', crypto);

    return {
      computedAt: new Date(Math.min(equities.computedAt, crypto?.computedAt ?? Infinity)).toISOString(),
      sources,
      totalRanked: ranked.length,
      cryptoIncluded: ranked.filter(e => e.universeId === 'crypto').length,
      entries: ranked.slice(0, limit ?? ranked.length),
    };
  }

  getAssetDetail(symbol: string): AssetDetail {
    const wanted = symbol.trim().toUpperCase();
    if (!wanted) {
      throw new ValidationError('symbol is required');
    }

    const notLoaded: UniverseId[] = [];
    for (const universeId of UNIVERSE_IDS) {
      if (!this.scheduler.peek(universeId)) {
        notLoaded.push(universeId);
        continue;
      }

      const snapshot = this.scheduler.getCurrent(universeId);
      const entry = snapshot.entries.find(e => e.symbol.toUpperCase() === wanted);
      if (entry) {
        return { universeId, computedAt: new Date(snapshot.computedAt).toISOString(), entry };
      }
    }

    // Cannot rule the symbol out while a universe has never loaded
    if (notLoaded.length > 0) {
      throw new NoDataYetError(notLoaded.join(', '));
    }
    throw new NotFoundError(`Asset ${wanted} not found in any ranking`);
  }

  /**
   * Refresh one universe, or all of them. With no id, every refresh runs
   * to completion before a failure is reported.
   */
  async triggerRefresh(universeId?: UniverseId): Promise<RankingSnapshot[]> {
    if (universeId) {
      return [await this.scheduler.refresh(universeId)];
    }

    const outcomes = await this.scheduler.refreshAll();
    const snapshots: RankingSnapshot[] = [];
    const failures: RefreshError[] = [];
    for (const o of outcomes) {
      if (o.ok) snapshots.push(o.snapshot);
      else failures.push(o.error);
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new RefreshError(
        failures.map(f => f.universeId).join(', '),
        failures.map(f => f.message).join('; ')
      );
    }
    return snapshots;
  }

  getHealth(): HealthReport {
    const universes: Record<UniverseId, UniverseHealth> = {
      equities: this.scheduler.health('equities'),
      crypto: this.scheduler.health('crypto'),
    };

    return {
      status: overallStatus(Object.values(universes)),
      timestamp: new Date(this.now()).toISOString(),
      universes,
    };
  }

  private source(universeId: UniverseId, snapshot: RankingSnapshot): BoardSource {
    return {
      state: this.scheduler.state(universeId),
      version: snapshot.version,
      computedAt: new Date(snapshot.computedAt).toISOString(),
    };
  }
}

function assertLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
  }
}

function compareBoardEntries(a: BoardEntry, b: BoardEntry): number {
  if (a.winRate !== b.winRate) return b.winRate - a.winRate;
  if (a.percentAboveMa !== b.percentAboveMa) return b.percentAboveMa - a.percentAboveMa;
  if (a.symbol === b.symbol) return 0;
  return a.symbol < b.symbol ? -1 : 1;
}

function overallStatus(universes: UniverseHealth[]): HealthStatus {
  if (universes.every(u => u.state === 'EMPTY')) return 'starting';
  if (universes.some(u => u.state !== 'FRESH' || u.lastError !== null)) return 'degraded';
  return 'ok';
}

/**
 * RANKINGS TYPES
 * ==============
 */

import type { ProviderId } from '../prices/price.types.js';
import type { AssetType, RankedEntry, TournamentStats } from '../tournament/tournament.types.js';

export type UniverseId = 'equities' | 'crypto';

export const UNIVERSE_IDS: readonly UniverseId[] = ['equities', 'crypto'];

export interface UniverseMember {
  symbol: string;
  name: string;
  assetType: AssetType;
  provider: ProviderId;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════

export interface ExcludedSymbol {
  symbol: string;
  code: string;       // PROVIDER_ERROR | INSUFFICIENT_DATA
  reason: string;
}

export interface RankingSnapshot {
  readonly id: string;
  readonly version: number;
  readonly universeId: UniverseId;
  readonly computedAt: number;
  readonly entries: readonly RankedEntry[];
  readonly assetCount: number;        // ranked symbols
  readonly requestedCount: number;    // catalog members asked for
  readonly excluded: readonly ExcludedSymbol[];
  readonly stats: TournamentStats;
  readonly durationMs: number;        // fetch + tournament
}

export type SnapshotDraft = Omit<RankingSnapshot, 'version'>;

/**
 * EMPTY: never computed. FRESH: age ≤ refresh interval. STALE: older.
 */
export type SnapshotState = 'EMPTY' | 'FRESH' | 'STALE';

// ═══════════════════════════════════════════════════════════════
// HEALTH
// ═══════════════════════════════════════════════════════════════

export interface UniverseHealth {
  state: SnapshotState;
  lastSuccessfulRefreshAt: string | null;
  lastAttemptAt: string | null;
  assetCount: number;
  requestedCount: number;
  excludedCount: number;
  refreshing: boolean;
  lastError: string | null;
}

export type HealthStatus = 'ok' | 'degraded' | 'starting';

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  universes: Record<UniverseId, UniverseHealth>;
}

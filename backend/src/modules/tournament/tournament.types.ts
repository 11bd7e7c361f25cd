/**
 * TOURNAMENT TYPES
 * ================
 * Round-robin relative strength: every asset meets every other asset
 * through the synthetic ratio priceA / priceB.
 */

import type { InsufficientDataError } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// RATIO / MATCHUP
// ═══════════════════════════════════════════════════════════════

export interface RatioPoint {
  ts: number;
  ratio: number;
}

export interface RatioSeries {
  numerator: string;
  denominator: string;
  points: RatioPoint[];   // ascending, timestamps present in both legs only
}

interface MatchBase {
  numerator: string;
  denominator: string;
  latestRatio: number;
  ratioMa: number;
  margin: number;         // (latestRatio - ratioMa) / ratioMa, informational
}

export interface MatchDecided extends MatchBase {
  kind: 'DECIDED';
  winner: string;
  loser: string;
}

export interface MatchTie extends MatchBase {
  kind: 'TIE';
}

export type NotEvaluableReason = 'INSUFFICIENT_ALIGNED_DATA' | 'NON_POSITIVE_PRICE';

export interface NotEvaluable {
  kind: 'NOT_EVALUABLE';
  numerator: string;
  denominator: string;
  reason: NotEvaluableReason;
  alignedPoints: number;
}

export type MatchResult = MatchDecided | MatchTie;
export type MatchOutcome = MatchResult | NotEvaluable;

// ═══════════════════════════════════════════════════════════════
// TALLIES
// ═══════════════════════════════════════════════════════════════

export interface AssetTally {
  symbol: string;
  wins: number;
  losses: number;
  ties: number;
  totalMatchups: number;      // evaluable matchups (decided + tied)
  percentAboveMa: number;     // own price vs own MA, percentage points
  currentPrice: number;
  movingAverage: number;
}

export interface TournamentStats {
  eligible: number;
  excluded: number;
  pairs: number;
  decided: number;
  ties: number;
  skipped: number;
  durationMs: number;
}

export interface TournamentResult {
  tallies: ReadonlyMap<string, Readonly<AssetTally>>;
  excluded: InsufficientDataError[];
  stats: TournamentStats;
}

// ═══════════════════════════════════════════════════════════════
// RANKING
// ═══════════════════════════════════════════════════════════════

export type AssetType = 'stock' | 'etf' | 'commodity_etf' | 'crypto';

export interface AssetMeta {
  name: string;
  assetType: AssetType;
}

export interface RankedEntry {
  readonly rank: number;
  readonly symbol: string;
  readonly name?: string;
  readonly assetType?: AssetType;
  readonly wins: number;
  readonly losses: number;
  readonly ties: number;
  readonly totalMatchups: number;
  readonly winRate: number;          // % of matchups won, 1 decimal
  readonly percentAboveMa: number;
  readonly currentPrice: number;
  readonly movingAverage: number;
  readonly aboveMa: boolean;
}

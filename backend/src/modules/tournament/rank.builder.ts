/**
 * RANK BUILDER
 * ============
 *
 * Orders tallies into a ranked list:
 *   1. wins, descending
 *   2. percentAboveMa, descending
 *   3. symbol, ascending (code-unit order)
 * Ranks are 1..N with no gaps.
 */

import { EmptyUniverseError } from '../../common/errors.js';
import type { AssetMeta, AssetTally, RankedEntry } from './tournament.types.js';

export function compareTallies(a: Readonly<AssetTally>, b: Readonly<AssetTally>): number {
  if (a.wins !== b.wins) return b.wins - a.wins;
  if (a.percentAboveMa !== b.percentAboveMa) return b.percentAboveMa - a.percentAboveMa;
  if (a.symbol === b.symbol) return 0;
  return a.symbol < b.symbol ? -1 : 1;
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export class RankBuilder {
  build(
    tallies: Iterable<Readonly<AssetTally>>,
    metadata?: ReadonlyMap<string, AssetMeta>
  ): RankedEntry[] {
    const ordered = [...tallies].sort(compareTallies);
    if (ordered.length === 0) {
      throw new EmptyUniverseError();
    }

    return ordered.map((t, i) => {
      const meta = metadata?.get(t.symbol);
      return Object.freeze({
        rank: i + 1,
        symbol: t.symbol,
        ...(meta ? { name: meta.name, assetType: meta.assetType } : {}),
        wins: t.wins,
        losses: t.losses,
        ties: t.ties,
        totalMatchups: t.totalMatchups,
        winRate: t.totalMatchups > 0 ? round((t.wins / t.totalMatchups) * 100, 1) : 0,
        percentAboveMa: t.percentAboveMa,
        currentPrice: t.currentPrice,
        movingAverage: t.movingAverage,
        aboveMa: t.currentPrice > t.movingAverage,
      });
    });
  }
}

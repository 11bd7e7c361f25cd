/**
 * PRICE SERIES: construction and eligibility
 * ==========================================
 */

import { AppError, InsufficientDataError } from '../../common/errors.js';
import type { PricePoint, PriceSeries, PriceUniverse } from './price.types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const WEEK_MS = 7 * DAY_MS;

/**
 * Monday 00:00 UTC of the week containing ts.
 */
export function weekStart(ts: number): number {
  const d = new Date(ts);
  const midnight = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
  const daysSinceMonday = (d.getUTCDay() + 6) % 7;
  return midnight - daysSinceMonday * DAY_MS;
}

/**
 * Immutable series: sorted ascending, one point per ts (last one wins),
 * non-finite values dropped.
 */
export function createPriceSeries(symbol: string, points: Iterable<PricePoint>): PriceSeries {
  const byTs = new Map<number, number>();
  for (const p of points) {
    if (!Number.isFinite(p.ts) || !Number.isFinite(p.close)) continue;
    byTs.set(p.ts, p.close);
  }

  const sorted = [...byTs.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([ts, close]) => Object.freeze({ ts, close }));

  return Object.freeze({ symbol, points: Object.freeze(sorted) });
}

/**
 * Collapse daily closes into weekly closes: the last close seen in each
 * week becomes that week's close.
 */
export function toWeeklyCloses(daily: Iterable<PricePoint>): PricePoint[] {
  const ordered = [...daily]
    .filter(p => Number.isFinite(p.ts) && Number.isFinite(p.close))
    .sort((a, b) => a.ts - b.ts);

  const weeks = new Map<number, number>();
  for (const p of ordered) {
    weeks.set(weekStart(p.ts), p.close);
  }

  return [...weeks.entries()].map(([ts, close]) => ({ ts, close }));
}

/**
 * Keep only the most recent `count` points.
 */
export function takeLatest(points: PricePoint[], count: number): PricePoint[] {
  return points.length > count ? points.slice(points.length - count) : points;
}

// ═══════════════════════════════════════════════════════════════
// UNIVERSE
// ═══════════════════════════════════════════════════════════════

export function buildPriceUniverse(series: Iterable<PriceSeries>): PriceUniverse {
  const universe = new Map<string, PriceSeries>();
  for (const s of series) {
    if (universe.has(s.symbol)) {
      throw new AppError('DUPLICATE_SYMBOL', `Symbol ${s.symbol} appears twice in the universe`, 500);
    }
    universe.set(s.symbol, s);
  }
  return universe;
}

export interface EligibilitySplit {
  eligible: PriceUniverse;
  excluded: InsufficientDataError[];
}

/**
 * Separate series long enough for an MA_PERIOD average from the rest.
 */
export function partitionEligible(universe: PriceUniverse, maPeriod: number): EligibilitySplit {
  const eligible = new Map<string, PriceSeries>();
  const excluded: InsufficientDataError[] = [];

  for (const [symbol, series] of universe) {
    if (series.points.length >= maPeriod) {
      eligible.set(symbol, series);
    } else {
      excluded.push(new InsufficientDataError(maPeriod, series.points.length, symbol));
    }
  }

  return { eligible, excluded };
}

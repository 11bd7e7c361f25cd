/**
 * RATIO ENGINE
 * ============
 *
 * One matchup: build the ratio A/B over the timestamps both assets share,
 * take its trailing MA, and compare the latest ratio to it.
 *
 *   latest > MA  → numerator wins
 *   latest < MA  → denominator wins
 *   latest == MA → tie (no winner)
 *
 * The pair is always evaluated with the lexicographically smaller symbol
 * as numerator, so evaluate(a, b) and evaluate(b, a) agree.
 */

import { DivisionByZeroError } from '../../common/errors.js';
import type { PriceSeries } from '../prices/price.types.js';
import { currentMovingAverage } from './moving-average.js';
import type { MatchOutcome, NotEvaluable, NotEvaluableReason, RatioSeries } from './tournament.types.js';

interface AlignedPoint {
  ts: number;
  num: number;
  den: number;
}

/**
 * Inner join on ts, newest first walk, returned ascending.
 * Stops after `limit` shared points when given.
 */
function alignTail(num: PriceSeries, den: PriceSeries, limit = Infinity): AlignedPoint[] {
  const out: AlignedPoint[] = [];
  let i = num.points.length - 1;
  let j = den.points.length - 1;

  while (i >= 0 && j >= 0 && out.length < limit) {
    const a = num.points[i];
    const b = den.points[j];
    if (a.ts === b.ts) {
      out.push({ ts: a.ts, num: a.close, den: b.close });
      i--;
      j--;
    } else if (a.ts > b.ts) {
      i--;
    } else {
      j--;
    }
  }

  return out.reverse();
}

/**
 * Ratio num/den at every shared timestamp.
 * Throws DivisionByZeroError on a non-positive price in either leg.
 */
export function buildRatioSeries(num: PriceSeries, den: PriceSeries, limit?: number): RatioSeries {
  const points = alignTail(num, den, limit).map(p => {
    if (!(p.den > 0)) throw new DivisionByZeroError(den.symbol, p.ts);
    if (!(p.num > 0)) throw new DivisionByZeroError(num.symbol, p.ts);
    return { ts: p.ts, ratio: p.num / p.den };
  });

  return { numerator: num.symbol, denominator: den.symbol, points };
}

const TIE_ULPS = 4;

/**
 * Latest ratio and MA are equal to within TIE_ULPS units in the last place
 * of the larger magnitude.
 */
export function ratiosTie(latest: number, ma: number): boolean {
  return Math.abs(latest - ma) <= TIE_ULPS * Number.EPSILON * Math.max(Math.abs(latest), Math.abs(ma));
}

export class RatioEngine {
  constructor(private readonly maPeriod: number) {}

  evaluate(a: PriceSeries, b: PriceSeries): MatchOutcome {
    const [num, den] = a.symbol <= b.symbol ? [a, b] : [b, a];

    let series: RatioSeries;
    try {
      // Only the trailing window feeds the MA
      series = buildRatioSeries(num, den, this.maPeriod);
    } catch (err) {
      if (err instanceof DivisionByZeroError) {
        return notEvaluable(num, den, 'NON_POSITIVE_PRICE', 0);
      }
      throw err;
    }

    if (series.points.length < this.maPeriod) {
      return notEvaluable(num, den, 'INSUFFICIENT_ALIGNED_DATA', series.points.length);
    }

    const ratios = series.points.map(p => p.ratio);
    const ratioMa = currentMovingAverage(ratios, this.maPeriod);
    const latestRatio = ratios[ratios.length - 1];
    const base = {
      numerator: num.symbol,
      denominator: den.symbol,
      latestRatio,
      ratioMa,
      margin: (latestRatio - ratioMa) / ratioMa,
    };

    if (ratiosTie(latestRatio, ratioMa)) {
      return { kind: 'TIE', ...base };
    }

    return latestRatio > ratioMa
      ? { kind: 'DECIDED', winner: num.symbol, loser: den.symbol, ...base }
      : { kind: 'DECIDED', winner: den.symbol, loser: num.symbol, ...base };
  }
}

function notEvaluable(
  num: PriceSeries,
  den: PriceSeries,
  reason: NotEvaluableReason,
  alignedPoints: number
): NotEvaluable {
  return { kind: 'NOT_EVALUABLE', numerator: num.symbol, denominator: den.symbol, reason, alignedPoints };
}

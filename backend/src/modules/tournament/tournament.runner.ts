/**
 * TOURNAMENT RUNNER
 * =================
 *
 * Plays every unordered pair of eligible assets exactly once and
 * accumulates wins, losses and ties per asset. Pair outcomes are
 * independent, so the pass is a pure function of the input universe.
 */

import type { Logger } from '../../core/logger.js';
import { silentLogger } from '../../core/logger.js';
import { partitionEligible } from '../prices/price-series.js';
import type { PriceSeries, PriceUniverse } from '../prices/price.types.js';
import { currentMovingAverage } from './moving-average.js';
import { RatioEngine } from './ratio.engine.js';
import type { AssetTally, TournamentResult, TournamentStats } from './tournament.types.js';

export interface TournamentRunnerOptions {
  maPeriod: number;
  logger?: Logger;
  progressEvery?: number;
  now?: () => number;
}

const DEFAULT_PROGRESS_EVERY = 10_000;

/**
 * Own-price distance from own MA, in percentage points.
 * A non-positive MA yields 0.
 */
export function ownMaDistance(
  series: PriceSeries,
  maPeriod: number
): Pick<AssetTally, 'currentPrice' | 'movingAverage' | 'percentAboveMa'> {
  const closes = series.points.map(p => p.close);
  const movingAverage = currentMovingAverage(closes, maPeriod);
  const currentPrice = closes[closes.length - 1];
  const percentAboveMa = movingAverage > 0 ? ((currentPrice - movingAverage) / movingAverage) * 100 : 0;
  return { currentPrice, movingAverage, percentAboveMa };
}

export class TournamentRunner {
  private readonly maPeriod: number;
  private readonly engine: RatioEngine;
  private readonly logger: Logger;
  private readonly progressEvery: number;
  private readonly now: () => number;

  constructor(options: TournamentRunnerOptions) {
    this.maPeriod = options.maPeriod;
    this.engine = new RatioEngine(options.maPeriod);
    this.logger = options.logger ?? silentLogger;
    this.progressEvery = options.progressEvery ?? DEFAULT_PROGRESS_EVERY;
    this.now = options.now ?? Date.now;
  }

  run(universe: PriceUniverse): TournamentResult {
    const started = this.now();
    const { eligible, excluded } = partitionEligible(universe, this.maPeriod);

    for (const err of excluded) {
      this.logger.debug({ symbol: err.symbol, have: err.actual, need: err.required }, 'Excluded from tournament');
    }

    const symbols = [...eligible.keys()].sort();
    const series: PriceSeries[] = [];
    const tallies = new Map<string, AssetTally>();

    for (const symbol of symbols) {
      const s = eligible.get(symbol);
      if (!s) continue;
      series.push(s);
      tallies.set(symbol, {
        symbol,
        wins: 0,
        losses: 0,
        ties: 0,
        totalMatchups: 0,
        ...ownMaDistance(s, this.maPeriod),
      });
    }

    const totalPairs = (series.length * (series.length - 1)) / 2;
    const stats: TournamentStats = {
      eligible: series.length,
      excluded: excluded.length,
      pairs: 0,
      decided: 0,
      ties: 0,
      skipped: 0,
      durationMs: 0,
    };

    for (let i = 0; i < series.length; i++) {
      for (let j = i + 1; j < series.length; j++) {
        const outcome = this.engine.evaluate(series[i], series[j]);
        stats.pairs++;

        switch (outcome.kind) {
          case 'DECIDED': {
            const winner = tallies.get(outcome.winner);
            const loser = tallies.get(outcome.loser);
            if (winner && loser) {
              winner.wins++;
              winner.totalMatchups++;
              loser.losses++;
              loser.totalMatchups++;
            }
            stats.decided++;
            break;
          }
          case 'TIE': {
            for (const symbol of [outcome.numerator, outcome.denominator]) {
              const tally = tallies.get(symbol);
              if (tally) {
                tally.ties++;
                tally.totalMatchups++;
              }
            }
            stats.ties++;
            break;
          }
          case 'NOT_EVALUABLE':
            stats.skipped++;
            break;
        }

        if (stats.pairs % this.progressEvery === 0) {
          this.logger.debug({ done: stats.pairs, total: totalPairs }, 'Tournament progress');
        }
      }
    }

    stats.durationMs = this.now() - started;
    this.logger.info({ ...stats }, 'Tournament complete');

    return { tallies, excluded, stats };
  }
}

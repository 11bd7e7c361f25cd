/**
 * Plain-text leaderboard, written to the log after every refresh.
 */

import type { RankedEntry } from './tournament.types.js';

const COLUMNS = [
  { title: 'Rank', width: 5 },
  { title: 'Symbol', width: 8 },
  { title: 'Wins', width: 6 },
  { title: 'Win %', width: 7 },
  { title: 'vs MA', width: 9 },
  { title: 'Status', width: 6 },
] as const;

function row(cells: string[]): string {
  return cells.map((c, i) => c.padEnd(COLUMNS[i].width)).join(' ').trimEnd();
}

export function formatRankingsSummary(entries: readonly RankedEntry[], top = 10): string {
  const header = row(COLUMNS.map(c => c.title));
  const lines = [header, '-'.repeat(header.length)];

  for (const e of entries.slice(0, top)) {
    const pct = `${e.percentAboveMa >= 0 ? '+' : ''}${e.percentAboveMa.toFixed(2)}%`;
    lines.push(
      row([
        String(e.rank),
        e.symbol,
        String(e.wins),
        `${e.winRate.toFixed(1)}%`,
        pct,
        e.aboveMa ? 'ABOVE' : 'BELOW',
      ])
    );
  }

  return lines.join('\n');
}

/**
 * UNIVERSE CATALOG
 * ================
 *
 * Members of each universe, read from universes.json and cut to the
 * configured per-group targets.
 *
 *   equities = stocks + ETFs + commodity ETFs (POLYGON)
 *   crypto   = coins (COINCAP, or CRYPTOCOMPARE where CoinCap lacks history)
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../../common/errors.js';
import type { AssetMeta } from '../tournament/tournament.types.js';
import type { UniverseId, UniverseMember } from './rankings.types.js';

const ListedSchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
});

const CoinSchema = ListedSchema.extend({
  provider: z.enum(['COINCAP', 'CRYPTOCOMPARE']),
  coinCapId: z.string().min(1).optional(),
});

const CatalogFileSchema = z.object({
  stocks: z.array(ListedSchema),
  etfs: z.array(ListedSchema),
  commodityEtfs: z.array(ListedSchema),
  crypto: z.array(CoinSchema),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export interface UniverseLimits {
  stocks: number;
  etfs: number;
  commodityEtfs: number;
  crypto: number;
}

const DEFAULT_CATALOG_URL = new URL('./universes.json', import.meta.url);

export class UniverseCatalog {
  private readonly byUniverse: Record<UniverseId, readonly UniverseMember[]>;
  private readonly coinCapIds: Record<string, string>;

  constructor(file: CatalogFile, limits: UniverseLimits) {
    const equities: UniverseMember[] = [
      ...file.stocks.slice(0, limits.stocks).map(s => ({ ...s, assetType: 'stock' as const, provider: 'POLYGON' as const })),
      ...file.etfs.slice(0, limits.etfs).map(s => ({ ...s, assetType: 'etf' as const, provider: 'POLYGON' as const })),
      ...file.commodityEtfs
        .slice(0, limits.commodityEtfs)
        .map(s => ({ ...s, assetType: 'commodity_etf' as const, provider: 'POLYGON' as const })),
    ];

    const coins = file.crypto.slice(0, limits.crypto);
    const crypto: UniverseMember[] = coins.map(c => ({
      symbol: c.symbol,
      name: c.name,
      assetType: 'crypto',
      provider: c.provider,
    }));

    this.byUniverse = {
      equities: Object.freeze(dedupe(equities)),
      crypto: Object.freeze(dedupe(crypto)),
    };

    this.coinCapIds = {};
    for (const c of coins) {
      if (c.coinCapId) this.coinCapIds[c.symbol] = c.coinCapId;
    }
  }

  static parse(raw: unknown, limits: UniverseLimits): UniverseCatalog {
    const parsed = CatalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid universe catalog: ${issues}`);
    }
    return new UniverseCatalog(parsed.data, limits);
  }

  static load(limits: UniverseLimits, location: URL | string = DEFAULT_CATALOG_URL): UniverseCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(location, 'utf8'));
    } catch (err) {
      throw new ConfigError(`Cannot read universe catalog ${String(location)}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return UniverseCatalog.parse(raw, limits);
  }

  members(universeId: UniverseId): readonly UniverseMember[] {
    return this.byUniverse[universeId];
  }

  metadata(universeId: UniverseId): ReadonlyMap<string, AssetMeta> {
    return new Map(this.byUniverse[universeId].map(m => [m.symbol, { name: m.name, assetType: m.assetType }]));
  }

  coinCapAssetIds(): Record<string, string> {
    return { ...this.coinCapIds };
  }
}

// First listing of a symbol wins
function dedupe(members: UniverseMember[]): UniverseMember[] {
  const seen = new Set<string>();
  return members.filter(m => {
    if (seen.has(m.symbol)) return false;
    seen.add(m.symbol);
    return true;
  });
}

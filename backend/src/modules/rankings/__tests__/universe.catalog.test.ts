/**
 * Universe catalog tests
 */

import { describe, it, expect } from 'vitest';
import { UniverseCatalog, type CatalogFile } from '../universe.catalog.js';
import { ConfigError } from '../../../common/errors.js';

const FILE: CatalogFile = {
  stocks: [
    { symbol: 'AAA', name: 'Alpha' },
    { symbol: 'BBB', name: 'Beta' },
    { symbol: 'CCC', name: 'Gamma' },
  ],
  etfs: [
    { symbol: 'EEE', name: 'Broad Fund' },
    { symbol: 'AAA', name: 'Alpha Again' },
  ],
  commodityEtfs: [{ symbol: 'GLDX', name: 'Gold Trust' }],
  crypto: [
    { symbol: 'BTC', name: 'Bitcoin', provider: 'COINCAP', coinCapId: 'bitcoin' },
    { symbol: 'XYZ', name: 'Xyz Coin', provider: 'CRYPTOCOMPARE' },
    { symbol: 'ETH', name: 'Ethereum', provider: 'COINCAP', coinCapId: 'ethereum' },
  ],
};

const ALL = { stocks: 10, etfs: 10, commodityEtfs: 10, crypto: 10 };

describe('UniverseCatalog', () => {
  it('keeps the first listing of a repeated symbol', () => {
    const catalog = new UniverseCatalog(FILE, ALL);

    expect(catalog.members('equities').map(m => `${m.symbol}:${m.assetType}`)).toEqual([
      'AAA:stock',
      'BBB:stock',
      'CCC:stock',
      'EEE:etf',
      'GLDX:commodity_etf',
    ]);
    expect(catalog.metadata('equities').get('AAA')).toEqual({ name: 'Alpha', assetType: 'stock' });
  });

  it('cuts each group to its limit', () => {
    const catalog = new UniverseCatalog(FILE, { stocks: 2, etfs: 1, commodityEtfs: 0, crypto: 2 });

    expect(catalog.members('equities').map(m => m.symbol)).toEqual(['AAA', 'BBB', 'EEE']);
    expect(catalog.members('crypto').map(m => m.symbol)).toEqual(['BTC', 'XYZ']);
    expect(catalog.coinCapAssetIds()).toEqual({ BTC: 'bitcoin' });
  });

  it('routes equities to POLYGON and coins to their listed provider', () => {
    const catalog = new UniverseCatalog(FILE, ALL);

    expect(new Set(catalog.members('equities').map(m => m.provider))).toEqual(new Set(['POLYGON']));
    expect(catalog.members('crypto').map(m => m.provider)).toEqual(['COINCAP', 'CRYPTOCOMPARE', 'COINCAP']);
  });

  it('rejects a malformed catalog with a ConfigError', () => {
    expect(() => UniverseCatalog.parse({ stocks: [] }, ALL)).toThrow(ConfigError);
    expect(() => UniverseCatalog.parse({ ...FILE, crypto: [{ symbol: 'BTC', name: 'Bitcoin', provider: 'BINANCE' }] }, ALL)).toThrow(
      /crypto\.0\.provider/
    );
  });

  it('reports an unreadable catalog file as a ConfigError', () => {
    expect(() => UniverseCatalog.load(ALL, new URL('./missing-universes.json', import.meta.url))).toThrow(ConfigError);
  });

  it('loads the bundled catalog', () => {
    const catalog = UniverseCatalog.load(ALL);

    expect(catalog.members('equities').map(m => m.symbol).slice(0, 2)).toEqual(['AAPL', 'MSFT']);
    expect(catalog.members('crypto').map(m => m.symbol).slice(0, 3)).toEqual(['BTC', 'ETH', 'BNB']);
    expect(catalog.coinCapAssetIds().BTC).toBe('bitcoin');
  });
});

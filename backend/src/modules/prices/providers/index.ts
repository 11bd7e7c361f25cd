/**
 * Price provider wiring
 */

import type { Env } from '../../../config/env.js';
import { createHttpClient } from '../../network/httpClient.factory.js';
import type { PriceProviderRegistry } from '../price.types.js';
import { PolygonProvider } from './polygon.provider.js';
import { CoinCapProvider } from './coincap.provider.js';
import { CryptoCompareProvider } from './cryptocompare.provider.js';

export { PolygonProvider } from './polygon.provider.js';
export { CoinCapProvider } from './coincap.provider.js';
export { CryptoCompareProvider } from './cryptocompare.provider.js';

export function createPriceProviders(env: Env, coinCapAssetIds: Record<string, string>): PriceProviderRegistry {
  const common = {
    timeoutMs: env.HTTP_TIMEOUT_MS,
    proxyUrl: env.HTTP_PROXY_URL,
    retry: { attempts: env.HTTP_RETRY_ATTEMPTS },
  };

  return {
    POLYGON: new PolygonProvider({
      client: createHttpClient({ ...common, baseURL: env.POLYGON_BASE_URL }),
      apiKey: env.POLYGON_API_KEY,
    }),
    COINCAP: new CoinCapProvider({
      client: createHttpClient({
        ...common,
        baseURL: env.COINCAP_BASE_URL,
        headers: env.COINCAP_API_KEY ? { Authorization: `Bearer ${env.COINCAP_API_KEY}` } : undefined,
      }),
      assetIds: coinCapAssetIds,
    }),
    CRYPTOCOMPARE: new CryptoCompareProvider({
      client: createHttpClient({
        ...common,
        baseURL: env.CRYPTOCOMPARE_BASE_URL,
        headers: env.CRYPTOCOMPARE_API_KEY ? { authorization: `Apikey ${env.CRYPTOCOMPARE_API_KEY}` } : undefined,
      }),
    }),
  };
}

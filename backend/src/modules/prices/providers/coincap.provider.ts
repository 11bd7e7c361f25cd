/**
 * CoinCap Provider
 * ================
 * Daily USD history per asset id, collapsed to weekly closes.
 *
 * Endpoint: /assets/{id}/history?interval=d1
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProviderError } from '../../../common/errors.js';
import type { PricePoint, PriceProvider, ProviderId } from '../price.types.js';
import { DAY_MS, WEEK_MS, takeLatest, toWeeklyCloses } from '../price-series.js';
import { toProviderError } from './provider.utils.js';

const HistoryResponseSchema = z.object({
  data: z.array(
    z.object({
      priceUsd: z.coerce.number(),
      time: z.number(),
    })
  ),
});

export interface CoinCapProviderOptions {
  client: AxiosInstance;
  /** ticker → CoinCap asset id, e.g. BTC → bitcoin */
  assetIds?: Record<string, string>;
  now?: () => number;
}

export class CoinCapProvider implements PriceProvider {
  readonly id: ProviderId = 'COINCAP';
  private readonly client: AxiosInstance;
  private readonly assetIds: Record<string, string>;
  private readonly now: () => number;

  constructor(options: CoinCapProviderOptions) {
    this.client = options.client;
    this.assetIds = options.assetIds ?? {};
    this.now = options.now ?? Date.now;
  }

  resolveAssetId(symbol: string): string {
    return this.assetIds[symbol] ?? symbol.toLowerCase();
  }

  async fetchWeeklyCloses(symbol: string, weeks: number): Promise<PricePoint[]> {
    const end = this.now();
    const start = end - weeks * WEEK_MS - 7 * DAY_MS;

    try {
      const response = await this.client.get<unknown>(
        `/assets/${encodeURIComponent(this.resolveAssetId(symbol))}/history`,
        { params: { interval: 'd1', start, end } }
      );

      const parsed = HistoryResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError(symbol, 'malformed history response');
      }
      if (parsed.data.data.length === 0) {
        throw new ProviderError(symbol, 'no data');
      }

      const daily = parsed.data.data.map(d => ({ ts: d.time, close: d.priceUsd }));
      return takeLatest(toWeeklyCloses(daily), weeks);
    } catch (err) {
      throw toProviderError(symbol, err);
    }
  }
}

/**
 * CryptoCompare Provider
 * ======================
 * Fallback for coins CoinCap does not carry.
 * Free tier: ~50 calls/minute.
 *
 * Endpoint: /histoday?fsym={symbol}&tsym=USD
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProviderError } from '../../../common/errors.js';
import type { PricePoint, PriceProvider, ProviderId } from '../price.types.js';
import { takeLatest, toWeeklyCloses } from '../price-series.js';
import { toProviderError } from './provider.utils.js';

const HistodayResponseSchema = z.object({
  Response: z.string(),
  Message: z.string().optional(),
  Data: z
    .object({
      Data: z.array(
        z.object({
          time: z.number(),   // seconds
          close: z.number(),
        })
      ),
    })
    .optional(),
});

export interface CryptoCompareProviderOptions {
  client: AxiosInstance;
  quote?: string;
  now?: () => number;
}

export class CryptoCompareProvider implements PriceProvider {
  readonly id: ProviderId = 'CRYPTOCOMPARE';
  private readonly client: AxiosInstance;
  private readonly quote: string;
  private readonly now: () => number;

  constructor(options: CryptoCompareProviderOptions) {
    this.client = options.client;
    this.quote = options.quote ?? 'USD';
    this.now = options.now ?? Date.now;
  }

  async fetchWeeklyCloses(symbol: string, weeks: number): Promise<PricePoint[]> {
    try {
      const response = await this.client.get<unknown>('/histoday', {
        params: {
          fsym: symbol,
          tsym: this.quote,
          limit: weeks * 7 + 7,
          toTs: Math.floor(this.now() / 1000),
        },
      });

      const parsed = HistodayResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError(symbol, 'malformed histoday response');
      }
      if (parsed.data.Response === 'Error') {
        throw new ProviderError(symbol, parsed.data.Message ?? 'API error');
      }

      // Unlisted days come back as zero closes
      const daily = (parsed.data.Data?.Data ?? [])
        .filter(d => d.close > 0)
        .map(d => ({ ts: d.time * 1000, close: d.close }));

      if (daily.length === 0) {
        throw new ProviderError(symbol, 'no data');
      }

      return takeLatest(toWeeklyCloses(daily), weeks);
    } catch (err) {
      throw toProviderError(symbol, err);
    }
  }
}

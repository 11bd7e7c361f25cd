/**
 * Polygon Weekly Aggregates Provider
 * ==================================
 *
 * Stocks, ETFs and commodity ETFs.
 *
 * Endpoint:
 * - /v2/aggs/ticker/{symbol}/range/1/week/{from}/{to}
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProviderError } from '../../../common/errors.js';
import type { PricePoint, PriceProvider, ProviderId } from '../price.types.js';
import { DAY_MS, WEEK_MS, takeLatest, weekStart } from '../price-series.js';
import { isoDate, toProviderError } from './provider.utils.js';

const AggsResponseSchema = z.object({
  status: z.string().optional(),
  results: z
    .array(
      z.object({
        t: z.number(),   // window start, ms
        c: z.number(),   // close
      })
    )
    .optional(),
});

export interface PolygonProviderOptions {
  client: AxiosInstance;
  apiKey?: string;
  now?: () => number;
}

export class PolygonProvider implements PriceProvider {
  readonly id: ProviderId = 'POLYGON';
  private readonly client: AxiosInstance;
  private readonly apiKey?: string;
  private readonly now: () => number;

  constructor(options: PolygonProviderOptions) {
    this.client = options.client;
    this.apiKey = options.apiKey;
    this.now = options.now ?? Date.now;
  }

  async fetchWeeklyCloses(symbol: string, weeks: number): Promise<PricePoint[]> {
    if (!this.apiKey) {
      throw new ProviderError(symbol, 'POLYGON_API_KEY not configured');
    }

    const end = this.now();
    // one spare week so a partial current week does not cost a full one
    const start = end - (weeks + 1) * WEEK_MS;
    const url = `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/week/${isoDate(start)}/${isoDate(end)}`;

    try {
      const response = await this.client.get<unknown>(url, {
        params: {
          adjusted: 'true',   // splits/dividends
          sort: 'asc',
          limit: weeks + 5,
          apiKey: this.apiKey,
        },
      });

      const parsed = AggsResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError(symbol, 'malformed aggregates response');
      }

      const results = parsed.data.results ?? [];
      if (results.length === 0) {
        throw new ProviderError(symbol, 'no data');
      }

      // Weekly bars open on Sunday exchange time; shift into the Monday week
      const points = results.map(bar => ({
        ts: weekStart(bar.t + DAY_MS),
        close: bar.c,
      }));

      return takeLatest(points, weeks);
    } catch (err) {
      throw toProviderError(symbol, err);
    }
  }
}

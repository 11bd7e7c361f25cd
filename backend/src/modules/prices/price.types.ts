/**
 * PRICE DATA TYPES
 * ================
 * Weekly close series and the provider contract the tournament consumes.
 */

// ═══════════════════════════════════════════════════════════════
// SERIES
// ═══════════════════════════════════════════════════════════════

export interface PricePoint {
  ts: number;     // week start (Monday 00:00 UTC), ms epoch
  close: number;
}

export interface PriceSeries {
  readonly symbol: string;
  readonly points: readonly PricePoint[];   // ascending by ts, unique ts
}

/**
 * Keyed symbol → series mapping; one entry per symbol.
 */
export type PriceUniverse = ReadonlyMap<string, PriceSeries>;

// ═══════════════════════════════════════════════════════════════
// PROVIDERS
// ═══════════════════════════════════════════════════════════════

export type ProviderId = 'POLYGON' | 'COINCAP' | 'CRYPTOCOMPARE';

export interface PriceProvider {
  readonly id: ProviderId;

  /**
   * Weekly closes for a symbol, oldest first.
   * Rejects with ProviderError when the symbol cannot be fetched.
   */
  fetchWeeklyCloses(symbol: string, weeks: number): Promise<PricePoint[]>;
}

export type PriceProviderRegistry = Partial<Record<ProviderId, PriceProvider>>;

/**
 * Rate Limiter
 * ============
 * Per-provider request throttling for the weekly-close fan-out.
 */

import Bottleneck from 'bottleneck';

export type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
  reservoir?: number;   // max requests per interval
  reservoirRefreshInterval?: number;
  reservoirRefreshAmount?: number;
};

// Provider-specific safe limits (free tiers)
export const RATE_LIMITS: Record<string, RateLimitConfig> = {
  POLYGON: {
    minTime: 250,        // 4 req/sec
    maxConcurrent: 4,
  },
  COINCAP: {
    minTime: 200,        // 5 req/sec
    maxConcurrent: 4,
  },
  CRYPTOCOMPARE: {
    minTime: 1_250,      // ~50 req/min
    maxConcurrent: 2,
  },
  DEFAULT: {
    minTime: 300,
    maxConcurrent: 1,
  },
};

export class RateLimiterRegistry {
  private limiters = new Map<string, Bottleneck>();

  constructor(
    private limits: Record<string, RateLimitConfig> = RATE_LIMITS,
    private maxConcurrentCap?: number
  ) {}

  get(provider: string): Bottleneck {
    const existing = this.limiters.get(provider);
    if (existing) return existing;

    const config = this.limits[provider] ?? this.limits.DEFAULT ?? RATE_LIMITS.DEFAULT;
    const maxConcurrent = this.maxConcurrentCap
      ? Math.min(config.maxConcurrent, this.maxConcurrentCap)
      : config.maxConcurrent;

    const limiter = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent,
      reservoir: config.reservoir,
      reservoirRefreshInterval: config.reservoirRefreshInterval,
      reservoirRefreshAmount: config.reservoirRefreshAmount,
    });

    this.limiters.set(provider, limiter);
    return limiter;
  }

  schedule<T>(provider: string, fn: () => Promise<T>): Promise<T> {
    return this.get(provider).schedule(fn);
  }

  async disconnect(): Promise<void> {
    await Promise.all([...this.limiters.values()].map(l => l.disconnect(false)));
    this.limiters.clear();
  }
}

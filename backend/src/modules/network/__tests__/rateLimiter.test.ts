/**
 * Rate limiter registry tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { RateLimiterRegistry } from '../rateLimiter.js';

const FAST = {
  POLYGON: { minTime: 0, maxConcurrent: 4 },
  DEFAULT: { minTime: 0, maxConcurrent: 1 },
};

describe('RateLimiterRegistry', () => {
  let registry: RateLimiterRegistry;

  afterEach(async () => {
    await registry.disconnect();
  });

  it('reuses one limiter per provider', () => {
    registry = new RateLimiterRegistry(FAST);

    expect(registry.get('POLYGON')).toBe(registry.get('POLYGON'));
    expect(registry.get('POLYGON')).not.toBe(registry.get('COINCAP'));
  });

  it('returns the scheduled task result', async () => {
    registry = new RateLimiterRegistry(FAST);

    await expect(registry.schedule('POLYGON', async () => 42)).resolves.toBe(42);
  });

  it('caps concurrency below the provider limit', async () => {
    registry = new RateLimiterRegistry(FAST, 1);
    let running = 0;
    let peak = 0;

    const task = async (n: number) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 5));
      running--;
      return n;
    };

    const results = await Promise.all([1, 2, 3].map(n => registry.schedule('POLYGON', () => task(n))));

    expect(results).toEqual([1, 2, 3]);
    expect(peak).toBe(1);
  });

  it('falls back to the DEFAULT limits for an unknown provider', async () => {
    registry = new RateLimiterRegistry(FAST);
    let running = 0;
    let peak = 0;

    await Promise.all(
      [1, 2].map(() =>
        registry.schedule('UNKNOWN', async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise(resolve => setTimeout(resolve, 5));
          running--;
        })
      )
    );

    expect(peak).toBe(1);
  });
});

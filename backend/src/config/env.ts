/**
 * Environment Configuration
 * =========================
 *
 * Parsed once from process.env (populated by `dotenv/config` at the
 * entrypoint). Anything invalid stops the boot with a ConfigError.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const emptyToUndefined = (v: unknown) => (v === '' ? undefined : v);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const positiveInt = (def: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(def));

const bool = (def: boolean) =>
  z.preprocess(
    emptyToUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .default(def ? 'true' : 'false')
      .transform(v => v === 'true' || v === '1')
  );

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  // Tournament
  MA_PERIOD: positiveInt(20),
  UPDATE_INTERVAL_HOURS: positiveInt(1).pipe(
    z.number().max(24).refine(h => 24 % h === 0, 'must divide 24 (1, 2, 3, 4, 6, 8, 12 or 24)')
  ),
  BIG_BOARD_CRYPTO: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(20)),
  REFRESH_ON_START: bool(true),
  REFRESH_TIMEOUT_MS: positiveInt(600_000),
  FETCH_CONCURRENCY: positiveInt(4),
  HISTORY_BUFFER_WEEKS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(10)),

  // Universe targets
  SP500_LIMIT: positiveInt(500),
  ETF_LIMIT: positiveInt(100),
  COMMODITY_ETF_LIMIT: positiveInt(20),
  CRYPTO_LIMIT: positiveInt(200),

  // Providers
  POLYGON_API_KEY: optionalString,
  POLYGON_BASE_URL: z.string().url().default('https://api.polygon.io'),
  COINCAP_BASE_URL: z.string().url().default('https://api.coincap.io/v2'),
  COINCAP_API_KEY: optionalString,
  CRYPTOCOMPARE_BASE_URL: z.string().url().default('https://min-api.cryptocompare.com/data/v2'),
  CRYPTOCOMPARE_API_KEY: optionalString,

  // Network
  HTTP_PROXY_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  HTTP_TIMEOUT_MS: positiveInt(15_000),
  HTTP_RETRY_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(5).default(2)),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

let cached: Env | null = null;

/**
 * Process-wide config, parsed lazily so tests can build their own with loadEnv().
 */
export function getEnv(): Env {
  if (!cached) {
    cached = loadEnv();
  }
  return cached;
}

/**
 * RANKINGS ROUTES
 * ===============
 *
 * GET  /api/health
 * GET  /api/rankings/:universe?limit=N
 * GET  /api/big-board?limit=N          (equities + top crypto)
 * GET  /api/crypto-explorer?limit=N    (crypto)
 * GET  /api/asset/:symbol
 * POST /api/update  { universe? }
 *
 * Failures are thrown as AppError and shaped by the global error handler.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import type { RankingService } from './rankings.service.js';
import type { RankingSnapshot } from './rankings.types.js';

export interface RankingsRoutesOptions {
  service: RankingService;
}

const UniverseSchema = z.enum(['equities', 'crypto']);

const LimitQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(5000).optional(),
});

const UniverseParamsSchema = z.object({ universe: UniverseSchema });

const SymbolParamsSchema = z.object({
  symbol: z.string().trim().min(1).max(20),
});

const UpdateBodySchema = z
  .object({ universe: UniverseSchema.optional() })
  .nullish();

function parse<O, I>(schema: z.ZodType<O, z.ZodTypeDef, I>, value: unknown): O {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(issues);
  }
  return result.data;
}

function summarize(s: RankingSnapshot) {
  return {
    universe: s.universeId,
    version: s.version,
    computedAt: new Date(s.computedAt).toISOString(),
    ranked: s.assetCount,
    requested: s.requestedCount,
    excluded: s.excluded.length,
    durationMs: s.durationMs,
  };
}

export async function rankingsRoutes(fastify: FastifyInstance, opts: RankingsRoutesOptions) {
  const { service } = opts;

  fastify.get('/api/health', async () => {
    return { ok: true, ...service.getHealth() };
  });

  fastify.get('/api/rankings/:universe', async (request) => {
    const { universe } = parse(UniverseParamsSchema, request.params);
    const { limit } = parse(LimitQuerySchema, request.query);
    return { ok: true, ...service.getCurrentRankings(universe, limit) };
  });

  fastify.get('/api/big-board', async (request) => {
    const { limit } = parse(LimitQuerySchema, request.query);
    return { ok: true, ...service.getBigBoard(limit) };
  });

  fastify.get('/api/crypto-explorer', async (request) => {
    const { limit } = parse(LimitQuerySchema, request.query);
    return { ok: true, ...service.getCurrentRankings('crypto', limit) };
  });

  fastify.get('/api/asset/:symbol', async (request) => {
    const { symbol } = parse(SymbolParamsSchema, request.params);
    const detail = service.getAssetDetail(symbol);
    return {
      ok: true,
      universe: detail.universeId,
      computedAt: detail.computedAt,
      asset: detail.entry,
    };
  });

  fastify.post('/api/update', async (request) => {
    const body = parse(UpdateBodySchema, request.body);
    const snapshots = await service.triggerRefresh(body?.universe ?? undefined);
    return { ok: true, refreshed: snapshots.map(summarize) };
  });
}

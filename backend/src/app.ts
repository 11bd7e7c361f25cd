import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import type { Env } from './config/env.js';
import { rankingsRoutes } from './modules/rankings/rankings.routes.js';
import type { RankingService } from './modules/rankings/rankings.service.js';

export interface BuildAppOptions {
  service: RankingService;
  config: Pick<Env, 'LOG_LEVEL' | 'CORS_ORIGINS' | 'NODE_ENV'>;
}

/**
 * Build Fastify Application
 */
export function buildApp({ service, config }: BuildAppOptions): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(',').map(o => o.trim()),
  });

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        request.log.error({ code: err.code, err }, err.message);
      } else {
        request.log.info({ code: err.code }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        ok: false,
        error: err.code ?? 'BAD_REQUEST',
        message: err.message,
      });
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: config.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.register(rankingsRoutes, { service });

  return app;
}

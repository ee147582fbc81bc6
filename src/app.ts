import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './config/env.js';
import { isAppError } from './common/errors.js';
import { registerSifuRoutes } from './modules/sifu/sifu.routes.js';
import { SifuService } from './modules/sifu/sifu.service.js';
import type { Assumptions } from './modules/sifu/sifu.types.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  defaults?: Assumptions;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger ?? {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (isAppError(err)) {
      app.log.warn({ code: err.code, details: err.details }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...err.details,
      });
    }

    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'Request body failed validation',
        issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      });
    }

    app.log.error(err);

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
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
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

  app.get('/api/health', async () => ({
    ok: true,
    service: 'sil-calc',
    timestamp: new Date().toISOString(),
  }));

  const service = new SifuService({
    logger: app.log,
    defaults: options.defaults ?? {
      ti: env.SIL_TI_HOURS,
      mttr: env.SIL_MTTR_HOURS,
      beta: env.SIL_BETA,
      betaD: env.SIL_BETA_D,
    },
  });

  app.register(async (fastify) => {
    await registerSifuRoutes(fastify, { service });
  });

  return app;
}

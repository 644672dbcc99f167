import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { AppError } from './common/errors.js';
import { isMongoConnected } from './db/mongoose.js';
import type { Env } from './config/env.js';
import {
  createPipelineContainer,
  registerPipelineModule,
  type ContainerOverrides,
  type PipelineContainer,
} from './modules/pipeline/index.js';

export interface BuiltApp {
  app: FastifyInstance;
  container: PipelineContainer;
}

/**
 * Build Fastify Application
 *
 * Services log through Fastify's pino logger unless a logger override
 * is given.
 */
export async function buildApp(env: Env, overrides: ContainerOverrides = {}): Promise<BuiltApp> {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });
  const container = createPipelineContainer(env, { logger: app.log, ...overrides });

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      });
    }

    // Request body / params / query
    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
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

    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) app.log.error(err);
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
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
    storage: env.STORAGE_DRIVER,
    mongo: env.STORAGE_DRIVER === 'mongo' ? isMongoConnected() : null,
    worker: container.worker.getStats().running,
    timestamp: new Date().toISOString(),
  }));

  await registerPipelineModule(app, container);

  return { app, container };
}

// Fastify server assembly
// Kept apart from index.ts so tests can build the app without listening

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import { AppError, ErrorCode, formatErrorResponse } from './utils/errors.js';
import { loggerOptions } from './utils/logger.js';
import { runRoutes } from './routes/runs.js';
import { toolRoutes } from './routes/tools.js';
import type { RunManager } from './services/runs/index.js';
import type { ToolRegistry } from './services/tools/index.js';

export interface BuildServerOptions {
  runs: RunManager;
  registry: ToolRegistry;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger === false ? false : loggerOptions,
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      const appError = AppError.validationError('Invalid request', error.issues);
      return reply.code(appError.statusCode).send(formatErrorResponse(appError, true));
    }

    if (error instanceof AppError) {
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    // Fastify's own errors (bad JSON body, payload too large) carry a 4xx status
    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: ErrorCode.BAD_REQUEST,
        message: error.message,
        statusCode: error.statusCode,
      });
    }

    request.log.error({ err: error }, 'Unhandled route error');
    const internal = AppError.internal();
    return reply.code(internal.statusCode).send(formatErrorResponse(internal));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      active_runs: options.runs.activeCount,
    };
  });

  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(runRoutes, { prefix: '/v1', runs: options.runs });
  await server.register(toolRoutes, { prefix: '/v1', registry: options.registry });

  server.addHook('onClose', async () => {
    options.runs.destroy();
  });

  return server;
}

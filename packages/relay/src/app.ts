/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import cors from '@fastify/cors';
import Fastify, { type FastifyError } from 'fastify';
import type { Logger } from 'pino';
import type { Env } from './config/env.js';
import { corsOptions } from './infrastructure/http/cors.js';
import { ProtocolErrors } from './protocol/errors.js';

export interface AppConfig {
  env: Env;
  logger: Logger;
}

/** Polled by orchestrators; logged at debug so they do not flood the log. */
const HEALTH_CHECK_PATHS = new Set(['/healthz', '/readyz']);

/**
 * Creates the Fastify app behind the relay's HTTP routes.
 * The WebSocket server attaches to the same HTTP server once it listens.
 */
export async function createApp(config: AppConfig) {
  const { env, logger } = config;
  const app = Fastify({
    loggerInstance: logger,
    trustProxy: env.TRUST_PROXY,
    disableRequestLogging: true,
  });

  await app.register(cors, corsOptions(env.CORS_ORIGINS));

  app.addHook('onRequest', async (request) => {
    const level = HEALTH_CHECK_PATHS.has(request.url) ? 'debug' : 'info';
    request.log[level](
      {
        method: request.method,
        url: request.url,
        origin: request.headers.origin,
        ...(env.TRUST_PROXY && { forwardedFor: request.headers['x-forwarded-for'] }),
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    const level = HEALTH_CHECK_PATHS.has(request.url) ? 'debug' : 'info';
    request.log[level](
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Server faults never leak their message; client faults keep Fastify's code
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ error }, 'Request failed');
      void reply.status(statusCode).send(ProtocolErrors.internalError());
      return;
    }
    request.log.warn({ code: error.code, message: error.message }, 'Request rejected');
    void reply.status(statusCode).send({ error: error.message, code: error.code || 'BAD_REQUEST' });
  });

  return app;
}

export type RelayApp = Awaited<ReturnType<typeof createApp>>;

/**
 * Sets the JSON 404 handler. Registered after all routes.
 */
export function setDefaultNotFoundHandler(app: RelayApp): void {
  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ url: request.url }, 'Route not found');
    void reply.status(404).send({
      error: 'Not Found',
      code: 'NOT_FOUND',
    });
  });
}

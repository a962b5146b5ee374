/**
 * @file health-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';
import type { GlobalLanguageSet } from '../../domain/entities/language-set.js';

export interface HealthRouteConfig {
  version: string;
}

export interface HealthRouteDeps {
  connectionRegistry: ConnectionRegistry;
  languageSet: GlobalLanguageSet;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  connections: number;
  languages: number;
  timestamp: string;
}

export interface AppWithGet {
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

/**
 * Registers the health check route on the Fastify server.
 */
export function registerHealthRoute(
  app: AppWithGet,
  config: HealthRouteConfig,
  deps: HealthRouteDeps
): void {
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = {
      status: 'healthy',
      version: config.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      connections: deps.connectionRegistry.count(),
      languages: deps.languageSet.size,
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(response);
  });

  // Simple liveness probe
  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  app.get('/readyz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ready' });
  });
}

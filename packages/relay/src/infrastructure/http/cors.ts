/**
 * @file cors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyCorsOptions } from '@fastify/cors';

/**
 * `'*'` opens the HTTP routes to every browser origin; a list allows only those origins.
 */
export type CorsOrigins = '*' | string[];

export function corsOptions(origins: CorsOrigins): FastifyCorsOptions {
  return {
    origin: origins === '*' ? '*' : origins,
    methods: ['GET', 'HEAD', 'OPTIONS'],
  };
}

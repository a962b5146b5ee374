/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

export {
  registerHealthRoute,
  type AppWithGet,
  type HealthRouteConfig,
  type HealthRouteDeps,
} from './health-route.js';

export {
  registerTranslationRoutes,
  type TranslationRouteDeps,
} from './translation-route.js';

export { corsOptions, type CorsOrigins } from './cors.js';

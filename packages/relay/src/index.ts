/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './domain/index.js';
export * from './protocol/index.js';
export * from './application/index.js';
export { createApp, setDefaultNotFoundHandler, type AppConfig, type RelayApp } from './app.js';
export { createRelayServices, type RelayLimits, type RelayServices, type RelayServicesDeps } from './container.js';
export { EnvSchema, loadEnv, getEnv, type Env } from './config/env.js';
export { CHAT_LIMITS, CHAT_DEFAULTS } from './config/constants.js';
export { createLogger, type LoggerConfig } from './infrastructure/logging/pino-logger.js';
export { InMemoryConnectionRegistry } from './infrastructure/persistence/in-memory-registry.js';
export { InMemoryModerationStore } from './infrastructure/persistence/in-memory-moderation-store.js';
export {
  JwtIdentityVerifier,
  AnonymousIdentityVerifier,
} from './infrastructure/auth/jwt-identity-verifier.js';
export {
  GoogleTranslationProvider,
  TranslationRequestError,
} from './infrastructure/translation/google-translation-provider.js';
export * from './infrastructure/http/index.js';
export * from './infrastructure/websocket/index.js';

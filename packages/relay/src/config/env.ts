/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { CHAT_LIMITS, TRANSLATION_API, WEBSOCKET_CONFIG } from './constants.js';

// Load environment variables from .env files
config({ path: '.env.local' });
config({ path: '.env' });

/**
 * Schema for environment variables validation.
 */
export const EnvSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  /**
   * Whether the server is running behind a reverse proxy.
   */
  TRUST_PROXY: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  /**
   * Browser origins allowed on the HTTP routes: `*` or a comma-separated list.
   */
  CORS_ORIGINS: z
    .string()
    .default('*')
    .transform((value): '*' | string[] =>
      value.trim() === '*'
        ? '*'
        : value
            .split(',')
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0)
    ),

  /**
   * WebSocket path clients connect to.
   */
  WS_PATH: z.string().startsWith('/').default(WEBSOCKET_CONFIG.PATH),

  // Chat limits
  MAX_MESSAGE_LENGTH: z.coerce.number().int().positive().default(CHAT_LIMITS.MAX_MESSAGE_LENGTH),
  MAX_LANGUAGES: z.coerce.number().int().positive().default(CHAT_LIMITS.MAX_LANGUAGES),
  MAX_DISPLAY_NAME_LENGTH: z.coerce
    .number()
    .int()
    .positive()
    .default(CHAT_LIMITS.MAX_DISPLAY_NAME_LENGTH),

  /**
   * HS256 secret shared with the account service that issues tokens.
   * When unset, tokens are ignored and every connection is anonymous.
   */
  AUTH_TOKEN_SECRET: z.string().min(16, 'Token secret must be at least 16 characters').optional(),

  // Translation
  TRANSLATION_API_URL: z.string().url().default(TRANSLATION_API.DEFAULT_URL),
  TRANSLATION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(TRANSLATION_API.DEFAULT_TIMEOUT_MS),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}

/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Default limits applied at the connection boundary.
 * Each one can be overridden through the environment (see env.ts).
 */
export const CHAT_LIMITS = {
  /** Longest inbound frame accepted before it reaches the command dispatcher */
  MAX_MESSAGE_LENGTH: 5_000,

  /** Maximum number of languages in the global language set */
  MAX_LANGUAGES: 20,

  /** Longest display name accepted by /name */
  MAX_DISPLAY_NAME_LENGTH: 50,

  /** Longest reason accepted by /report */
  MAX_REPORT_REASON_LENGTH: 1_000,
} as const;

/**
 * Presentation defaults for connections and chat events.
 */
export const CHAT_DEFAULTS = {
  /** Display name of a connection that never sent /name */
  DISPLAY_NAME: 'Anonymous',

  /** Substituted for a language whose translation failed */
  TRANSLATION_ERROR_MARKER: '[Translation error]',
} as const;

/**
 * Codes the language normalizer still accepts when the provider's
 * name table cannot be loaded.
 */
export const FALLBACK_LANGUAGE_CODES: readonly string[] = [
  'en', 'fr', 'es', 'de', 'it', 'pt', 'ar', 'hi', 'ja', 'ko', 'ru', 'sw',
];

/**
 * Connection timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** How often the server pings every socket */
  HEARTBEAT_INTERVAL_MS: 30_000,

  /** Grace period for the WebSocket server to close before sockets are terminated */
  SHUTDOWN_GRACE_MS: 5_000,
} as const;

/**
 * WebSocket configuration.
 */
export const WEBSOCKET_CONFIG = {
  /** Path for WebSocket endpoint */
  PATH: '/ws',

  /** Frames above this size are rejected by ws before they are decoded */
  MAX_PAYLOAD_BYTES: 64 * 1024,
} as const;

/**
 * Public Google endpoint used by the default translation provider.
 */
export const TRANSLATION_API = {
  DEFAULT_URL: 'https://translate.googleapis.com/translate_a/single',
  DEFAULT_TIMEOUT_MS: 10_000,
} as const;

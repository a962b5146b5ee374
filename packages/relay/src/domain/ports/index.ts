/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { ConnectionRegistry, ActiveUser } from './connection-registry.js';
export type { MessageTransport } from './message-transport.js';
export type {
  Translator,
  LanguageCatalog,
  TranslationProvider,
} from './translation-provider.js';
export type {
  ModerationGate,
  ModerationStore,
  Report,
  ReportInput,
} from './moderation.js';
export type { IdentityVerifier } from './identity-verifier.js';
export type {
  MessageBroadcaster,
  RecipientFilter,
  FanOutResult,
} from './message-broadcaster.js';

/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ErrorCode } from '../domain/errors/domain-errors.js';
import type { ActiveUser } from '../domain/ports/connection-registry.js';

export type { ErrorCode };

// ============================================================================
// Shared State Broadcasts
// ============================================================================

/**
 * Server → All: the global language set changed (also sent once on connect)
 */
export interface LanguageUpdateMessage {
  type: 'language_update';
  languages: string[];
}

/**
 * Server → All: a display name or the presence list changed (also sent once on connect)
 */
export interface UsersUpdateMessage {
  type: 'users_update';
  users: ActiveUser[];
}

// ============================================================================
// Chat
// ============================================================================

/**
 * Server → All (minus recipients who blocked the sender): one translated chat message
 */
export interface ChatEventMessage {
  type: 'chat';
  sender: string;
  sender_id: string | null;
  color: string;
  original: string;
  /** Upper-cased language code → translated text */
  translations: Record<string, string>;
  timestamp: string;
  message_id: string;
}

// ============================================================================
// Unicast Replies
// ============================================================================

/**
 * Server → Sender: informational notice
 */
export interface InfoMessage {
  info: string;
}

/**
 * Server → Sender: the sender's last frame was rejected
 */
export interface ErrorMessage {
  error: string;
  code: ErrorCode;
}

// ============================================================================
// Union Types
// ============================================================================

/**
 * All outgoing messages that the relay can send
 */
export type OutgoingMessage =
  | LanguageUpdateMessage
  | UsersUpdateMessage
  | ChatEventMessage
  | InfoMessage
  | ErrorMessage;

// ============================================================================
// Factories
// ============================================================================

export function languageUpdate(languages: string[]): LanguageUpdateMessage {
  return { type: 'language_update', languages };
}

export function usersUpdate(users: ActiveUser[]): UsersUpdateMessage {
  return { type: 'users_update', users };
}

export function info(text: string): InfoMessage {
  return { info: text };
}

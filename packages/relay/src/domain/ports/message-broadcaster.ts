/**
 * @file message-broadcaster.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Connection } from '../entities/connection.js';
import type { OutgoingMessage } from '../../protocol/messages.js';

/**
 * Decides per recipient whether an event is withheld.
 */
export type RecipientFilter = (recipient: Connection) => Promise<boolean>;

export interface FanOutResult {
  delivered: number;
  skipped: number;
  evicted: string[];
}

/**
 * Port for delivering events to connections.
 * Recipients whose socket fails are evicted from the registry.
 */
export interface MessageBroadcaster {
  /**
   * Sends one event to every active connection not withheld by the filter.
   */
  broadcastToAll(message: OutgoingMessage, skip?: RecipientFilter): Promise<FanOutResult>;

  /**
   * Sends one event to a single connection. Returns false if it was evicted.
   */
  sendToConnection(connection: Connection, message: OutgoingMessage): Promise<boolean>;
}

/**
 * @file connection-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Connection } from '../entities/connection.js';

/**
 * Entry of a presence list.
 */
export interface ActiveUser {
  username: string;
  color: string;
}

/**
 * Port (interface) for the connection registry.
 * The single owner of every live connection and its attributes.
 */
export interface ConnectionRegistry {
  /**
   * Adds a connection to the live set.
   */
  register(connection: Connection): void;

  /**
   * Removes a connection from every index. Returns false if it was not registered.
   */
  unregister(connectionId: string): boolean;

  /**
   * Retrieves a connection by id.
   */
  get(connectionId: string): Connection | undefined;

  /**
   * Checks if a connection id is registered.
   */
  has(connectionId: string): boolean;

  /**
   * Overwrites the display name of a registered connection.
   */
  setDisplayName(connectionId: string, displayName: string): Connection | undefined;

  /**
   * Point-in-time copy of the connected entries, in registration order.
   */
  snapshotActive(): Connection[];

  /**
   * Presence view: named, connected entries only.
   */
  activeUsers(): ActiveUser[];

  /**
   * Returns every connection opened by an authenticated user.
   */
  getByIdentity(userId: string): Connection[];

  /**
   * Returns the count of registered connections.
   */
  count(): number;
}

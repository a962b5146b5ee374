/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Connection } from '../../domain/entities/connection.js';
import type { ActiveUser, ConnectionRegistry } from '../../domain/ports/connection-registry.js';

/**
 * In-memory implementation of ConnectionRegistry.
 * Stores connections in a Map indexed by connection ID, plus an index by user ID.
 *
 * Every method runs to completion without yielding, so reads and
 * read-modify-write updates are atomic with respect to other connections' tasks.
 */
export class InMemoryConnectionRegistry implements ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();
  private readonly byUserId = new Map<string, Set<string>>();

  register(connection: Connection): void {
    this.unregister(connection.id);
    this.connections.set(connection.id, connection);

    const userId = connection.identity?.userId;
    if (userId) {
      const ids = this.byUserId.get(userId) ?? new Set<string>();
      ids.add(connection.id);
      this.byUserId.set(userId, ids);
    }
  }

  unregister(connectionId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return false;
    }
    this.connections.delete(connectionId);

    const userId = connection.identity?.userId;
    if (userId) {
      const ids = this.byUserId.get(userId);
      ids?.delete(connectionId);
      if (ids?.size === 0) {
        this.byUserId.delete(userId);
      }
    }
    return true;
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  has(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  setDisplayName(connectionId: string, displayName: string): Connection | undefined {
    const connection = this.connections.get(connectionId);
    connection?.rename(displayName);
    return connection;
  }

  snapshotActive(): Connection[] {
    return Array.from(this.connections.values()).filter((connection) => connection.isConnected);
  }

  activeUsers(): ActiveUser[] {
    return this.snapshotActive()
      .filter((connection) => connection.hasChosenName)
      .map((connection) => ({
        username: connection.displayName,
        color: connection.color,
      }));
  }

  getByIdentity(userId: string): Connection[] {
    const ids = this.byUserId.get(userId);
    if (!ids) {
      return [];
    }
    return Array.from(ids).flatMap((id) => {
      const connection = this.connections.get(id);
      return connection ? [connection] : [];
    });
  }

  count(): number {
    return this.connections.size;
  }
}

/**
 * @file handle-disconnection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import { usersUpdate } from '../protocol/messages.js';

export interface HandleDisconnectionDeps {
  connectionRegistry: ConnectionRegistry;
  broadcaster: MessageBroadcaster;
  logger: Logger;
}

/**
 * Use case for handling a closed socket.
 */
export class HandleDisconnectionUseCase {
  private readonly connectionRegistry: ConnectionRegistry;
  private readonly broadcaster: MessageBroadcaster;
  private readonly logger: Logger;

  constructor(deps: HandleDisconnectionDeps) {
    this.connectionRegistry = deps.connectionRegistry;
    this.broadcaster = deps.broadcaster;
    this.logger = deps.logger.child({ useCase: 'HandleDisconnection' });
  }

  /**
   * Removes the connection and, if it appeared in the presence list,
   * tells everyone else. The connection may already have been evicted by a broadcast.
   */
  async execute(connection: Connection): Promise<void> {
    const removed = this.connectionRegistry.unregister(connection.id);
    connection.markDisconnected();

    this.logger.info(
      {
        connectionId: connection.id,
        alreadyEvicted: !removed,
        activeConnections: this.connectionRegistry.count(),
      },
      'Client disconnected'
    );

    if (connection.hasChosenName) {
      await this.broadcaster.broadcastToAll(usersUpdate(this.connectionRegistry.activeUsers()));
    }
  }
}

/**
 * @file set-display-name.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import { InvalidCommandError } from '../domain/errors/domain-errors.js';
import { COMMAND_USAGE } from '../protocol/commands.js';
import { info, usersUpdate } from '../protocol/messages.js';

export interface SetDisplayNameDeps {
  connectionRegistry: ConnectionRegistry;
  broadcaster: MessageBroadcaster;
  maxDisplayNameLength: number;
  logger: Logger;
}

/**
 * Use case for /name. Authenticated connections always take their account name.
 */
export class SetDisplayNameUseCase {
  private readonly deps: SetDisplayNameDeps;
  private readonly logger: Logger;

  constructor(deps: SetDisplayNameDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ useCase: 'SetDisplayName' });
  }

  async execute(connection: Connection, requestedName: string): Promise<void> {
    const displayName = connection.identity?.username ?? requestedName.trim();
    if (!displayName || displayName.length > this.deps.maxDisplayNameLength) {
      throw new InvalidCommandError(
        `${COMMAND_USAGE.name} (1-${this.deps.maxDisplayNameLength} characters)`
      );
    }

    const previousName = connection.displayName;
    if (!this.deps.connectionRegistry.setDisplayName(connection.id, displayName)) {
      return;
    }

    this.logger.info(
      { connectionId: connection.id, previousName, displayName },
      'Display name changed'
    );

    await this.deps.broadcaster.sendToConnection(connection, info(`Your name: ${displayName}`));
    await this.deps.broadcaster.broadcastToAll(
      usersUpdate(this.deps.connectionRegistry.activeUsers())
    );
  }
}

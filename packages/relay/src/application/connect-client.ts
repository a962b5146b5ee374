/**
 * @file connect-client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Logger } from 'pino';
import { Connection } from '../domain/entities/connection.js';
import type { GlobalLanguageSet } from '../domain/entities/language-set.js';
import { ConnectionId } from '../domain/value-objects/connection-id.js';
import { PastelColor } from '../domain/value-objects/pastel-color.js';
import type { Identity } from '../domain/value-objects/identity.js';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { IdentityVerifier } from '../domain/ports/identity-verifier.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import type { MessageTransport } from '../domain/ports/message-transport.js';
import { HELP_TEXT } from '../protocol/commands.js';
import { info, languageUpdate, usersUpdate } from '../protocol/messages.js';

export const WELCOME_TEXT = 'Welcome to Polyglot Chat!';

export interface ConnectClientDeps {
  connectionRegistry: ConnectionRegistry;
  languageSet: GlobalLanguageSet;
  broadcaster: MessageBroadcaster;
  identityVerifier: IdentityVerifier;
  generateConnectionId: () => string;
  pickColor?: () => PastelColor;
  logger: Logger;
}

/**
 * Use case for admitting a new socket: resolve its identity, register it
 * and send it the current room state.
 */
export class ConnectClientUseCase {
  private readonly deps: ConnectClientDeps;
  private readonly pickColor: () => PastelColor;
  private readonly logger: Logger;

  constructor(deps: ConnectClientDeps) {
    this.deps = deps;
    this.pickColor = deps.pickColor ?? (() => PastelColor.random());
    this.logger = deps.logger.child({ useCase: 'ConnectClient' });
  }

  async execute(transport: MessageTransport, token?: string): Promise<Connection> {
    const identity = token ? await this.resolveIdentity(token) : undefined;

    const connection = new Connection({
      connectionId: ConnectionId.generate(this.deps.generateConnectionId),
      transport,
      color: this.pickColor(),
      identity,
    });
    this.deps.connectionRegistry.register(connection);

    this.logger.info(
      {
        connectionId: connection.id,
        userId: identity?.userId,
        color: connection.color,
        activeConnections: this.deps.connectionRegistry.count(),
      },
      'Client connected'
    );

    const greeting = [
      info(WELCOME_TEXT),
      info(HELP_TEXT),
      languageUpdate(this.deps.languageSet.list()),
      usersUpdate(this.deps.connectionRegistry.activeUsers()),
    ];
    for (const message of greeting) {
      if (!(await this.deps.broadcaster.sendToConnection(connection, message))) {
        break;
      }
    }

    return connection;
  }

  private async resolveIdentity(token: string): Promise<Identity | undefined> {
    try {
      const identity = await this.deps.identityVerifier.verify(token);
      if (!identity) {
        this.logger.info('Token rejected, connecting anonymously');
      }
      return identity;
    } catch (error) {
      this.logger.warn({ error }, 'Identity verification failed, connecting anonymously');
      return undefined;
    }
  }
}

/**
 * @file command-dispatcher.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import {
  DomainError,
  InvalidCommandError,
  MessageTooLongError,
} from '../domain/errors/domain-errors.js';
import { HELP_TEXT, parseCommand, type Command } from '../protocol/commands.js';
import { ProtocolErrors } from '../protocol/errors.js';
import { info } from '../protocol/messages.js';
import type { SetDisplayNameUseCase } from './set-display-name.js';
import type { ManageLanguagesUseCase } from './manage-languages.js';
import type { ModerateUserUseCase } from './moderate-user.js';
import type { BroadcastChatUseCase } from './broadcast-chat.js';

export interface CommandDispatcherDeps {
  setDisplayName: SetDisplayNameUseCase;
  manageLanguages: ManageLanguagesUseCase;
  moderateUser: ModerateUserUseCase;
  broadcastChat: BroadcastChatUseCase;
  broadcaster: MessageBroadcaster;
  maxMessageLength: number;
  logger: Logger;
}

/**
 * Routes each inbound frame of a connection to its use case.
 * Every failure is answered to the originating connection only and never closes it.
 */
export class CommandDispatcher {
  private readonly deps: CommandDispatcherDeps;
  private readonly logger: Logger;

  constructor(deps: CommandDispatcherDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'CommandDispatcher' });
  }

  async dispatch(connection: Connection, frame: string): Promise<void> {
    try {
      if (exceedsCharacters(frame, this.deps.maxMessageLength)) {
        throw new MessageTooLongError(this.deps.maxMessageLength);
      }
      await this.execute(connection, parseCommand(frame));
    } catch (error) {
      await this.handleError(connection, error);
    }
  }

  private async execute(connection: Connection, command: Command): Promise<void> {
    switch (command.kind) {
      case 'name':
        return this.deps.setDisplayName.execute(connection, command.name);

      case 'add-lang':
        return this.deps.manageLanguages.add(connection, command.language);

      case 'remove-lang':
        return this.deps.manageLanguages.remove(connection, command.language);

      case 'block':
        return this.deps.moderateUser.block(connection, command.username);

      case 'unblock':
        return this.deps.moderateUser.unblock(connection, command.username);

      case 'blocked':
        return this.deps.moderateUser.listBlocked(connection);

      case 'report':
        return this.deps.moderateUser.report(connection, command.username, command.reason);

      case 'help':
        await this.deps.broadcaster.sendToConnection(connection, info(HELP_TEXT));
        return;

      case 'invalid':
        throw new InvalidCommandError(command.usage);

      case 'chat':
        if (command.text.trim().length === 0) {
          this.logger.debug({ connectionId: connection.id }, 'Ignoring blank frame');
          return;
        }
        await this.deps.broadcastChat.execute(connection, command.text);
        return;

      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /**
   * Handles errors and sends appropriate error responses.
   */
  private async handleError(connection: Connection, error: unknown): Promise<void> {
    if (error instanceof DomainError) {
      this.logger.debug(
        { connectionId: connection.id, code: error.code, message: error.message },
        'Command rejected'
      );
      await this.deps.broadcaster.sendToConnection(
        connection,
        ProtocolErrors.fromDomainError(error)
      );
    } else {
      this.logger.error({ connectionId: connection.id, error }, 'Unexpected error');
      await this.deps.broadcaster.sendToConnection(connection, ProtocolErrors.internalError());
    }
  }
}

/**
 * Counts code points, so a character outside the BMP counts once.
 */
function exceedsCharacters(text: string, max: number): boolean {
  if (text.length <= max) {
    return false;
  }
  let count = 0;
  for (const _char of text) {
    if (++count > max) {
      return true;
    }
  }
  return false;
}

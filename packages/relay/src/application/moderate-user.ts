/**
 * @file moderate-user.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { Identity } from '../domain/value-objects/identity.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import type { ModerationStore } from '../domain/ports/moderation.js';
import {
  AuthenticationRequiredError,
  InvalidCommandError,
  ModerationRejectedError,
} from '../domain/errors/domain-errors.js';
import { COMMAND_USAGE } from '../protocol/commands.js';
import { info } from '../protocol/messages.js';

export interface ModerateUserDeps {
  moderationStore: ModerationStore;
  broadcaster: MessageBroadcaster;
  maxReasonLength: number;
  logger: Logger;
}

/**
 * Use case for /block, /unblock, /blocked and /report.
 * All of them are private: only the requesting connection hears about the result.
 */
export class ModerateUserUseCase {
  private readonly deps: ModerateUserDeps;
  private readonly logger: Logger;

  constructor(deps: ModerateUserDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ useCase: 'ModerateUser' });
  }

  async block(connection: Connection, username: string): Promise<void> {
    const identity = requireIdentity(connection, 'block');
    if (isSelf(connection, identity, username)) {
      throw new ModerationRejectedError('Cannot block yourself');
    }

    await this.deps.moderationStore.block(identity.userId, username);
    this.logger.info({ userId: identity.userId, blocked: username }, 'User blocked');

    await this.reply(connection, `User '${username}' has been blocked`);
  }

  async unblock(connection: Connection, username: string): Promise<void> {
    const identity = requireIdentity(connection, 'unblock');

    await this.deps.moderationStore.unblock(identity.userId, username);
    this.logger.info({ userId: identity.userId, unblocked: username }, 'User unblocked');

    await this.reply(connection, `User '${username}' has been unblocked`);
  }

  async listBlocked(connection: Connection): Promise<void> {
    const identity = requireIdentity(connection, 'blocked');
    const blocked = await this.deps.moderationStore.getBlocked(identity.userId);

    await this.reply(
      connection,
      blocked.length > 0 ? `Blocked users: ${blocked.join(', ')}` : 'You have not blocked anyone'
    );
  }

  async report(connection: Connection, username: string, reason: string): Promise<void> {
    const identity = requireIdentity(connection, 'report');
    if (isSelf(connection, identity, username)) {
      throw new ModerationRejectedError('Cannot report yourself');
    }
    if (reason.length > this.deps.maxReasonLength) {
      throw new InvalidCommandError(
        `${COMMAND_USAGE.report} (reason at most ${this.deps.maxReasonLength} characters)`
      );
    }

    const report = await this.deps.moderationStore.report({
      reporterId: identity.userId,
      reportedUsername: username,
      reason,
    });
    this.logger.info({ reportId: report.id, reported: username }, 'Report submitted');

    await this.reply(connection, `Report submitted (id: ${report.id})`);
  }

  private async reply(connection: Connection, text: string): Promise<void> {
    await this.deps.broadcaster.sendToConnection(connection, info(text));
  }
}

function requireIdentity(connection: Connection, command: string): Identity {
  const identity = connection.identity;
  if (!identity) {
    throw new AuthenticationRequiredError(command);
  }
  return identity;
}

/**
 * Matches the account name and the current display name, which differ until /name.
 */
function isSelf(connection: Connection, identity: Identity, username: string): boolean {
  return username === identity.username || username === connection.displayName;
}

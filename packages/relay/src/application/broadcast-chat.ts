/**
 * @file broadcast-chat.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { GlobalLanguageSet } from '../domain/entities/language-set.js';
import type { FanOutResult, MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import type { ModerationGate } from '../domain/ports/moderation.js';
import { info, type ChatEventMessage } from '../protocol/messages.js';
import type { TranslatorAdapter } from './translator-adapter.js';

export const NO_LANGUAGES_TEXT =
  "No languages added yet. Add languages with '/add-lang <code-or-name>'";

export interface BroadcastChatDeps {
  languageSet: GlobalLanguageSet;
  translator: TranslatorAdapter;
  moderationGate: ModerationGate;
  broadcaster: MessageBroadcaster;
  generateMessageSuffix: () => string;
  now?: () => Date;
  logger: Logger;
}

/**
 * Use case for a chat line: translate into every active language, then deliver
 * one identical event to each connection that has not blocked the sender.
 */
export class BroadcastChatUseCase {
  private readonly deps: BroadcastChatDeps;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: BroadcastChatDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger.child({ useCase: 'BroadcastChat' });
  }

  /**
   * Returns undefined when there was nothing to translate into.
   */
  async execute(sender: Connection, text: string): Promise<FanOutResult | undefined> {
    const languages = this.deps.languageSet.list();
    if (languages.length === 0) {
      await this.deps.broadcaster.sendToConnection(sender, info(NO_LANGUAGES_TEXT));
      return undefined;
    }

    const translations = await this.deps.translator.translateAll(languages, text);

    const timestamp = this.now().toISOString();
    const event: ChatEventMessage = {
      type: 'chat',
      sender: sender.displayName,
      sender_id: sender.identity?.userId ?? null,
      color: sender.color,
      original: text,
      translations,
      timestamp,
      message_id: `${timestamp}-${this.deps.generateMessageSuffix()}`,
    };

    const result = await this.deps.broadcaster.broadcastToAll(event, (recipient) =>
      this.hasBlockedSender(recipient, sender)
    );

    this.logger.info(
      {
        connectionId: sender.id,
        messageId: event.message_id,
        languages: languages.length,
        ...result,
      },
      'Chat message broadcast'
    );

    return result;
  }

  /**
   * The sender always gets its own message back.
   */
  private async hasBlockedSender(recipient: Connection, sender: Connection): Promise<boolean> {
    const identity = recipient.identity;
    if (!identity || recipient.id === sender.id) {
      return false;
    }
    return this.deps.moderationGate.isBlocked(identity.userId, sender.displayName);
  }
}

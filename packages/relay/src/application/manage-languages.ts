/**
 * @file manage-languages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { GlobalLanguageSet } from '../domain/entities/language-set.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import { UnrecognizedLanguageError } from '../domain/errors/domain-errors.js';
import { info, languageUpdate } from '../protocol/messages.js';
import type { LanguageNormalizer } from './language-normalizer.js';

export interface ManageLanguagesDeps {
  languageSet: GlobalLanguageSet;
  normalizer: LanguageNormalizer;
  broadcaster: MessageBroadcaster;
  logger: Logger;
}

/**
 * Use case for /add-lang and /remove-lang.
 * Changes to the set are announced to every connection; rejections go to the sender only.
 */
export class ManageLanguagesUseCase {
  private readonly deps: ManageLanguagesDeps;
  private readonly logger: Logger;

  constructor(deps: ManageLanguagesDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ useCase: 'ManageLanguages' });
  }

  async add(connection: Connection, input: string): Promise<void> {
    const code = this.canonicalCode(input);
    const outcome = this.deps.languageSet.add(code);

    if (outcome === 'already_active') {
      await this.deps.broadcaster.sendToConnection(
        connection,
        info(`Language '${code}' is already active`)
      );
      return;
    }

    this.logger.info(
      { connectionId: connection.id, language: code, size: this.deps.languageSet.size },
      'Language added'
    );
    await this.announce();
  }

  async remove(connection: Connection, input: string): Promise<void> {
    const code = this.canonicalCode(input);
    if (!this.deps.languageSet.remove(code)) {
      return;
    }

    this.logger.info(
      { connectionId: connection.id, language: code, size: this.deps.languageSet.size },
      'Language removed'
    );
    await this.announce();
  }

  private canonicalCode(input: string): string {
    const code = this.deps.normalizer.normalize(input);
    if (!code) {
      throw new UnrecognizedLanguageError(input.trim());
    }
    return code;
  }

  private async announce(): Promise<void> {
    await this.deps.broadcaster.broadcastToAll(languageUpdate(this.deps.languageSet.list()));
  }
}

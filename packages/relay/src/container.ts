/**
 * @file container.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { CHAT_LIMITS } from './config/constants.js';
import { GlobalLanguageSet } from './domain/entities/language-set.js';
import type { IdentityVerifier } from './domain/ports/identity-verifier.js';
import type { TranslationProvider } from './domain/ports/translation-provider.js';
import type { PastelColor } from './domain/value-objects/pastel-color.js';
import {
  BroadcastChatUseCase,
  CommandDispatcher,
  ConnectClientUseCase,
  HandleDisconnectionUseCase,
  LanguageNormalizer,
  ManageLanguagesUseCase,
  MessageBroadcasterImpl,
  ModerateUserUseCase,
  SetDisplayNameUseCase,
  TranslatorAdapter,
} from './application/index.js';
import { InMemoryConnectionRegistry } from './infrastructure/persistence/in-memory-registry.js';
import { InMemoryModerationStore } from './infrastructure/persistence/in-memory-moderation-store.js';
import { ConnectionHandler } from './infrastructure/websocket/connection-handler.js';

export interface RelayLimits {
  maxLanguages: number;
  maxMessageLength: number;
  maxDisplayNameLength: number;
}

export interface RelayServicesDeps {
  translationProvider: TranslationProvider;
  identityVerifier: IdentityVerifier;
  logger: Logger;
  generateId?: (size: number) => string;
  pickColor?: () => PastelColor;
  now?: () => Date;
}

/**
 * Wires the relay's registries and use cases. One instance is one chat room.
 */
export function createRelayServices(limits: RelayLimits, deps: RelayServicesDeps) {
  const { logger } = deps;
  const generateId = deps.generateId ?? ((size: number) => nanoid(size));

  const connectionRegistry = new InMemoryConnectionRegistry();
  const languageSet = new GlobalLanguageSet(limits.maxLanguages);
  const moderationStore = new InMemoryModerationStore({
    generateReportId: () => generateId(10),
    now: deps.now,
  });

  const broadcaster = new MessageBroadcasterImpl({ connectionRegistry, logger });
  const normalizer = new LanguageNormalizer({ catalog: deps.translationProvider, logger });
  const translator = new TranslatorAdapter({ provider: deps.translationProvider, logger });

  const connectClient = new ConnectClientUseCase({
    connectionRegistry,
    languageSet,
    broadcaster,
    identityVerifier: deps.identityVerifier,
    generateConnectionId: () => generateId(12),
    pickColor: deps.pickColor,
    logger,
  });

  const handleDisconnection = new HandleDisconnectionUseCase({
    connectionRegistry,
    broadcaster,
    logger,
  });

  const dispatcher = new CommandDispatcher({
    setDisplayName: new SetDisplayNameUseCase({
      connectionRegistry,
      broadcaster,
      maxDisplayNameLength: limits.maxDisplayNameLength,
      logger,
    }),
    manageLanguages: new ManageLanguagesUseCase({ languageSet, normalizer, broadcaster, logger }),
    moderateUser: new ModerateUserUseCase({
      moderationStore,
      broadcaster,
      maxReasonLength: CHAT_LIMITS.MAX_REPORT_REASON_LENGTH,
      logger,
    }),
    broadcastChat: new BroadcastChatUseCase({
      languageSet,
      translator,
      moderationGate: moderationStore,
      broadcaster,
      generateMessageSuffix: () => generateId(6),
      now: deps.now,
      logger,
    }),
    broadcaster,
    maxMessageLength: limits.maxMessageLength,
    logger,
  });

  const connectionHandler = new ConnectionHandler({
    connectClient,
    dispatcher,
    handleDisconnection,
    logger,
  });

  return {
    connectionRegistry,
    languageSet,
    moderationStore,
    broadcaster,
    normalizer,
    translator,
    connectClient,
    handleDisconnection,
    dispatcher,
    connectionHandler,
  };
}

export type RelayServices = ReturnType<typeof createRelayServices>;

/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  LanguageNormalizer,
  normalizeLanguage,
  buildLanguageLookup,
  FALLBACK_LOOKUP,
  type LanguageLookup,
  type LanguageNormalizerDeps,
} from './language-normalizer.js';

export {
  TranslatorAdapter,
  type TranslationOutcome,
  type TranslatorAdapterDeps,
} from './translator-adapter.js';

export {
  MessageBroadcasterImpl,
  type MessageBroadcasterImplDeps,
} from './services/message-broadcaster-impl.js';

export {
  ConnectClientUseCase,
  WELCOME_TEXT,
  type ConnectClientDeps,
} from './connect-client.js';

export {
  HandleDisconnectionUseCase,
  type HandleDisconnectionDeps,
} from './handle-disconnection.js';

export {
  SetDisplayNameUseCase,
  type SetDisplayNameDeps,
} from './set-display-name.js';

export {
  ManageLanguagesUseCase,
  type ManageLanguagesDeps,
} from './manage-languages.js';

export {
  ModerateUserUseCase,
  type ModerateUserDeps,
} from './moderate-user.js';

export {
  BroadcastChatUseCase,
  NO_LANGUAGES_TEXT,
  type BroadcastChatDeps,
} from './broadcast-chat.js';

export {
  CommandDispatcher,
  type CommandDispatcherDeps,
} from './command-dispatcher.js';

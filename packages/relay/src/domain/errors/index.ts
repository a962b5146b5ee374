/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  InvalidCommandError,
  UnrecognizedLanguageError,
  LanguageLimitReachedError,
  AuthenticationRequiredError,
  MessageTooLongError,
  ModerationRejectedError,
  InternalError,
  TransportClosedError,
  type ErrorCode,
} from './domain-errors.js';

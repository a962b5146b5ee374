/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Codes carried by errors that are reported back to the originating connection.
 */
export type ErrorCode =
  | 'INVALID_COMMAND'
  | 'UNRECOGNIZED_LANGUAGE'
  | 'LANGUAGE_LIMIT_REACHED'
  | 'AUTH_REQUIRED'
  | 'MESSAGE_TOO_LONG'
  | 'MODERATION_REJECTED'
  | 'INTERNAL_ERROR';

/**
 * Base class for all domain errors.
 * Provides structured error information for protocol responses.
 */
export abstract class DomainError extends Error {
  abstract readonly code: ErrorCode | 'TRANSPORT_CLOSED';

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a known command arrives with missing or malformed arguments.
 */
export class InvalidCommandError extends DomainError {
  readonly code = 'INVALID_COMMAND';

  constructor(readonly usage: string) {
    super(`Usage: ${usage}`);
  }
}

/**
 * Error thrown when input matches neither a language code nor a language name.
 */
export class UnrecognizedLanguageError extends DomainError {
  readonly code = 'UNRECOGNIZED_LANGUAGE';

  constructor(readonly input: string) {
    super(`Unrecognized language: '${input}'`);
  }
}

/**
 * Error thrown when adding a language would exceed the global language limit.
 */
export class LanguageLimitReachedError extends DomainError {
  readonly code = 'LANGUAGE_LIMIT_REACHED';

  constructor(readonly limit: number) {
    super(`Language limit reached (max ${limit})`);
  }
}

/**
 * Error thrown when a moderation command is used without an authenticated identity.
 */
export class AuthenticationRequiredError extends DomainError {
  readonly code = 'AUTH_REQUIRED';

  constructor(command: string) {
    super(`You must be logged in to use /${command}`);
  }
}

/**
 * Error thrown when an inbound frame exceeds the configured length.
 */
export class MessageTooLongError extends DomainError {
  readonly code = 'MESSAGE_TOO_LONG';

  constructor(readonly limit: number) {
    super(`Message too long (max ${limit} characters)`);
  }
}

/**
 * Error thrown when the moderation store refuses a request (e.g. blocking yourself).
 */
export class ModerationRejectedError extends DomainError {
  readonly code = 'MODERATION_REJECTED';
}

/**
 * Error thrown when an internal server error occurs.
 */
export class InternalError extends DomainError {
  readonly code = 'INTERNAL_ERROR';

  constructor(message = 'An internal error occurred') {
    super(message);
  }
}

/**
 * Error thrown when writing to a connection whose socket is no longer open.
 * Never reported to clients; the broadcaster evicts the connection instead.
 */
export class TransportClosedError extends DomainError {
  readonly code = 'TRANSPORT_CLOSED';

  constructor(connectionId: string) {
    super(`Connection is closed: ${connectionId}`);
  }
}

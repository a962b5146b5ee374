/**
 * @file errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { DomainError } from '../domain/errors/domain-errors.js';
import type { ErrorCode, ErrorMessage } from './messages.js';

/**
 * Creates an error message in the protocol format.
 */
export function createErrorMessage(code: ErrorCode, message: string): ErrorMessage {
  return {
    error: message,
    code,
  };
}

/**
 * Predefined error message factories for common error scenarios.
 */
export const ProtocolErrors = {
  fromDomainError: (error: DomainError): ErrorMessage =>
    error.code === 'TRANSPORT_CLOSED'
      ? ProtocolErrors.internalError()
      : createErrorMessage(error.code, error.message),

  internalError: (message = 'An internal error occurred'): ErrorMessage =>
    createErrorMessage('INTERNAL_ERROR', message),
} as const;

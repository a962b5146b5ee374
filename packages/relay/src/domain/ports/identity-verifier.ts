/**
 * @file identity-verifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Identity } from '../value-objects/identity.js';

/**
 * Port for turning the credential presented at handshake into an identity.
 */
export interface IdentityVerifier {
  /**
   * Resolves to undefined for expired, malformed or forged credentials.
   */
  verify(token: string): Promise<Identity | undefined>;
}

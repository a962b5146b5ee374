/**
 * @file jwt-identity-verifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import jwt from 'jsonwebtoken';
import type { Logger } from 'pino';
import type { IdentityVerifier } from '../../domain/ports/identity-verifier.js';
import type { Identity } from '../../domain/value-objects/identity.js';
import { TokenClaimsSchema } from '../../protocol/schemas.js';

export interface JwtIdentityVerifierConfig {
  secret: string;
  /** Current time in milliseconds */
  now?: () => number;
}

/**
 * Verifies HS256 JSON Web Tokens issued by the account service.
 * Expects `sub` (username) and `user_id` claims; `exp` is honoured when present.
 */
export class JwtIdentityVerifier implements IdentityVerifier {
  private readonly secret: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(config: JwtIdentityVerifierConfig, logger: Logger) {
    this.secret = config.secret;
    this.now = config.now ?? Date.now;
    this.logger = logger.child({ component: 'JwtIdentityVerifier' });
  }

  async verify(token: string): Promise<Identity | undefined> {
    let payload: unknown;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (error) {
      this.logger.debug({ error }, 'Token rejected');
      return undefined;
    }

    const claims = TokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      this.logger.debug({ issues: claims.error.flatten() }, 'Invalid token claims');
      return undefined;
    }

    return { userId: claims.data.user_id, username: claims.data.sub };
  }
}

/**
 * Verifier used when no token secret is configured: every connection is anonymous.
 */
export class AnonymousIdentityVerifier implements IdentityVerifier {
  async verify(_token: string): Promise<Identity | undefined> {
    return undefined;
  }
}

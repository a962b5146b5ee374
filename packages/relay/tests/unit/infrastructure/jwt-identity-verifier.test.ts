/**
 * @file jwt-identity-verifier.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { createHmac } from 'crypto';
import jwt from 'jsonwebtoken';
import { describe, it, expect } from 'vitest';
import {
  AnonymousIdentityVerifier,
  JwtIdentityVerifier,
} from '../../../src/infrastructure/auth/jwt-identity-verifier.js';
import { silentLogger } from '../../helpers/fakes.js';

const SECRET = 'test-secret';
const NOW_MS = 2_000_000_000_000;

function encode(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function sign(header: unknown, claims: unknown, secret = SECRET): string {
  const signingInput = `${encode(header)}.${encode(claims)}`;
  const signature = createHmac('sha256', secret).update(signingInput).digest('base64url');
  return `${signingInput}.${signature}`;
}

const HEADER = { alg: 'HS256', typ: 'JWT' };

describe('JwtIdentityVerifier', () => {
  const verifier = new JwtIdentityVerifier({ secret: SECRET, now: () => NOW_MS }, silentLogger);

  it('should resolve the identity of a valid token', async () => {
    const token = sign(HEADER, { sub: 'alice', user_id: 'u-alice', exp: 2_000_000_600 });

    expect(await verifier.verify(token)).toEqual({ userId: 'u-alice', username: 'alice' });
  });

  it('should accept a token issued with jsonwebtoken', async () => {
    const token = jwt.sign({ sub: 'bob', user_id: 'u-bob', exp: 2_000_000_600 }, SECRET);

    expect(await verifier.verify(token)).toEqual({ userId: 'u-bob', username: 'bob' });
  });

  it('should accept a token without expiry', async () => {
    const token = sign(HEADER, { sub: 'alice', user_id: 'u-alice' });

    expect(await verifier.verify(token)).toEqual({ userId: 'u-alice', username: 'alice' });
  });

  it('should reject an expired token', async () => {
    const token = sign(HEADER, { sub: 'alice', user_id: 'u-alice', exp: 2_000_000_000 });

    expect(await verifier.verify(token)).toBeUndefined();
  });

  it('should reject a token signed with another secret', async () => {
    const token = sign(HEADER, { sub: 'alice', user_id: 'u-alice' }, 'other-secret');

    expect(await verifier.verify(token)).toBeUndefined();
  });

  it('should reject a token whose claims were changed', async () => {
    const [header, , signature] = sign(HEADER, { sub: 'alice', user_id: 'u-alice' }).split('.');
    const forged = `${header}.${encode({ sub: 'admin', user_id: 'u-admin' })}.${signature}`;

    expect(await verifier.verify(forged)).toBeUndefined();
  });

  it('should reject unsupported algorithms', async () => {
    const token = sign({ alg: 'none' }, { sub: 'alice', user_id: 'u-alice' });

    expect(await verifier.verify(token)).toBeUndefined();
  });

  it('should reject tokens missing required claims', async () => {
    const token = sign(HEADER, { sub: 'alice' });

    expect(await verifier.verify(token)).toBeUndefined();
  });

  it('should reject malformed tokens', async () => {
    expect(await verifier.verify('not-a-token')).toBeUndefined();
    expect(await verifier.verify('a.b.c.d')).toBeUndefined();
  });

  it('should reject signed segments that are not JSON', async () => {
    const signingInput = `${encode(HEADER)}.${Buffer.from('not json').toString('base64url')}`;
    const signature = createHmac('sha256', SECRET).update(signingInput).digest('base64url');

    expect(await verifier.verify(`${signingInput}.${signature}`)).toBeUndefined();
  });
});

describe('AnonymousIdentityVerifier', () => {
  it('should never resolve an identity', async () => {
    const token = sign(HEADER, { sub: 'alice', user_id: 'u-alice' });

    expect(await new AnonymousIdentityVerifier().verify(token)).toBeUndefined();
  });
});

/**
 * @file connection-handler.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { describe, it, expect } from 'vitest';
import { extractToken } from '../../../src/infrastructure/websocket/connection-handler.js';

describe('extractToken', () => {
  it('should read the token query parameter', () => {
    expect(extractToken('/ws?token=test-token')).toBe('test-token');
  });

  it('should decode the token', () => {
    expect(extractToken('/ws?token=a%2Bb')).toBe('a+b');
  });

  it('should return undefined without a token', () => {
    expect(extractToken('/ws')).toBeUndefined();
    expect(extractToken('/ws?token=')).toBeUndefined();
    expect(extractToken(undefined)).toBeUndefined();
  });
});

/**
 * @file in-memory-registry.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryConnectionRegistry } from '../../../src/infrastructure/persistence/in-memory-registry.js';
import { ALICE, FakeTransport, TEST_COLOR, makeConnection } from '../../helpers/fakes.js';

describe('InMemoryConnectionRegistry', () => {
  let registry: InMemoryConnectionRegistry;

  beforeEach(() => {
    registry = new InMemoryConnectionRegistry();
  });

  it('should register and look up connections', () => {
    const connection = makeConnection('c1');
    registry.register(connection);

    expect(registry.get('c1')).toBe(connection);
    expect(registry.has('c1')).toBe(true);
    expect(registry.count()).toBe(1);
  });

  it('should unregister idempotently', () => {
    registry.register(makeConnection('c1'));

    expect(registry.unregister('c1')).toBe(true);
    expect(registry.unregister('c1')).toBe(false);
    expect(registry.count()).toBe(0);
  });

  it('should replace an entry registered under the same id', () => {
    const first = makeConnection('c1');
    const second = makeConnection('c1');
    registry.register(first);
    registry.register(second);

    expect(registry.get('c1')).toBe(second);
    expect(registry.count()).toBe(1);
  });

  it('should list only named connections as active users', () => {
    registry.register(makeConnection('c1'));
    registry.register(makeConnection('c2'));
    registry.setDisplayName('c2', 'Ana');

    expect(registry.activeUsers()).toEqual([{ username: 'Ana', color: TEST_COLOR }]);
  });

  it('should return undefined when naming an unknown connection', () => {
    expect(registry.setDisplayName('missing', 'Ana')).toBeUndefined();
  });

  it('should snapshot connected entries in registration order', () => {
    registry.register(makeConnection('c1'));
    registry.register(makeConnection('c2'));
    registry.register(makeConnection('c3'));
    registry.get('c2')?.markDisconnected();

    const snapshot = registry.snapshotActive();
    registry.unregister('c1');

    expect(snapshot.map((connection) => connection.id)).toEqual(['c1', 'c3']);
  });

  it('should index connections by account', () => {
    registry.register(makeConnection('c1', new FakeTransport(), ALICE));
    registry.register(makeConnection('c2', new FakeTransport(), ALICE));
    registry.register(makeConnection('c3'));

    expect(registry.getByIdentity('u-alice').map((connection) => connection.id)).toEqual([
      'c1',
      'c2',
    ]);

    registry.unregister('c1');
    registry.unregister('c2');
    expect(registry.getByIdentity('u-alice')).toEqual([]);
  });
});

/**
 * @file connection-id.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Value object identifying one live socket for as long as it stays registered.
 * The registry keys every piece of per-connection state by this id, never by the socket.
 */
export class ConnectionId {
  private readonly _value: string;

  private constructor(value: string) {
    this._value = value;
  }

  get value(): string {
    return this._value;
  }

  static create(value: string): ConnectionId {
    if (!value || value.trim().length === 0) {
      throw new Error('ConnectionId cannot be empty');
    }
    return new ConnectionId(value.trim());
  }

  static generate(generator: () => string): ConnectionId {
    return ConnectionId.create(generator());
  }

  equals(other: ConnectionId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

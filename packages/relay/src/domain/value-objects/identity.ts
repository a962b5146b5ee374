/**
 * @file identity.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Authenticated account behind a connection, established once at handshake.
 */
export interface Identity {
  readonly userId: string;
  /** Registered account name; overrides any name the client picks with /name */
  readonly username: string;
}

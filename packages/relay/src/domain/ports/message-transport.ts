/**
 * @file message-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Port for the write side of one client socket.
 */
export interface MessageTransport {
  /**
   * Whether frames can currently be written.
   */
  readonly isOpen: boolean;

  /**
   * Writes one text frame. Rejects if the socket is closed or the write fails.
   */
  send(data: string): Promise<void>;

  /**
   * Drops the socket without a closing handshake.
   */
  terminate(): void;
}

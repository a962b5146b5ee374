/**
 * @file ws-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { WebSocket } from 'ws';
import type { MessageTransport } from '../../domain/ports/message-transport.js';

/**
 * MessageTransport over a `ws` socket. A write resolves once ws has flushed it.
 */
export class WsTransport implements MessageTransport {
  constructor(private readonly socket: WebSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  terminate(): void {
    this.socket.terminate();
  }
}

/**
 * @file connection-handler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { IncomingMessage } from 'http';
import type { WebSocket } from 'ws';
import type { Logger } from 'pino';
import type { Connection } from '../../domain/entities/connection.js';
import type { ConnectClientUseCase } from '../../application/connect-client.js';
import type { HandleDisconnectionUseCase } from '../../application/handle-disconnection.js';
import type { CommandDispatcher } from '../../application/command-dispatcher.js';
import { WsTransport } from './ws-transport.js';

/**
 * Metadata attached to each WebSocket connection.
 * `queue` serializes the socket's work: handshake, then frames in arrival order, then close.
 */
interface ConnectionMeta {
  connection?: Connection;
  queue: Promise<void>;
  closed: boolean;
}

export interface ConnectionHandlerDeps {
  connectClient: ConnectClientUseCase;
  dispatcher: CommandDispatcher;
  handleDisconnection: HandleDisconnectionUseCase;
  logger: Logger;
}

/**
 * Reads the optional `token` query parameter of the upgrade request.
 */
export function extractToken(url: string | undefined): string | undefined {
  const token = new URL(url ?? '/', 'http://localhost').searchParams.get('token');
  return token || undefined;
}

function decodeFrame(data: Buffer | ArrayBuffer | Buffer[]): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Handles individual WebSocket connections.
 * Sockets are processed independently; one socket's frames never wait on another's.
 */
export class ConnectionHandler {
  private readonly meta = new WeakMap<WebSocket, ConnectionMeta>();
  private readonly deps: ConnectionHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: ConnectionHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'ConnectionHandler' });
  }

  /**
   * Sets up event handlers for a new WebSocket connection.
   */
  handleConnection(socket: WebSocket, request?: IncomingMessage): void {
    const meta: ConnectionMeta = { queue: Promise.resolve(), closed: false };
    this.meta.set(socket, meta);

    const token = extractToken(request?.url);
    this.enqueue(meta, async () => {
      meta.connection = await this.deps.connectClient.execute(new WsTransport(socket), token);
    });

    socket.on('message', (data: Buffer | ArrayBuffer | Buffer[]) => {
      const frame = decodeFrame(data);
      this.enqueue(meta, () => this.handleFrame(meta, frame));
    });

    socket.on('close', () => {
      meta.closed = true;
      this.enqueue(meta, () => this.handleClose(socket, meta));
    });

    socket.on('error', (error) => {
      this.logger.error({ error, connectionId: meta.connection?.id }, 'WebSocket error');
    });
  }

  private enqueue(meta: ConnectionMeta, task: () => Promise<void>): void {
    meta.queue = meta.queue.then(task).catch((error: unknown) => {
      this.logger.error({ error, connectionId: meta.connection?.id }, 'Connection task failed');
    });
  }

  /**
   * Processes an incoming frame from a WebSocket connection.
   */
  private async handleFrame(meta: ConnectionMeta, frame: string): Promise<void> {
    const connection = meta.connection;
    if (!connection || meta.closed || !connection.isConnected) {
      return;
    }
    await this.deps.dispatcher.dispatch(connection, frame);
  }

  /**
   * Handles WebSocket connection close.
   */
  private async handleClose(socket: WebSocket, meta: ConnectionMeta): Promise<void> {
    this.meta.delete(socket);
    if (meta.connection) {
      await this.deps.handleDisconnection.execute(meta.connection);
    }
  }
}

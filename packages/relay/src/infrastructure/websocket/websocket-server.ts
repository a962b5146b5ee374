/**
 * @file websocket-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocketServer as WSServer, type WebSocket } from 'ws';
import type { IncomingMessage, Server } from 'http';
import type { Logger } from 'pino';
import type { ConnectionHandler } from './connection-handler.js';

export interface WebSocketServerConfig {
  path: string;
  heartbeatIntervalMs: number;
  maxPayloadBytes: number;
}

export interface WebSocketServerDeps {
  connectionHandler: ConnectionHandler;
  logger: Logger;
}

/**
 * WebSocket server wrapper that integrates with the HTTP server
 * and manages the WebSocket lifecycle.
 */
export class WebSocketServerWrapper {
  private wss: WSServer | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private readonly alive = new WeakSet<WebSocket>();
  private readonly config: WebSocketServerConfig;
  private readonly deps: WebSocketServerDeps;
  private readonly logger: Logger;

  constructor(config: WebSocketServerConfig, deps: WebSocketServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Attaches the WebSocket server to an HTTP server.
   */
  attach(httpServer: Server): void {
    this.wss = new WSServer({
      server: httpServer,
      path: this.config.path,
      maxPayload: this.config.maxPayloadBytes,
    });

    this.wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      this.logger.debug({ remoteAddress: request.socket.remoteAddress }, 'New WebSocket connection');
      this.alive.add(socket);
      socket.on('pong', () => {
        this.alive.add(socket);
      });
      this.deps.connectionHandler.handleConnection(socket, request);
    });

    this.wss.on('error', (error) => {
      this.logger.error({ error }, 'WebSocket server error');
    });

    this.startHeartbeatCheck();

    this.logger.info({ path: this.config.path }, 'WebSocket server attached');
  }

  /**
   * Pings every socket; one that has not answered the previous ping is terminated,
   * which fires its close event and removes it from the registry.
   */
  private startHeartbeatCheck(): void {
    this.heartbeatInterval = setInterval(() => {
      this.wss?.clients.forEach((socket) => {
        if (!this.alive.has(socket)) {
          this.logger.info('Terminating unresponsive socket');
          socket.terminate();
          return;
        }
        this.alive.delete(socket);
        socket.ping();
      });
    }, this.config.heartbeatIntervalMs);
  }

  /**
   * Returns the number of connected sockets.
   */
  get connectionCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  /**
   * Closes the WebSocket server gracefully with timeout.
   * @param timeoutMs - Maximum time to wait for graceful close
   */
  async close(timeoutMs = 5000): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    const wss = this.wss;
    if (!wss) return;

    this.logger.info({ clientCount: wss.clients.size }, 'Closing WebSocket server');

    wss.clients.forEach((client) => {
      client.close(1001, 'Server shutting down');
    });

    const closePromise = new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          this.logger.error({ error: err }, 'Error closing WebSocket server');
          reject(err);
        } else {
          this.logger.info('WebSocket server closed gracefully');
          resolve();
        }
      });
    });

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(
          { timeoutMs, remainingClients: wss.clients.size },
          'WebSocket graceful close timed out, forcing termination'
        );
        wss.clients.forEach((client) => client.terminate());
        resolve();
      }, timeoutMs);
    });

    try {
      await Promise.race([closePromise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }
}

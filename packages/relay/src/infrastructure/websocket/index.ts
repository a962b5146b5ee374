/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  ConnectionHandler,
  extractToken,
  type ConnectionHandlerDeps,
} from './connection-handler.js';

export {
  WebSocketServerWrapper,
  type WebSocketServerConfig,
  type WebSocketServerDeps,
} from './websocket-server.js';

export { WsTransport } from './ws-transport.js';

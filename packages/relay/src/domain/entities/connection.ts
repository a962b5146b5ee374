/**
 * @file connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ConnectionId } from '../value-objects/connection-id.js';
import type { PastelColor } from '../value-objects/pastel-color.js';
import type { Identity } from '../value-objects/identity.js';
import type { MessageTransport } from '../ports/message-transport.js';
import { TransportClosedError } from '../errors/domain-errors.js';
import { CHAT_DEFAULTS } from '../../config/constants.js';

export type ConnectionStatus = 'connected' | 'disconnected';

export interface ConnectionProps {
  connectionId: ConnectionId;
  transport: MessageTransport;
  color: PastelColor;
  identity?: Identity;
}

/**
 * Entity representing one live chat socket.
 * Only the display name changes after construction.
 */
export class Connection {
  private readonly _connectionId: ConnectionId;
  private readonly _transport: MessageTransport;
  private readonly _color: PastelColor;
  private readonly _identity: Identity | undefined;
  private readonly _connectedAt: Date;
  private _displayName: string;
  private _hasChosenName: boolean;
  private _status: ConnectionStatus;

  constructor(props: ConnectionProps) {
    this._connectionId = props.connectionId;
    this._transport = props.transport;
    this._color = props.color;
    this._identity = props.identity;
    this._connectedAt = new Date();
    this._displayName = CHAT_DEFAULTS.DISPLAY_NAME;
    this._hasChosenName = false;
    this._status = 'connected';
  }

  get connectionId(): ConnectionId {
    return this._connectionId;
  }

  get id(): string {
    return this._connectionId.value;
  }

  get color(): string {
    return this._color.hex;
  }

  get identity(): Identity | undefined {
    return this._identity;
  }

  get isAuthenticated(): boolean {
    return this._identity !== undefined;
  }

  get connectedAt(): Date {
    return this._connectedAt;
  }

  get displayName(): string {
    return this._displayName;
  }

  /**
   * True once the connection picked a name; presence lists skip the rest.
   */
  get hasChosenName(): boolean {
    return this._hasChosenName;
  }

  get status(): ConnectionStatus {
    return this._status;
  }

  get isConnected(): boolean {
    return this._status === 'connected';
  }

  rename(displayName: string): void {
    this._displayName = displayName;
    this._hasChosenName = true;
  }

  markDisconnected(): void {
    this._status = 'disconnected';
  }

  /**
   * Writes one serialized event to the socket.
   * @throws TransportClosedError if the connection is already gone
   */
  async send(message: string): Promise<void> {
    if (!this.isConnected || !this._transport.isOpen) {
      throw new TransportClosedError(this.id);
    }
    await this._transport.send(message);
  }

  /**
   * Marks the connection disconnected and drops its socket.
   */
  close(): void {
    this.markDisconnected();
    this._transport.terminate();
  }
}

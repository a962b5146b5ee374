/**
 * @file message-broadcaster-impl.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../../domain/entities/connection.js';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';
import type {
  FanOutResult,
  MessageBroadcaster,
  RecipientFilter,
} from '../../domain/ports/message-broadcaster.js';
import type { OutgoingMessage } from '../../protocol/messages.js';

export interface MessageBroadcasterImplDeps {
  connectionRegistry: ConnectionRegistry;
  logger: Logger;
}

type DeliveryOutcome = 'delivered' | 'skipped' | 'failed';

/**
 * Fan-out over a registry snapshot.
 *
 * The payload is serialized once, so every recipient gets the same bytes. Connections
 * whose write fails are evicted only after the whole pass, and eviction goes through the
 * idempotent unregister, so a socket that closes on its own mid-broadcast is harmless.
 */
export class MessageBroadcasterImpl implements MessageBroadcaster {
  private readonly connectionRegistry: ConnectionRegistry;
  private readonly logger: Logger;

  constructor(deps: MessageBroadcasterImplDeps) {
    this.connectionRegistry = deps.connectionRegistry;
    this.logger = deps.logger.child({ service: 'broadcaster' });
  }

  async broadcastToAll(message: OutgoingMessage, skip?: RecipientFilter): Promise<FanOutResult> {
    const payload = JSON.stringify(message);
    const recipients = this.connectionRegistry.snapshotActive();

    const outcomes = await Promise.all(
      recipients.map(async (recipient) => {
        const outcome = await this.deliver(recipient, payload, skip);
        return [recipient, outcome] as const;
      })
    );

    const result: FanOutResult = { delivered: 0, skipped: 0, evicted: [] };
    for (const [recipient, outcome] of outcomes) {
      if (outcome === 'delivered') {
        result.delivered++;
      } else if (outcome === 'skipped') {
        result.skipped++;
      } else {
        this.evict(recipient);
        result.evicted.push(recipient.id);
      }
    }

    this.logger.debug(
      { recipients: recipients.length, ...result, messageType: messageType(message) },
      'broadcastToAll'
    );

    return result;
  }

  async sendToConnection(connection: Connection, message: OutgoingMessage): Promise<boolean> {
    try {
      await connection.send(JSON.stringify(message));
      return true;
    } catch (error) {
      this.logger.warn(
        { connectionId: connection.id, error },
        'sendToConnection - send failed, evicting connection'
      );
      this.evict(connection);
      return false;
    }
  }

  private async deliver(
    recipient: Connection,
    payload: string,
    skip: RecipientFilter | undefined
  ): Promise<DeliveryOutcome> {
    if (skip && (await this.isWithheld(recipient, skip))) {
      return 'skipped';
    }
    try {
      await recipient.send(payload);
      return 'delivered';
    } catch (error) {
      this.logger.warn(
        { connectionId: recipient.id, error },
        'broadcastToAll - send failed, marking connection for eviction'
      );
      return 'failed';
    }
  }

  /**
   * A filter that throws withholds the event; the recipient is not evicted.
   */
  private async isWithheld(recipient: Connection, skip: RecipientFilter): Promise<boolean> {
    try {
      return await skip(recipient);
    } catch (error) {
      this.logger.error(
        { connectionId: recipient.id, error },
        'Recipient filter failed, withholding message'
      );
      return true;
    }
  }

  private evict(connection: Connection): void {
    const removed = this.connectionRegistry.unregister(connection.id);
    connection.close();
    if (removed) {
      this.logger.info({ connectionId: connection.id }, 'Evicted unreachable connection');
    }
  }
}

function messageType(message: OutgoingMessage): string {
  return 'type' in message ? message.type : 'unicast';
}

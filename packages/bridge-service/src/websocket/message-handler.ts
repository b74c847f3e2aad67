import {
  WSClientMessage,
  WSClientMessageHeader,
  WSClientMessageType,
  type WSServerMessage,
} from '@serialbridge/shared/types';
import { errorMessage } from '@serialbridge/shared/protocol';
import type { ClientRegistry } from './connection-manager.js';

/**
 * Where client publishes end up (the serial device)
 */
export interface DevicePublisher {
  publish(topic: string, payload: string): Promise<boolean>;
}

export class MessageHandler {
  constructor(
    private registry: ClientRegistry,
    private publisher: DevicePublisher
  ) {}

  /**
   * Handle one raw frame from a client. Every reply goes to that client only.
   */
  async handleMessage(clientId: string, rawMessage: string): Promise<void> {
    this.registry.touch(clientId);

    try {
      await this.dispatch(clientId, rawMessage);
    } catch (err) {
      console.error(`[WS] Error handling message from ${clientId}: ${errorMessage(err)}`);
      await this.sendError(clientId, 'Internal server error');
    }
  }

  private async dispatch(clientId: string, rawMessage: string): Promise<void> {
    let parsed: unknown;

    try {
      parsed = JSON.parse(rawMessage);
    } catch {
      console.warn(`[WS] Invalid JSON from ${clientId}: ${rawMessage}`);
      await this.sendError(clientId, 'Invalid JSON format');
      return;
    }

    const header = WSClientMessageHeader.safeParse(parsed);
    if (!header.success) {
      await this.sendError(clientId, 'Invalid message format');
      return;
    }

    // Unrecognized types get no reply
    const type = WSClientMessageType.safeParse(header.data.type);
    if (!type.success) {
      console.warn(`[WS] Ignoring unknown message type from ${clientId}: ${header.data.type}`);
      return;
    }

    const result = WSClientMessage.safeParse(header.data);
    if (!result.success) {
      await this.sendError(clientId, 'Invalid message format');
      return;
    }

    const message = result.data;

    switch (message.type) {
      case 'publish':
        await this.handlePublish(clientId, message);
        break;

      case 'ping':
        await this.send(clientId, { type: 'pong' });
        break;
    }
  }

  private async handlePublish(
    clientId: string,
    message: Extract<WSClientMessage, { type: 'publish' }>
  ): Promise<void> {
    if (!message.topic) {
      await this.sendError(clientId, 'Topic is required');
      return;
    }

    const success = await this.publisher.publish(message.topic, message.payload);
    await this.send(clientId, { type: 'ack', success, topic: message.topic });
  }

  private async send(clientId: string, message: WSServerMessage): Promise<void> {
    await this.registry.sendTo(message, clientId);
  }

  private async sendError(clientId: string, message: string): Promise<void> {
    await this.send(clientId, { type: 'error', message });
  }
}

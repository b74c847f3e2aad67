import { DEVICE_SOURCE, type WSServerMessage, type WSServerMessageOf } from '@serialbridge/shared/types';
import { errorMessage } from '@serialbridge/shared/protocol';
import type { SerialLinkManager } from '../serial/link-manager.js';
import type { ClientRegistry } from '../websocket/connection-manager.js';
import { MessageHandler, type DevicePublisher } from '../websocket/message-handler.js';
import { delay } from '../utils/delay.js';

export interface BridgeRouterOptions {
  /** Wait after a read that produced nothing */
  idleDelayMs?: number;
  /** Poll interval while the link is down */
  disconnectedDelayMs?: number;
  /** Pause after an unexpected error in the pump */
  errorCooldownMs?: number;
}

/**
 * The part of the link manager the router drives
 */
export type RoutedLink = Pick<
  SerialLinkManager,
  'isConnected' | 'port' | 'baudRate' | 'readMessage' | 'writeMessage' | 'disconnect' | 'onStatusChange'
>;

/**
 * Moves device lines to clients and client publishes to the device
 */
export class BridgeRouter implements DevicePublisher {
  private readonly handler: MessageHandler;
  private readonly idleDelayMs: number;
  private readonly disconnectedDelayMs: number;
  private readonly errorCooldownMs: number;
  private controller: AbortController | null = null;
  private pump: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private link: RoutedLink,
    private registry: ClientRegistry,
    options: BridgeRouterOptions = {}
  ) {
    this.handler = new MessageHandler(registry, this);
    this.idleDelayMs = options.idleDelayMs ?? 10;
    this.disconnectedDelayMs = options.disconnectedDelayMs ?? 500;
    this.errorCooldownMs = options.errorCooldownMs ?? 1000;
  }

  get running(): boolean {
    return this.pump !== null;
  }

  start(): void {
    if (this.pump) return;

    this.unsubscribe = this.link.onStatusChange((connected) => this.broadcastStatus(connected));
    const controller = new AbortController();
    this.controller = controller;
    this.pump = this.runPump(controller.signal);
    console.log('[Bridge] Message routing started');
  }

  async stop(): Promise<void> {
    const pump = this.pump;
    if (!pump) return;

    this.controller?.abort();
    await pump;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.controller = null;
    this.pump = null;
    console.log('[Bridge] Message routing stopped');
  }

  handleClientMessage(clientId: string, rawMessage: string): Promise<void> {
    return this.handler.handleMessage(clientId, rawMessage);
  }

  publish(topic: string, payload: string): Promise<boolean> {
    return this.link.writeMessage(topic, payload);
  }

  /**
   * Tell a newly connected client where the link stands
   */
  async sendInitialStatus(clientId: string): Promise<void> {
    await this.registry.sendTo(this.statusEnvelope(this.link.isConnected), clientId);
  }

  statusEnvelope(connected: boolean): WSServerMessageOf<'status'> {
    return {
      type: 'status',
      status: connected ? 'connected' : 'disconnected',
      details: {
        serial_port: this.link.port,
        baudrate: this.link.baudRate,
      },
    };
  }

  private async broadcastStatus(connected: boolean): Promise<void> {
    const delivered = await this.registry.broadcast(this.statusEnvelope(connected));
    console.log(`[Bridge] Serial ${connected ? 'connected' : 'disconnected'}, notified ${delivered} client(s)`);
  }

  private async runPump(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (!this.link.isConnected) {
        await delay(this.disconnectedDelayMs, signal);
        continue;
      }

      try {
        const message = await this.link.readMessage();
        if (!message) {
          await delay(this.idleDelayMs, signal);
          continue;
        }

        const envelope: WSServerMessage = {
          type: 'message',
          topic: message.topic,
          payload: message.payload,
          source: DEVICE_SOURCE,
        };
        await this.registry.broadcast(envelope);
      } catch (err) {
        console.error(`[Bridge] Error in message routing: ${errorMessage(err)}`);
        await this.link.disconnect();
        await delay(this.errorCooldownMs, signal);
      }
    }
  }
}

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import {
  WSServerMessage,
  type LinkStatus,
  type WSClientMessageInput,
  type WSServerMessageOf,
} from '@serialbridge/shared/types';
import { errorMessage } from '@serialbridge/shared/protocol';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export type TopicCallback = (payload: string, message: WSServerMessageOf<'message'>) => void;

export interface BridgeClientOptions {
  /** e.g. ws://localhost:8000/ws */
  url: string;
  /** Reconnect after an unexpected close (default true) */
  reconnect?: boolean;
  baseReconnectDelay?: number;
  maxReconnectDelay?: number;
  maxReconnectAttempts?: number;
}

/**
 * Delay before reconnect attempt `attempt` (1-based)
 */
export function reconnectDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
}

/**
 * WebSocket client for the serial bridge.
 *
 * Events: stateChange, connected, disconnected, message, linkStatus, ack,
 * pong, serverError, maxReconnectAttemptsReached, error.
 */
export class BridgeClient extends EventEmitter {
  private ws: WebSocket | null = null;
  private _state: ConnectionState = 'disconnected';
  private _linkStatus: LinkStatus | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private subscriptions = new Map<string, Set<TopicCallback>>();

  constructor(private options: BridgeClientOptions) {
    super();
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Last device link status reported by the bridge */
  get linkStatus(): LinkStatus | null {
    return this._linkStatus;
  }

  private setState(state: ConnectionState): void {
    if (this._state !== state) {
      this._state = state;
      this.emit('stateChange', state);
    }
  }

  connect(): void {
    if (this._state === 'connected' || this._state === 'connecting') {
      return;
    }

    this.clearReconnectTimer();
    this.setState('connecting');

    const socket = new WebSocket(this.options.url);
    this.ws = socket;

    socket.on('open', () => {
      if (this.ws !== socket) return;
      this.reconnectAttempts = 0;
      this.setState('connected');
      this.emit('connected');
    });

    socket.on('message', (data) => {
      if (this.ws !== socket) return;
      this.handleFrame(data.toString());
    });

    socket.on('close', () => {
      if (this.ws !== socket) return;
      this.ws = null;
      this.setState('disconnected');
      this.emit('disconnected');
      this.scheduleReconnect();
    });

    socket.on('error', (error) => {
      this.reportError(error);
    });
  }

  /**
   * Close the connection and cancel any scheduled reconnect
   */
  disconnect(): void {
    this.clearReconnectTimer();

    const socket = this.ws;
    this.ws = null;
    if (socket) {
      socket.close(1000, 'Client disconnect');
    }

    this.reconnectAttempts = 0;
    this.setState('disconnected');
  }

  publish(topic: string, payload: string | number | boolean): boolean {
    return this.send({ type: 'publish', topic, payload });
  }

  ping(): boolean {
    return this.send({ type: 'ping' });
  }

  /**
   * Call `callback` for every device message on `topic`. Returns an unsubscribe function.
   */
  subscribe(topic: string, callback: TopicCallback): () => void {
    let callbacks = this.subscriptions.get(topic);
    if (!callbacks) {
      callbacks = new Set();
      this.subscriptions.set(topic, callbacks);
    }
    callbacks.add(callback);

    return () => this.unsubscribe(topic, callback);
  }

  /**
   * Remove one callback, or every callback for the topic when none is given
   */
  unsubscribe(topic: string, callback?: TopicCallback): void {
    const callbacks = this.subscriptions.get(topic);
    if (!callbacks) return;

    if (callback) {
      callbacks.delete(callback);
    } else {
      callbacks.clear();
    }
    if (callbacks.size === 0) {
      this.subscriptions.delete(topic);
    }
  }

  private send(message: WSClientMessageInput): boolean {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      return false;
    }

    this.ws.send(JSON.stringify(message));
    return true;
  }

  private handleFrame(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[Client] Ignoring non-JSON frame: ${raw}`);
      return;
    }

    const result = WSServerMessage.safeParse(parsed);
    if (!result.success) {
      console.warn(`[Client] Ignoring unrecognized frame: ${raw}`);
      return;
    }

    const message = result.data;
    this.emit('message', message);

    switch (message.type) {
      case 'message':
        this.dispatchToSubscribers(message);
        break;

      case 'status':
        if (this._linkStatus !== message.status) {
          this._linkStatus = message.status;
          this.emit('linkStatus', message.status, message.details);
        }
        break;

      case 'ack':
        this.emit('ack', message);
        break;

      case 'pong':
        this.emit('pong');
        break;

      case 'error':
        this.emit('serverError', message.message);
        break;
    }
  }

  private dispatchToSubscribers(message: WSServerMessageOf<'message'>): void {
    const callbacks = this.subscriptions.get(message.topic);
    if (!callbacks) return;

    for (const callback of [...callbacks]) {
      try {
        callback(message.payload, message);
      } catch (err) {
        console.error(`[Client] Subscriber for "${message.topic}" failed: ${errorMessage(err)}`);
      }
    }
  }

  private scheduleReconnect(): void {
    if (this.options.reconnect === false) {
      return;
    }

    const maxAttempts = this.options.maxReconnectAttempts ?? Infinity;
    if (this.reconnectAttempts >= maxAttempts) {
      this.emit('maxReconnectAttemptsReached');
      return;
    }

    this.reconnectAttempts++;
    const delay = reconnectDelay(
      this.reconnectAttempts,
      this.options.baseReconnectDelay ?? 1000,
      this.options.maxReconnectDelay ?? 30000
    );

    this.setState('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // An 'error' event without listeners would throw
  private reportError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
      return;
    }
    console.error(`[Client] WebSocket error: ${error.message}`);
  }
}

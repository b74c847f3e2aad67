import { Mutex } from 'async-mutex';
import type { DeviceMessage, LinkState } from '@serialbridge/shared/types';
import {
  decodeLine,
  errorMessage,
  formatLine,
  hasFramingHazard,
  parseLine,
} from '@serialbridge/shared/protocol';
import { delay } from '../utils/delay.js';
import { openSerialPort, type LinkPort, type PortOpener } from './port.js';

export interface SerialLinkOptions {
  /** Device address, e.g. /dev/ttyUSB0 or COM3 */
  port: string;
  baudRate: number;
  /** Longest a single readMessage() waits for a line */
  readTimeoutMs: number;
  /** Fixed delay between reconnect attempts */
  reconnectIntervalMs: number;
  openPort?: PortOpener;
  maxBufferedLines?: number;
}

export type StatusObserver = (connected: boolean) => void | Promise<void>;

type LineWaiter = (line: Buffer | null) => void;

const DEFAULT_MAX_BUFFERED_LINES = 1024;

/**
 * Owns the serial device handle and its connect / reconnect lifecycle.
 *
 * Opening, writing and closing the handle all run under one mutex, so a
 * reconnect never races a write and two writes never interleave. Reads are
 * fed from the port's line events and never touch the handle.
 */
export class SerialLinkManager {
  private _state: LinkState = 'disconnected';
  private handle: LinkPort | null = null;
  private readonly mutex = new Mutex();
  private readonly openPort: PortOpener;
  private readonly maxBufferedLines: number;
  private lines: Buffer[] = [];
  private lineWaiters: LineWaiter[] = [];
  private observers = new Set<StatusObserver>();
  private reconnectController: AbortController | null = null;
  private reconnectLoop: Promise<void> | null = null;

  constructor(private readonly options: SerialLinkOptions) {
    this.openPort = options.openPort ?? openSerialPort;
    this.maxBufferedLines = options.maxBufferedLines ?? DEFAULT_MAX_BUFFERED_LINES;
  }

  get state(): LinkState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  get port(): string {
    return this.options.port;
  }

  get baudRate(): number {
    return this.options.baudRate;
  }

  get reconnecting(): boolean {
    return this.reconnectLoop !== null;
  }

  /**
   * Open the device. Resolves false instead of throwing when it cannot be opened.
   */
  async connect(): Promise<boolean> {
    const outcome = await this.mutex.runExclusive(async () => {
      if (this.handle) {
        return { connected: true, changed: false };
      }

      this._state = 'connecting';
      console.log(`[Serial] Attempting to connect to ${this.options.port} at ${this.options.baudRate} baud...`);

      try {
        const handle = await this.openPort({
          path: this.options.port,
          baudRate: this.options.baudRate,
        });
        this.handle = handle;
        this.attach(handle);
        this._state = 'connected';
        console.log(`[Serial] Connected to ${this.options.port}`);
        return { connected: true, changed: true };
      } catch (err) {
        this._state = 'disconnected';
        console.error(`[Serial] Failed to connect to ${this.options.port}: ${errorMessage(err)}`);
        return { connected: false, changed: false };
      }
    });

    if (outcome.changed) {
      await this.notifyStatus(true);
    }
    return outcome.connected;
  }

  /**
   * Release the device. Safe to call in any state.
   */
  async disconnect(): Promise<void> {
    const wasConnected = await this.mutex.runExclusive(() => this.releaseLocked());
    if (wasConnected) {
      console.log(`[Serial] Disconnected from ${this.options.port}`);
      await this.notifyStatus(false);
    }
  }

  /**
   * Wait for the next line and parse it. Resolves null on timeout, on a
   * malformed or empty line, and when the link is or goes down.
   */
  async readMessage(): Promise<DeviceMessage | null> {
    if (!this.handle) {
      return null;
    }

    const line = await this.nextLine();
    if (!line) {
      return null;
    }

    const { text, lossy } = decodeLine(line);
    if (lossy) {
      console.warn(`[Serial] Invalid UTF-8 in serial data (replaced): ${line.toString('hex')}`);
    }

    const result = parseLine(text);
    if (!result.ok) {
      if (result.reason !== 'empty') {
        console.warn(`[Serial] Invalid message format (${result.reason}): ${text.trim()}`);
      }
      return null;
    }
    return result.message;
  }

  /**
   * Format and write one message. Resolves false when not connected or when
   * the write fails, in which case the link is torn down.
   */
  async writeMessage(topic: string, payload: string): Promise<boolean> {
    if (!this.handle) {
      console.warn('[Serial] Cannot write: not connected');
      return false;
    }

    if (hasFramingHazard(topic, payload)) {
      console.warn(`[Serial] Message for topic "${topic}" contains framing characters and will not read back intact`);
    }

    const outcome = await this.mutex.runExclusive(async () => {
      const handle = this.handle;
      if (!handle) {
        return { written: false, lost: false };
      }

      try {
        await handle.write(formatLine(topic, payload));
        return { written: true, lost: false };
      } catch (err) {
        console.error(`[Serial] Serial error while writing: ${errorMessage(err)}`);
        return { written: false, lost: await this.releaseLocked() };
      }
    });

    if (outcome.lost) {
      await this.notifyStatus(false);
    }
    return outcome.written;
  }

  /**
   * Retry connect() every reconnectIntervalMs while the link is down.
   * Only one loop runs at a time.
   */
  startReconnectLoop(): void {
    if (this.reconnectLoop) {
      return;
    }

    const controller = new AbortController();
    this.reconnectController = controller;
    this.reconnectLoop = this.runReconnectLoop(controller.signal);
    console.log('[Serial] Reconnection loop started');
  }

  async stopReconnectLoop(): Promise<void> {
    const loop = this.reconnectLoop;
    if (!loop) {
      return;
    }

    // Cleared before awaiting so a start() issued meanwhile begins a new loop
    this.reconnectController?.abort();
    this.reconnectController = null;
    this.reconnectLoop = null;

    await loop;
    console.log('[Serial] Reconnection loop stopped');
  }

  /**
   * Observe connected/disconnected transitions. Returns an unsubscribe function.
   */
  onStatusChange(observer: StatusObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * Shutdown: no reconnect attempt may start once the port is being released.
   */
  async close(): Promise<void> {
    await this.stopReconnectLoop();
    await this.disconnect();
  }

  private async runReconnectLoop(signal: AbortSignal): Promise<void> {
    const seconds = this.options.reconnectIntervalMs / 1000;

    while (!signal.aborted) {
      if (!this.handle) {
        console.log(`[Serial] Attempting to reconnect to ${this.options.port}...`);
        const connected = await this.connect();
        if (!connected) {
          console.warn(`[Serial] Reconnection failed, will retry in ${seconds} seconds`);
        }
      }

      await delay(this.options.reconnectIntervalMs, signal);
    }
  }

  private attach(handle: LinkPort): void {
    handle.onLine((line) => {
      if (this.handle === handle) {
        this.pushLine(line);
      }
    });

    handle.onClose((error) => {
      if (this.handle === handle) {
        void this.handleLinkLoss(handle, error ? errorMessage(error) : 'port closed');
      }
    });

    handle.onError((error) => {
      console.error(`[Serial] Port error on ${this.options.port}: ${error.message}`);
      if (this.handle === handle) {
        void this.handleLinkLoss(handle, error.message);
      }
    });
  }

  private async handleLinkLoss(handle: LinkPort, reason: string): Promise<void> {
    const lost = await this.mutex.runExclusive(async () => {
      if (this.handle !== handle) {
        return false;
      }
      console.warn(`[Serial] Connection to ${this.options.port} lost: ${reason}`);
      return this.releaseLocked();
    });

    if (lost) {
      await this.notifyStatus(false);
    }
  }

  /**
   * Must run under the mutex. Drops the handle before closing it so the
   * resource is released even when close() fails.
   */
  private async releaseLocked(): Promise<boolean> {
    const handle = this.handle;
    this.handle = null;
    this._state = 'disconnected';
    this.lines = [];
    for (const waiter of [...this.lineWaiters]) {
      waiter(null);
    }

    if (!handle) {
      return false;
    }

    try {
      await handle.close();
    } catch (err) {
      console.error(`[Serial] Error during disconnect: ${errorMessage(err)}`);
    }
    return true;
  }

  private pushLine(line: Buffer): void {
    const waiter = this.lineWaiters[0];
    if (waiter) {
      waiter(line);
      return;
    }

    this.lines.push(line);
    if (this.lines.length > this.maxBufferedLines) {
      this.lines.shift();
      console.warn(`[Serial] Line buffer full (${this.maxBufferedLines}), dropped oldest line`);
    }
  }

  private nextLine(): Promise<Buffer | null> {
    const buffered = this.lines.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }

    return new Promise((resolve) => {
      const waiter: LineWaiter = (line) => {
        clearTimeout(timer);
        this.lineWaiters = this.lineWaiters.filter((pending) => pending !== waiter);
        resolve(line);
      };
      const timer = setTimeout(() => waiter(null), this.options.readTimeoutMs);
      this.lineWaiters.push(waiter);
    });
  }

  private async notifyStatus(connected: boolean): Promise<void> {
    const observers = [...this.observers];
    const results = await Promise.allSettled(observers.map(async (observer) => observer(connected)));

    for (const result of results) {
      if (result.status === 'rejected') {
        console.error(`[Serial] Error in status callback: ${errorMessage(result.reason)}`);
      }
    }
  }
}

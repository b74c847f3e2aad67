import type { LinkPort, PortOpener, PortOptions } from '../serial/port.js';
import type { ClientSocket } from '../websocket/connection-manager.js';

/**
 * In-memory serial port for tests
 */
export class FakePort implements LinkPort {
  readonly written: string[] = [];
  readonly events: string[] = [];
  closeCalls = 0;
  failWrites = false;
  writeDelayMs = 0;

  private lineListeners: Array<(line: Buffer) => void> = [];
  private closeListeners: Array<(error?: Error) => void> = [];
  private errorListeners: Array<(error: Error) => void> = [];

  constructor(readonly options: PortOptions) {}

  async write(data: string): Promise<void> {
    this.events.push(`start:${data}`);
    if (this.writeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    }
    if (this.failWrites) {
      this.events.push(`fail:${data}`);
      throw new Error('Input/output error');
    }
    this.written.push(data);
    this.events.push(`end:${data}`);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  onLine(listener: (line: Buffer) => void): void {
    this.lineListeners.push(listener);
  }

  onClose(listener: (error?: Error) => void): void {
    this.closeListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  /** Simulate the device sending one line (without delimiter) */
  emitLine(line: string | Uint8Array): void {
    const bytes = typeof line === 'string' ? Buffer.from(line, 'utf-8') : Buffer.from(line);
    for (const listener of this.lineListeners) {
      listener(bytes);
    }
  }

  /** Simulate the device being unplugged */
  unplug(error = new Error('Port disconnected')): void {
    for (const listener of this.closeListeners) {
      listener(error);
    }
  }
}

/**
 * PortOpener that hands out FakePorts and records every attempt
 */
export class FakePortOpener {
  available = true;
  readonly ports: FakePort[] = [];
  readonly attemptTimes: number[] = [];

  readonly open: PortOpener = async (options) => {
    this.attemptTimes.push(Date.now());
    if (!this.available) {
      throw new Error(`Error: No such file or directory, cannot open ${options.path}`);
    }
    const port = new FakePort(options);
    this.ports.push(port);
    return port;
  };

  get attempts(): number {
    return this.attemptTimes.length;
  }

  get current(): FakePort {
    const port = this.ports[this.ports.length - 1];
    if (!port) {
      throw new Error('No port has been opened');
    }
    return port;
  }
}

/**
 * Client socket stand-in recording what the registry sends
 */
export class FakeSocket implements ClientSocket {
  readyState = 1;
  readonly sent: string[] = [];
  failSends = false;
  throwOnSend = false;
  closeCode: number | undefined;
  closeReason: string | undefined;

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.throwOnSend) {
      throw new Error('WebSocket is not open');
    }
    if (this.failSends) {
      cb?.(new Error('write EPIPE'));
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string): void {
    this.readyState = 3;
    this.closeCode = code;
    this.closeReason = reason;
  }

  /** Sent frames, parsed */
  get messages(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }
}

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SerialLinkManager, type SerialLinkOptions } from './link-manager.js';
import { FakePortOpener } from '../testing/fakes.js';

function createLink(opener: FakePortOpener, overrides: Partial<SerialLinkOptions> = {}): SerialLinkManager {
  return new SerialLinkManager({
    port: '/dev/ttyTEST0',
    baudRate: 9600,
    readTimeoutMs: 1000,
    reconnectIntervalMs: 1000,
    openPort: opener.open,
    ...overrides,
  });
}

describe('SerialLinkManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts in disconnected state', () => {
    const link = createLink(new FakePortOpener());

    expect(link.state).toBe('disconnected');
    expect(link.isConnected).toBe(false);
  });

  describe('connect', () => {
    it('opens the configured port once and notifies observers', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      const statuses: boolean[] = [];
      link.onStatusChange((connected) => {
        statuses.push(connected);
      });

      expect(await link.connect()).toBe(true);
      expect(await link.connect()).toBe(true);

      expect(link.state).toBe('connected');
      expect(opener.attempts).toBe(1);
      expect(opener.current.options).toEqual({ path: '/dev/ttyTEST0', baudRate: 9600 });
      expect(statuses).toEqual([true]);
    });

    it('returns false without throwing when the device cannot be opened', async () => {
      const opener = new FakePortOpener();
      opener.available = false;
      const link = createLink(opener);
      const statuses: boolean[] = [];
      link.onStatusChange((connected) => {
        statuses.push(connected);
      });

      expect(await link.connect()).toBe(false);
      expect(link.state).toBe('disconnected');
      expect(statuses).toEqual([]);
    });
  });

  describe('disconnect', () => {
    it('is idempotent and releases the port once', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      const statuses: boolean[] = [];
      link.onStatusChange((connected) => {
        statuses.push(connected);
      });

      await link.connect();
      await link.disconnect();
      await link.disconnect();

      expect(link.state).toBe('disconnected');
      expect(opener.current.closeCalls).toBe(1);
      expect(statuses).toEqual([true, false]);
    });

    it('wakes a pending read with null', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();

      const pending = link.readMessage();
      await link.disconnect();

      expect(await pending).toBeNull();
    });
  });

  describe('readMessage', () => {
    it('returns null when not connected', async () => {
      const link = createLink(new FakePortOpener());

      expect(await link.readMessage()).toBeNull();
    });

    it('parses a line that arrives while waiting', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();

      const pending = link.readMessage();
      opener.current.emitLine('temp:21.5');

      expect(await pending).toEqual({ topic: 'temp', payload: '21.5' });
    });

    it('returns buffered lines in arrival order', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();

      opener.current.emitLine('a:1');
      opener.current.emitLine('b:2');

      expect(await link.readMessage()).toEqual({ topic: 'a', payload: '1' });
      expect(await link.readMessage()).toEqual({ topic: 'b', payload: '2' });
    });

    it('drops the oldest line when the buffer is full', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener, { maxBufferedLines: 2 });
      await link.connect();

      opener.current.emitLine('a:1');
      opener.current.emitLine('b:2');
      opener.current.emitLine('c:3');

      expect(await link.readMessage()).toEqual({ topic: 'b', payload: '2' });
      expect(await link.readMessage()).toEqual({ topic: 'c', payload: '3' });
    });

    it('returns null for malformed lines', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();

      opener.current.emitLine('no-colon-here');
      opener.current.emitLine(':payload');
      opener.current.emitLine('   ');

      expect(await link.readMessage()).toBeNull();
      expect(await link.readMessage()).toBeNull();
      expect(await link.readMessage()).toBeNull();
      expect(link.isConnected).toBe(true);
    });

    it('replaces invalid UTF-8 instead of failing', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();

      opener.current.emitLine(Uint8Array.from([0x74, 0x3a, 0xff]));

      expect(await link.readMessage()).toEqual({ topic: 't', payload: '\uFFFD' });
    });

    it('returns null after the read timeout', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener, { readTimeoutMs: 20 });
      await link.connect();

      expect(await link.readMessage()).toBeNull();
      expect(link.isConnected).toBe(true);
    });

    it('returns null and goes down when the device is unplugged mid-read', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      const statuses: boolean[] = [];
      link.onStatusChange((connected) => {
        statuses.push(connected);
      });
      await link.connect();

      const pending = link.readMessage();
      opener.current.unplug();

      expect(await pending).toBeNull();
      expect(link.state).toBe('disconnected');
      await vi.waitFor(() => expect(statuses).toEqual([true, false]));
      expect(opener.current.closeCalls).toBe(1);
    });
  });

  describe('writeMessage', () => {
    it('writes the formatted line', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();

      expect(await link.writeMessage('led', 'on')).toBe(true);
      expect(opener.current.written).toEqual(['led:on\n']);
    });

    it('returns false when not connected', async () => {
      const link = createLink(new FakePortOpener());

      expect(await link.writeMessage('led', 'on')).toBe(false);
    });

    it('tears the link down when the write fails', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      const statuses: boolean[] = [];
      link.onStatusChange((connected) => {
        statuses.push(connected);
      });
      await link.connect();
      opener.current.failWrites = true;

      expect(await link.writeMessage('led', 'on')).toBe(false);
      expect(link.state).toBe('disconnected');
      expect(statuses).toEqual([true, false]);
      expect(opener.current.closeCalls).toBe(1);
    });

    it('never interleaves concurrent writes', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      await link.connect();
      opener.current.writeDelayMs = 10;

      const results = await Promise.all([
        link.writeMessage('a', '1'),
        link.writeMessage('b', '2'),
      ]);

      expect(results).toEqual([true, true]);
      expect(opener.current.events).toEqual([
        'start:a:1\n',
        'end:a:1\n',
        'start:b:2\n',
        'end:b:2\n',
      ]);
    });
  });

  describe('status observers', () => {
    it('isolates a failing observer from the others', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      const statuses: boolean[] = [];
      link.onStatusChange(() => {
        throw new Error('observer failed');
      });
      link.onStatusChange(async () => {
        throw new Error('async observer failed');
      });
      link.onStatusChange((connected) => {
        statuses.push(connected);
      });

      expect(await link.connect()).toBe(true);
      expect(statuses).toEqual([true]);
    });

    it('stops notifying after unsubscribe', async () => {
      const opener = new FakePortOpener();
      const link = createLink(opener);
      const statuses: boolean[] = [];
      const unsubscribe = link.onStatusChange((connected) => {
        statuses.push(connected);
      });

      await link.connect();
      unsubscribe();
      await link.disconnect();

      expect(statuses).toEqual([true]);
    });
  });

  describe('reconnect loop', () => {
    const settle = () => vi.advanceTimersByTimeAsync(0);

    it('retries at a fixed interval and stops mid-sleep', async () => {
      vi.useFakeTimers();
      const opener = new FakePortOpener();
      opener.available = false;
      const link = createLink(opener, { reconnectIntervalMs: 1000 });

      link.startReconnectLoop();
      link.startReconnectLoop();
      await settle();
      expect(opener.attempts).toBe(1);

      await vi.advanceTimersByTimeAsync(1000);
      await settle();
      expect(opener.attempts).toBe(2);

      await vi.advanceTimersByTimeAsync(1000);
      await settle();
      expect(opener.attempts).toBe(3);

      await vi.advanceTimersByTimeAsync(500);
      await link.stopReconnectLoop();
      expect(link.reconnecting).toBe(false);

      await vi.advanceTimersByTimeAsync(5000);
      expect(opener.attempts).toBe(3);
      expect(link.state).toBe('disconnected');

      const [first, second, third] = opener.attemptTimes;
      expect(second - first).toBeGreaterThanOrEqual(1000);
      expect(third - second).toBeGreaterThanOrEqual(1000);
    });

    it('runs a loop started while a stop is still pending', async () => {
      vi.useFakeTimers();
      const opener = new FakePortOpener();
      opener.available = false;
      const link = createLink(opener, { reconnectIntervalMs: 1000 });

      link.startReconnectLoop();
      await settle();
      expect(opener.attempts).toBe(1);

      const stopping = link.stopReconnectLoop();
      link.startReconnectLoop();
      await stopping;
      await settle();

      expect(link.reconnecting).toBe(true);
      expect(opener.attempts).toBe(2);

      await vi.advanceTimersByTimeAsync(1000);
      await settle();
      expect(opener.attempts).toBe(3);

      await link.stopReconnectLoop();
      expect(link.reconnecting).toBe(false);
    });

    it('idles while connected and recovers after the device returns', async () => {
      vi.useFakeTimers();
      const opener = new FakePortOpener();
      const link = createLink(opener, { reconnectIntervalMs: 1000 });

      link.startReconnectLoop();
      await settle();
      expect(link.state).toBe('connected');

      await vi.advanceTimersByTimeAsync(3000);
      expect(opener.attempts).toBe(1);

      opener.current.unplug();
      await settle();
      expect(link.state).toBe('disconnected');

      await vi.advanceTimersByTimeAsync(1000);
      await settle();
      expect(opener.attempts).toBe(2);
      expect(link.state).toBe('connected');

      await link.close();
      expect(link.state).toBe('disconnected');
      expect(opener.current.closeCalls).toBe(1);
    });
  });
});

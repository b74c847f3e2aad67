import { SerialPort, DelimiterParser } from 'serialport';
import { BridgeError, ErrorCode, LINE_DELIMITER } from '@serialbridge/shared/protocol';

export interface PortOptions {
  path: string;
  baudRate: number;
}

/**
 * An open, line-framed device handle
 */
export interface LinkPort {
  /** Write and wait until the bytes have been drained to the device */
  write(data: string): Promise<void>;
  close(): Promise<void>;
  /** Raw line bytes, delimiter stripped */
  onLine(listener: (line: Buffer) => void): void;
  /** The device went away; `error` is set when the close was not requested */
  onClose(listener: (error?: Error) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type PortOpener = (options: PortOptions) => Promise<LinkPort>;

export const openSerialPort: PortOpener = async ({ path, baudRate }) => {
  const port = new SerialPort({ path, baudRate, autoOpen: false });

  await new Promise<void>((resolve, reject) => {
    port.open((err) => {
      if (err) {
        reject(new BridgeError(ErrorCode.SERIAL_OPEN_FAILED, `Serial port open failed: ${err.message}`, { path }));
        return;
      }
      resolve();
    });
  });

  const parser = port.pipe(new DelimiterParser({ delimiter: LINE_DELIMITER }));

  return {
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(data, (writeErr) => {
          if (writeErr) {
            reject(writeErr);
            return;
          }
          port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
        });
      }),

    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close((err) => (err ? reject(err) : resolve()));
      }),

    onLine: (listener) => {
      parser.on('data', (line: Buffer) => listener(line));
    },

    onClose: (listener) => {
      port.on('close', (err?: Error | null) => listener(err ?? undefined));
    },

    onError: (listener) => {
      port.on('error', listener);
      parser.on('error', listener);
    },
  };
};

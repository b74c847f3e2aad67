import type { WSServerMessage } from '@serialbridge/shared/types';
import { errorMessage } from '@serialbridge/shared/protocol';

/**
 * The part of a ws WebSocket the registry relies on
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export interface ClientConnection {
  clientId: string;
  socket: ClientSocket;
  connectedAt: Date;
  lastSeen: Date;
}

const OPEN = 1;

/**
 * Set of connected WebSocket clients, bounded by capacity.
 *
 * Membership changes never suspend, so a client is either fully registered
 * or absent for every concurrent caller. Sends that fail prune the client.
 */
export class ClientRegistry {
  private clients = new Map<string, ClientConnection>();

  constructor(readonly capacity: number) {}

  accept(clientId: string, socket: ClientSocket): boolean {
    if (this.clients.size >= this.capacity) {
      console.warn(`[WS] Connection limit reached (${this.capacity})`);
      return false;
    }
    if (this.clients.has(clientId)) {
      console.warn(`[WS] Client ${clientId} is already registered`);
      return false;
    }

    this.clients.set(clientId, {
      clientId,
      socket,
      connectedAt: new Date(),
      lastSeen: new Date(),
    });
    console.log(`[WS] Client connected. Total connections: ${this.clients.size}`);
    return true;
  }

  remove(clientId: string): void {
    if (!this.clients.delete(clientId)) return;

    console.log(`[WS] Client disconnected. Total connections: ${this.clients.size}`);
  }

  get(clientId: string): ClientConnection | undefined {
    return this.clients.get(clientId);
  }

  touch(clientId: string): void {
    const connection = this.clients.get(clientId);
    if (connection) {
      connection.lastSeen = new Date();
    }
  }

  count(): number {
    return this.clients.size;
  }

  /**
   * Send to every client; clients whose send fails are removed.
   * Resolves with the number of clients that received the envelope.
   */
  async broadcast(envelope: WSServerMessage): Promise<number> {
    if (this.clients.size === 0) return 0;

    const data = JSON.stringify(envelope);
    const members = Array.from(this.clients.values());
    const results = await Promise.all(
      members.map(async (connection) => ({
        connection,
        delivered: await this.deliver(connection, data),
      })),
    );

    let delivered = 0;
    for (const result of results) {
      if (result.delivered) {
        delivered++;
      } else {
        this.remove(result.connection.clientId);
      }
    }
    return delivered;
  }

  async sendTo(envelope: WSServerMessage, clientId: string): Promise<boolean> {
    const connection = this.clients.get(clientId);
    if (!connection) return false;

    const delivered = await this.deliver(connection, JSON.stringify(envelope));
    if (!delivered) {
      this.remove(clientId);
    }
    return delivered;
  }

  /**
   * Close every client socket and forget them (shutdown)
   */
  closeAll(code: number, reason: string): void {
    for (const connection of this.clients.values()) {
      try {
        connection.socket.close(code, reason);
      } catch (err) {
        console.error(`[WS] Error closing client ${connection.clientId}: ${errorMessage(err)}`);
      }
    }
    this.clients.clear();
  }

  private deliver(connection: ClientConnection, data: string): Promise<boolean> {
    return new Promise((resolve) => {
      if (connection.socket.readyState !== OPEN) {
        resolve(false);
        return;
      }

      try {
        connection.socket.send(data, (err) => {
          if (err) {
            console.error(`[WS] Error sending to client ${connection.clientId}: ${err.message}`);
            resolve(false);
            return;
          }
          resolve(true);
        });
      } catch (err) {
        console.error(`[WS] Error sending to client ${connection.clientId}: ${errorMessage(err)}`);
        resolve(false);
      }
    });
  }
}

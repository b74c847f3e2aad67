import type { Server as HttpServer } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { BridgeError, ErrorCode, errorMessage } from '@serialbridge/shared/protocol';
import type { ClientRegistry } from './connection-manager.js';
import type { BridgeRouter } from '../bridge/router.js';

export interface WebSocketServerOptions {
  httpServer: HttpServer;
  registry: ClientRegistry;
  router: BridgeRouter;
  path?: string;
}

export const CONNECTION_LIMIT_CLOSE_CODE = 1008;

export function createWebSocketServer(options: WebSocketServerOptions): WebSocketServer {
  const { registry, router } = options;

  const wss = new WebSocketServer({
    server: options.httpServer,
    path: options.path ?? '/ws',
  });

  wss.on('connection', (socket: WebSocket) => {
    const clientId = uuidv4();

    if (!registry.accept(clientId, socket)) {
      const rejection = new BridgeError(ErrorCode.CONNECTION_LIMIT_REACHED, 'Connection limit reached', {
        capacity: registry.capacity,
      });
      // Frames keep arriving until the close handshake completes
      socket.on('error', (error) => {
        console.warn(`[WS] Error on rejected connection ${clientId}: ${error.message}`);
      });
      socket.close(CONNECTION_LIMIT_CLOSE_CODE, rejection.message);
      return;
    }

    // Frames from one client are handled in arrival order
    let queue: Promise<void> = Promise.resolve();

    socket.on('message', (data) => {
      const message = data.toString();
      queue = queue
        .then(() => router.handleClientMessage(clientId, message))
        .catch((err: unknown) => {
          console.error(`[WS] Error handling message from ${clientId}: ${errorMessage(err)}`);
        });
    });

    socket.on('close', () => {
      registry.remove(clientId);
    });

    socket.on('error', (error) => {
      console.error(`[WS] Error for ${clientId}: ${error.message}`);
    });

    router.sendInitialStatus(clientId).catch((err: unknown) => {
      console.error(`[WS] Failed to send initial status to ${clientId}: ${errorMessage(err)}`);
    });
  });

  return wss;
}

import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import type { WebSocketServer } from 'ws';
import { errorMessage } from '@serialbridge/shared/protocol';
import type { BridgeConfig } from './config.js';
import { SerialLinkManager } from './serial/link-manager.js';
import type { PortOpener } from './serial/port.js';
import { ClientRegistry, createWebSocketServer } from './websocket/index.js';
import { BridgeRouter, type BridgeRouterOptions } from './bridge/router.js';
import { handleHttpRequest } from './http/routes.js';
import { getServiceVersion } from './version.js';

export interface BridgeAppOptions {
  openPort?: PortOpener;
  router?: BridgeRouterOptions;
}

export interface BridgeApp {
  config: BridgeConfig;
  link: SerialLinkManager;
  registry: ClientRegistry;
  router: BridgeRouter;
  server: Server;
  wss: WebSocketServer;
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
}

export function createBridgeApp(config: BridgeConfig, options: BridgeAppOptions = {}): BridgeApp {
  const link = new SerialLinkManager({
    port: config.serialPort,
    baudRate: config.baudRate,
    readTimeoutMs: config.serialTimeout * 1000,
    reconnectIntervalMs: config.reconnectInterval * 1000,
    openPort: options.openPort,
  });
  const registry = new ClientRegistry(config.maxConnections);
  const router = new BridgeRouter(link, registry, options.router);
  const version = getServiceVersion();

  const server = createServer((req, res) => {
    handleHttpRequest(req, res, { link, registry, publisher: router, version }).catch((err: unknown) => {
      console.error(`[HTTP] Unhandled error: ${errorMessage(err)}`);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    });
  });

  const wss = createWebSocketServer({ httpServer: server, registry, router });

  async function start(): Promise<AddressInfo> {
    router.start();
    link.startReconnectLoop();

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.port, config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error(`Unexpected server address: ${String(address)}`);
    }
    console.log(`[Bridge] Serial Bridge listening on http://${address.address}:${address.port}`);
    console.log(`[Bridge] WebSocket endpoint: ws://${address.address}:${address.port}/ws`);
    return address;
  }

  async function stop(): Promise<void> {
    console.log('[Bridge] Shutting down...');
    // Signal the pump first; it exits once the port is released
    const routing = router.stop();
    await link.close();
    await routing;

    registry.closeAll(1001, 'Server shutting down');
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));

    if (server.listening) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    console.log('[Bridge] Shutdown complete');
  }

  return { config, link, registry, router, server, wss, start, stop };
}

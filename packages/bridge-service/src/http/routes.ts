import type { IncomingMessage, ServerResponse } from 'http';
import { PublishBody, type BridgeStatus, type HttpErrorBody, type PublishResult } from '@serialbridge/shared/types';
import { BridgeError, ErrorCode, errorMessage } from '@serialbridge/shared/protocol';
import type { SerialLinkManager } from '../serial/link-manager.js';
import type { ClientRegistry } from '../websocket/connection-manager.js';
import type { DevicePublisher } from '../websocket/message-handler.js';

export interface HttpContext {
  link: Pick<SerialLinkManager, 'isConnected' | 'state' | 'port' | 'baudRate'>;
  registry: Pick<ClientRegistry, 'count' | 'capacity'>;
  publisher: DevicePublisher;
  version: string;
}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => (body += chunk));
    req.on('end', () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new BridgeError(ErrorCode.INVALID_JSON, 'Request body is not valid JSON'));
      }
    });
    req.on('error', reject);
  });
}

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

function fail(res: ServerResponse, error: BridgeError): void {
  const body: HttpErrorBody = { error: error.message, code: error.code };
  json(res, body, error.httpStatus);
}

export async function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: HttpContext
): Promise<void> {
  const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
  const path = url.pathname;
  const method = req.method;

  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  if (method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return;
  }

  try {
    if (path === '/' && method === 'GET') {
      json(res, { message: 'Serial Bridge Server', version: ctx.version, status: 'running' });
      return;
    }

    if (path === '/health' && method === 'GET') {
      json(res, { status: 'ok', timestamp: new Date().toISOString(), connections: ctx.registry.count() });
      return;
    }

    if (path === '/api/status' && method === 'GET') {
      const status: BridgeStatus = {
        serial: {
          connected: ctx.link.isConnected,
          state: ctx.link.state,
          port: ctx.link.port,
          baudrate: ctx.link.baudRate,
        },
        websocket: {
          active_connections: ctx.registry.count(),
          max_connections: ctx.registry.capacity,
        },
        server: {
          status: 'running',
          version: ctx.version,
        },
      };
      json(res, status);
      return;
    }

    if (path === '/api/publish' && method === 'POST') {
      await handlePublish(req, res, ctx);
      return;
    }

    fail(res, new BridgeError(ErrorCode.NOT_FOUND, 'Not found'));
  } catch (err) {
    if (err instanceof BridgeError) {
      fail(res, err);
      return;
    }
    console.error(`[HTTP] ${method} ${path} failed: ${errorMessage(err)}`);
    fail(res, new BridgeError(ErrorCode.INTERNAL_ERROR, 'Internal server error'));
  }
}

async function handlePublish(req: IncomingMessage, res: ServerResponse, ctx: HttpContext): Promise<void> {
  const result = PublishBody.safeParse(await parseBody(req));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new BridgeError(ErrorCode.INVALID_REQUEST, `Invalid request body: ${issues.join('; ')}`);
  }

  if (!ctx.link.isConnected) {
    throw new BridgeError(ErrorCode.SERIAL_NOT_CONNECTED, 'Serial port not connected');
  }

  const { topic, payload } = result.data;
  if (!topic) {
    throw new BridgeError(ErrorCode.MISSING_TOPIC, 'Topic cannot be empty');
  }

  const written = await ctx.publisher.publish(topic, payload);
  if (!written) {
    throw new BridgeError(ErrorCode.SERIAL_WRITE_FAILED, 'Failed to write to serial port');
  }

  const body: PublishResult = {
    success: true,
    topic,
    payload,
    message: 'Message published successfully',
  };
  json(res, body);
}

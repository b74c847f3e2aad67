import { z } from 'zod';
import { LinkState } from './device.js';
import { ClientPayload } from './message.js';

/**
 * POST /api/publish request body
 */
export const PublishBody = z.object({
  topic: z.string(),
  payload: ClientPayload,
});
export type PublishBody = z.infer<typeof PublishBody>;

/**
 * POST /api/publish success response
 */
export const PublishResult = z.object({
  success: z.boolean(),
  topic: z.string(),
  payload: z.string(),
  message: z.string(),
});
export type PublishResult = z.infer<typeof PublishResult>;

/**
 * Error body returned by every failing HTTP route
 */
export const HttpErrorBody = z.object({
  error: z.string(),
  code: z.number().optional(),
});
export type HttpErrorBody = z.infer<typeof HttpErrorBody>;

/**
 * GET /api/status response
 */
export const BridgeStatus = z.object({
  serial: z.object({
    connected: z.boolean(),
    state: LinkState,
    port: z.string(),
    baudrate: z.number(),
  }),
  websocket: z.object({
    active_connections: z.number().int().nonnegative(),
    max_connections: z.number().int().positive(),
  }),
  server: z.object({
    status: z.string(),
    version: z.string(),
  }),
});
export type BridgeStatus = z.infer<typeof BridgeStatus>;

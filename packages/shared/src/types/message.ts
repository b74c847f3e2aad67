import { z } from 'zod';
import { LinkDetails, LinkStatus } from './device.js';

/**
 * Payload values accepted from clients; numbers and booleans are stringified
 */
export const ClientPayload = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

/**
 * WebSocket message types (client -> server)
 */
export const WSClientMessageType = z.enum(['publish', 'ping']);
export type WSClientMessageType = z.infer<typeof WSClientMessageType>;

/**
 * Minimal shape every client frame must have. A missing type means publish.
 */
export const WSClientMessageHeader = z
  .object({
    type: z.string().default('publish'),
  })
  .passthrough();
export type WSClientMessageHeader = z.infer<typeof WSClientMessageHeader>;

/**
 * WebSocket client message
 */
export const WSClientMessage = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('publish'),
    /** Empty or missing topics are answered with an error, not rejected here */
    topic: z
      .string()
      .nullish()
      .transform((value) => value ?? ''),
    payload: ClientPayload,
  }),
  z.object({
    type: z.literal('ping'),
  }),
]);
export type WSClientMessage = z.infer<typeof WSClientMessage>;
export type WSClientMessageInput = z.input<typeof WSClientMessage>;

/**
 * WebSocket message types (server -> client)
 */
export const WSServerMessageType = z.enum(['message', 'status', 'ack', 'error', 'pong']);
export type WSServerMessageType = z.infer<typeof WSServerMessageType>;

/**
 * WebSocket server message (envelope)
 */
export const WSServerMessage = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message'),
    topic: z.string(),
    payload: z.string(),
    source: z.string(),
  }),
  z.object({
    type: z.literal('status'),
    status: LinkStatus,
    details: LinkDetails,
  }),
  z.object({
    type: z.literal('ack'),
    success: z.boolean(),
    topic: z.string(),
  }),
  z.object({
    type: z.literal('error'),
    message: z.string(),
  }),
  z.object({
    type: z.literal('pong'),
  }),
]);
export type WSServerMessage = z.infer<typeof WSServerMessage>;

/**
 * Narrow a server envelope union member by its type tag
 */
export type WSServerMessageOf<T extends WSServerMessageType> = Extract<WSServerMessage, { type: T }>;

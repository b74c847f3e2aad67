import { z } from 'zod';

/**
 * A single TOPIC:PAYLOAD line exchanged with the serial device
 */
export const DeviceMessage = z.object({
  /** Non-empty topic, never contains the separator */
  topic: z.string().min(1),

  /** Payload text, may be empty */
  payload: z.string(),
});
export type DeviceMessage = z.infer<typeof DeviceMessage>;

/**
 * Lifecycle state of the serial link
 */
export const LinkState = z.enum(['disconnected', 'connecting', 'connected']);
export type LinkState = z.infer<typeof LinkState>;

/**
 * Link status as reported to clients
 */
export const LinkStatus = z.enum(['connected', 'disconnected']);
export type LinkStatus = z.infer<typeof LinkStatus>;

/**
 * Link configuration echoed in status envelopes
 */
export const LinkDetails = z.object({
  serial_port: z.string(),
  baudrate: z.number().int().positive(),
});
export type LinkDetails = z.infer<typeof LinkDetails>;

/** Source tag attached to messages read from the device */
export const DEVICE_SOURCE = 'arduino';

import type { DeviceMessage } from '../types/device.js';

/**
 * Line protocol spoken by the device: `TOPIC:PAYLOAD\n`, UTF-8.
 *
 * Topics and payloads are not escaped. A `:` in the topic or a newline
 * anywhere breaks framing on the receiving side; callers that care must
 * reject such values before formatting.
 */
export const LINE_DELIMITER = '\n';
export const TOPIC_SEPARATOR = ':';

export type ParseFailureReason = 'empty' | 'missing-separator' | 'empty-topic';

export type ParseResult =
  | { ok: true; message: DeviceMessage }
  | { ok: false; reason: ParseFailureReason };

export interface DecodedLine {
  text: string;
  /** True when invalid UTF-8 was replaced with U+FFFD */
  lossy: boolean;
}

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

/**
 * Parse one line (with or without its trailing newline) into a device message.
 * The payload is everything after the first separator and may contain more separators.
 */
export function parseLine(line: string): ParseResult {
  const text = line.trim();
  if (!text) {
    return { ok: false, reason: 'empty' };
  }

  const separatorIndex = text.indexOf(TOPIC_SEPARATOR);
  if (separatorIndex === -1) {
    return { ok: false, reason: 'missing-separator' };
  }

  const topic = text.slice(0, separatorIndex).trim();
  if (!topic) {
    return { ok: false, reason: 'empty-topic' };
  }

  return {
    ok: true,
    message: {
      topic,
      payload: text.slice(separatorIndex + 1).trim(),
    },
  };
}

/**
 * Format a message for the device, newline included
 */
export function formatLine(topic: string, payload: string): string {
  return `${topic}${TOPIC_SEPARATOR}${payload}${LINE_DELIMITER}`;
}

/**
 * Decode raw line bytes, replacing invalid UTF-8 instead of failing
 */
export function decodeLine(bytes: Uint8Array): DecodedLine {
  try {
    return { text: strictDecoder.decode(bytes), lossy: false };
  } catch {
    return { text: lenientDecoder.decode(bytes), lossy: true };
  }
}

/**
 * True when formatting these values would not parse back to the same message
 */
export function hasFramingHazard(topic: string, payload: string): boolean {
  return (
    topic.includes(TOPIC_SEPARATOR) ||
    topic.includes(LINE_DELIMITER) ||
    payload.includes(LINE_DELIMITER)
  );
}

/**
 * Formatting utilities for human-readable MCP tool output.
 */

import type { BridgeStatus, PublishResult } from "@serialbridge/shared/types";

/** Capitalize first letter. */
export function capitalize(s: string): string {
  return s ? s.charAt(0).toUpperCase() + s.slice(1).toLowerCase() : s;
}

/** Format GET /api/status into readable text. */
export function formatStatus(status: BridgeStatus): string {
  const { serial, websocket, server } = status;
  const lines = [
    `Serial Bridge ${server.version} (${server.status})`,
    "",
    `Serial link: ${capitalize(serial.state)}`,
    `  Port: ${serial.port} @ ${serial.baudrate} baud`,
    "",
    `WebSocket clients: ${websocket.active_connections}/${websocket.max_connections}`,
  ];

  if (!serial.connected) {
    lines.push("", "The device is not connected; publishes will be rejected until it reconnects.");
  }

  return lines.join("\n");
}

/** Format a POST /api/publish result. */
export function formatPublishResult(result: PublishResult): string {
  const line = `${result.topic}:${result.payload}`;
  return result.success
    ? `${result.message}\n  Sent: ${line}`
    : `Publish failed\n  Attempted: ${line}`;
}

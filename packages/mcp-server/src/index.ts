#!/usr/bin/env node

/**
 * Serial Bridge MCP Server
 *
 * Diagnostic tools for a running serial bridge over its HTTP API.
 *
 * Environment variables:
 *   SERIAL_BRIDGE_URL (optional) - API base URL (default: http://localhost:8000)
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { BridgeStatus, PublishResult } from "@serialbridge/shared/types";
import { getConfig, apiGet, apiPost } from "./api.js";
import { formatStatus, formatPublishResult } from "./formatters.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

function errorResult(error: unknown) {
  const msg = error instanceof Error ? error.message : String(error);
  return textResult(`Error: ${msg}`);
}

const config = getConfig();

// ── Server Setup ─────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "serial-bridge-diagnostics",
  version: "1.0.0",
});

// ── Tool: get_bridge_status ──────────────────────────────────────────────────

server.tool(
  "get_bridge_status",
  "Get the serial link state, port settings and WebSocket client count of the bridge.",
  {},
  async () => {
    try {
      const data = await apiGet(config, "/api/status");
      return textResult(formatStatus(BridgeStatus.parse(data)));
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ── Tool: publish_message ────────────────────────────────────────────────────

server.tool(
  "publish_message",
  "Send a TOPIC:PAYLOAD message to the serial device through the bridge.",
  {
    topic: z.string().min(1).describe("Message topic, e.g. led"),
    payload: z.string().default("").describe("Message payload, e.g. on"),
  },
  async ({ topic, payload }) => {
    try {
      const data = await apiPost(config, "/api/publish", { topic, payload });
      return textResult(formatPublishResult(PublishResult.parse(data)));
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ── Start Server ─────────────────────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("[MCP] Fatal error starting server:", err);
  process.exit(1);
});

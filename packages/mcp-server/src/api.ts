/**
 * HTTP client for the serial bridge API.
 */

import { BridgeError, ErrorCode, errorMessage } from "@serialbridge/shared/protocol";
import { HttpErrorBody } from "@serialbridge/shared/types";

export interface ApiConfig {
  baseUrl: string;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    baseUrl: env.SERIAL_BRIDGE_URL || "http://localhost:8000",
  };
}

async function request(config: ApiConfig, path: string, init: RequestInit): Promise<unknown> {
  const url = new URL(path, config.baseUrl);
  let response: Response;
  try {
    response = await fetch(url.toString(), {
      ...init,
      headers: {
        "Accept": "application/json",
        ...(init.body ? { "Content-Type": "application/json" } : {}),
      },
    });
  } catch (err) {
    throw new BridgeError(
      ErrorCode.BRIDGE_UNREACHABLE,
      `Cannot reach serial bridge at ${config.baseUrl}: ${errorMessage(err)}`
    );
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new Error(
      `API request failed: ${response.status} ${response.statusText}` +
      (body ? ` - ${describeErrorBody(body)}` : "")
    );
  }

  return response.json();
}

/** Prefer the bridge's `error` field over the raw body. */
function describeErrorBody(body: string): string {
  try {
    const parsed = HttpErrorBody.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error : body;
  } catch {
    return body;
  }
}

export function apiGet(config: ApiConfig, path: string): Promise<unknown> {
  return request(config, path, { method: "GET" });
}

export function apiPost(config: ApiConfig, path: string, body: unknown): Promise<unknown> {
  return request(config, path, { method: "POST", body: JSON.stringify(body) });
}

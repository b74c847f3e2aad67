import { describe, it, expect, vi, afterEach } from "vitest";
import { ErrorCode } from "@serialbridge/shared/protocol";
import { apiGet, apiPost, getConfig } from "./api.js";

describe("getConfig", () => {
  it("defaults to the local bridge", () => {
    expect(getConfig({})).toEqual({ baseUrl: "http://localhost:8000" });
  });

  it("reads SERIAL_BRIDGE_URL", () => {
    expect(getConfig({ SERIAL_BRIDGE_URL: "http://bridge.test:9000" })).toEqual({
      baseUrl: "http://bridge.test:9000",
    });
  });
});

function jsonResponse(data: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(data), {
    ...init,
    headers: { "Content-Type": "application/json" },
  });
}

describe("api requests", () => {
  const config = { baseUrl: "http://bridge.test:8000" };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("GETs JSON from the bridge", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ status: "ok" }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await apiGet(config, "/health")).toEqual({ status: "ok" });
    expect(fetchMock).toHaveBeenCalledWith("http://bridge.test:8000/health", {
      method: "GET",
      headers: { "Accept": "application/json" },
    });
  });

  it("POSTs a JSON body", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ success: true }));
    vi.stubGlobal("fetch", fetchMock);

    await apiPost(config, "/api/publish", { topic: "led", payload: "on" });

    expect(fetchMock).toHaveBeenCalledWith("http://bridge.test:8000/api/publish", {
      method: "POST",
      body: '{"topic":"led","payload":"on"}',
      headers: { "Accept": "application/json", "Content-Type": "application/json" },
    });
  });

  it("surfaces the bridge error message on failure", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse(
          { error: "Serial port not connected", code: 1001 },
          { status: 503, statusText: "Service Unavailable" }
        )
      )
    );

    await expect(apiPost(config, "/api/publish", { topic: "led", payload: "on" })).rejects.toThrow(
      "API request failed: 503 Service Unavailable - Serial port not connected"
    );
  });

  it("falls back to the raw body when it is not a bridge error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("upstream down", { status: 502, statusText: "Bad Gateway" }))
    );

    await expect(apiGet(config, "/api/status")).rejects.toThrow(
      "API request failed: 502 Bad Gateway - upstream down"
    );
  });

  it("reports an unreachable bridge", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    await expect(apiGet(config, "/api/status")).rejects.toMatchObject({
      code: ErrorCode.BRIDGE_UNREACHABLE,
      message: "Cannot reach serial bridge at http://bridge.test:8000: fetch failed",
    });
  });
});

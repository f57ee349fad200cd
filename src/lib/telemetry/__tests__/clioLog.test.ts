import { afterEach, describe, expect, it, vi } from "vitest";

import { ClioClient } from "@/lib/clio/client";
import { logClioRequest } from "@/lib/telemetry/clioLog";

describe("logClioRequest", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line tagged as clio telemetry", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logClioRequest({
      timestamp: "2024-01-01T00:00:00.000Z",
      operation: "list_matters",
      method: "GET",
      path: "/matters.json",
      status: 200,
      attempt: 1,
      duration_ms: 12,
    });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      timestamp: "2024-01-01T00:00:00.000Z",
      operation: "list_matters",
      method: "GET",
      path: "/matters.json",
      status: 200,
      attempt: 1,
      duration_ms: 12,
      _type: "clio_telemetry",
    });
  });

  it("logs each failed attempt without the token", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("{}", { status: 502 }))
      .mockResolvedValueOnce(new Response(JSON.stringify({ data: [] }), { status: 200 }));
    const client = new ClioClient("test-secret", { mode: "live", fetch: fetchMock, baseBackoffMs: 0 });

    await client.listMatters();

    const lines = log.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(lines.map((line) => [line.attempt, line.status, line.error_code])).toEqual([
      [1, 502, "http_error"],
      [2, 200, undefined],
    ]);
    expect(log.mock.calls.some((call) => String(call[0]).includes("test-secret"))).toBe(false);
  });
});

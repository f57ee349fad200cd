import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ClioClient } from "@/lib/clio/client";
import { ClioAPIError } from "@/lib/clio/errors";
import { loadMatterOptions, submitTrackedSession, toTimeEntryInput } from "@/lib/clio/sessions";
import type { PracticeManagementConnector } from "@/lib/connectors/connector";
import type { TrackedSession } from "@/lib/connectors/types";

const session: TrackedSession = {
  start_time: "2024-05-06T14:00:00",
  end_time: "2024-05-06T14:45:00",
  duration_sec: 2400,
  activity_desc: "Reviewed lease draft",
  clio_matter_id: " 314 ",
};

function stubConnector(overrides: Partial<PracticeManagementConnector> = {}): PracticeManagementConnector {
  return {
    tool: "clio",
    getDisplayName: () => "Clio",
    authenticate: async () => {},
    listMatters: async () => [],
    createTimeEntry: async (input) => ({
      id: "stub",
      matter_id: input.matterId,
      start_time: input.startTime,
      end_time: input.endTime,
      duration_sec: input.durationSeconds,
      description: input.description,
    }),
    ...overrides,
  };
}

describe("toTimeEntryInput", () => {
  it("maps session columns onto a time entry", () => {
    expect(toTimeEntryInput(session)).toEqual({
      matterId: "314",
      startTime: "2024-05-06T14:00:00",
      endTime: "2024-05-06T14:45:00",
      durationSeconds: 2400,
      description: "Reviewed lease draft",
    });
  });

  it("defaults a missing duration and description", () => {
    const input = toTimeEntryInput({ ...session, duration_sec: null, activity_desc: null });
    expect(input.durationSeconds).toBe(0);
    expect(input.description).toBe("");
  });

  it("refuses a session without a matter", () => {
    expect(() => toTimeEntryInput({ ...session, clio_matter_id: null })).toThrow(
      "Cannot submit session: no Clio matter linked",
    );
  });
});

describe("submitTrackedSession", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates the entry through the connector", async () => {
    const createTimeEntry = vi.fn<PracticeManagementConnector["createTimeEntry"]>(async (input) => ({
      id: "555",
      matter_id: input.matterId,
      start_time: input.startTime,
      end_time: input.endTime,
      duration_sec: input.durationSeconds,
      description: input.description,
    }));

    const entry = await submitTrackedSession(stubConnector({ createTimeEntry }), session);

    expect(createTimeEntry).toHaveBeenCalledWith({
      matterId: "314",
      startTime: "2024-05-06T14:00:00",
      endTime: "2024-05-06T14:45:00",
      durationSeconds: 2400,
      description: "Reviewed lease draft",
    });
    expect(entry.id).toBe("555");
  });

  it("returns the sandbox placeholder from a sandbox client", async () => {
    const entry = await submitTrackedSession(new ClioClient(), session);
    expect(entry.id).toBe("mock-id");
    expect(entry.matter_id).toBe("314");
  });

  it("propagates connector failures", async () => {
    const failing = stubConnector({
      createTimeEntry: async () => {
        throw new ClioAPIError("HTTP 502", { code: "http_error", status: 502, retryable: true });
      },
    });

    await expect(submitTrackedSession(failing, session)).rejects.toMatchObject({ status: 502 });
  });
});

describe("loadMatterOptions", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the connector's matters", async () => {
    const matters = [{ id: "1", name: "00001-Smith", display_number: "00001-Smith", status: "Open" }];
    const connector = stubConnector({ listMatters: async () => matters });
    await expect(loadMatterOptions(connector)).resolves.toEqual(matters);
  });

  it("falls back to an empty list when live credentials are missing", async () => {
    const client = new ClioClient(null, { mode: "live", fetch: vi.fn<typeof fetch>() });
    await expect(loadMatterOptions(client)).resolves.toEqual([]);
    expect(console.warn).toHaveBeenCalledWith("[CLIO SESSIONS] Matters unavailable; continuing without them", {
      tool: "clio",
      code: "missing_access_token",
    });
  });

  it("rethrows unexpected errors", async () => {
    const connector = stubConnector({
      listMatters: async () => {
        throw new RangeError("boom");
      },
    });
    await expect(loadMatterOptions(connector)).rejects.toThrow("boom");
  });
});

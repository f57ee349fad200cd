import { describe, expect, it } from "vitest";

import { ClioClient, NotImplementedError, SANDBOX_TIME_ENTRY_ID, submitTrackedSession } from "../index";

describe("package entry", () => {
  it("exposes a working client without path aliases", async () => {
    const client = new ClioClient();
    await expect(client.authenticate()).rejects.toBeInstanceOf(NotImplementedError);

    const entry = await submitTrackedSession(client, {
      start_time: "2024-02-01T08:00:00",
      end_time: "2024-02-01T08:15:00",
      duration_sec: 900,
      clio_matter_id: "77",
    });
    expect(entry.id).toBe(SANDBOX_TIME_ENTRY_ID);
  });
});

import type { ClioMatter, ClioTimeEntry, TimeEntryInput } from "../connectors/types";

/**
 * Canned responses used when the client runs in sandbox mode.
 * Nothing here touches the network.
 */

export const SANDBOX_TIME_ENTRY_ID = "mock-id";

export function sandboxMatters(): ClioMatter[] {
  return [];
}

export function sandboxTimeEntry(input: TimeEntryInput): ClioTimeEntry {
  return {
    id: SANDBOX_TIME_ENTRY_ID,
    matter_id: input.matterId,
    start_time: input.startTime,
    end_time: input.endTime,
    duration_sec: input.durationSeconds,
    description: input.description,
  };
}

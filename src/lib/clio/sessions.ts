import { ClioAPIError, ClioAuthError, ClioValidationError } from "./errors";
import { NotImplementedError, type PracticeManagementConnector } from "../connectors/connector";
import type { ClioMatter, ClioTimeEntry, TimeEntryInput, TrackedSession } from "../connectors/types";

export function toTimeEntryInput(session: TrackedSession): TimeEntryInput {
  const matterId = session.clio_matter_id?.trim();
  if (!matterId) {
    throw new ClioValidationError("Cannot submit session: no Clio matter linked", [
      "matterId: session has no Clio matter",
    ]);
  }

  return {
    matterId,
    startTime: session.start_time,
    endTime: session.end_time,
    durationSeconds: session.duration_sec ?? 0,
    description: session.activity_desc ?? "",
  };
}

/**
 * Push a tracked session to the practice-management system as a time entry.
 */
export async function submitTrackedSession(
  connector: PracticeManagementConnector,
  session: TrackedSession,
): Promise<ClioTimeEntry> {
  const input = toTimeEntryInput(session);
  const entry = await connector.createTimeEntry(input);

  console.info("[CLIO SESSIONS] Session submitted", {
    tool: connector.tool,
    entry_id: entry.id,
    matter_id: entry.matter_id,
  });

  return entry;
}

/**
 * Preload matters for a matter picker. The picker still works without them,
 * so connector failures degrade to an empty list.
 */
export async function loadMatterOptions(connector: PracticeManagementConnector): Promise<ClioMatter[]> {
  try {
    return await connector.listMatters();
  } catch (err) {
    if (err instanceof ClioAuthError || err instanceof ClioAPIError || err instanceof NotImplementedError) {
      console.warn("[CLIO SESSIONS] Matters unavailable; continuing without them", {
        tool: connector.tool,
        code: err.code,
      });
      return [];
    }
    throw err;
  }
}

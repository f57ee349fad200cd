/**
 * Canonical types for practice-management connectors.
 * These are the normalized shapes every connector produces, whatever the remote API returns.
 */

export type PracticeManagementTool = "clio";

/**
 * Canonical matter row.
 */
export interface ClioMatter {
  id: string;
  name: string;
  display_number: string | null;
  status: string | null;
}

/**
 * Canonical time entry row.
 * Everything except `id` echoes what the caller submitted.
 */
export interface ClioTimeEntry {
  id: string;
  matter_id: string;
  start_time: string; // ISO 8601
  end_time: string; // ISO 8601
  duration_sec: number;
  description: string;
}

export interface TimeEntryInput {
  matterId: string;
  startTime: string;
  endTime: string;
  durationSeconds: number;
  description: string;
}

/**
 * Session row as stored by the time tracker.
 */
export interface TrackedSession {
  start_time: string;
  end_time: string;
  duration_sec: number | null;
  activity_desc?: string | null;
  clio_matter_id?: string | null;
}

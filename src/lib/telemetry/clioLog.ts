/**
 * Clio request telemetry logger
 * One JSON line per HTTP attempt, written to stdout.
 *
 * SAFETY:
 * - No tokens, request bodies or descriptions
 * - Only method, path, status and timing
 */

export type ClioOperation = "list_matters" | "create_time_entry";

export interface ClioRequestLogEntry {
  timestamp: string;
  operation: ClioOperation;
  method: "GET" | "POST";
  path: string;
  status: number | null; // null when no response arrived
  attempt: number;
  duration_ms: number;
  error_code?: string;
}

export function logClioRequest(entry: ClioRequestLogEntry): void {
  console.log(
    JSON.stringify({
      ...entry,
      _type: "clio_telemetry",
    }),
  );
}

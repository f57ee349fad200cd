/**
 * Practice-management connector contract.
 * Provides the shape every remote practice-management integration must satisfy.
 */

import type { ClioMatter, ClioTimeEntry, PracticeManagementTool, TimeEntryInput } from "./types";

/**
 * Custom error for unimplemented connector methods.
 */
export class NotImplementedError extends Error {
  readonly code = "not_implemented";
  tool: string;
  method: string;

  constructor(tool: string, method: string) {
    super(`Connector "${tool}" does not implement method "${method}".`);
    this.name = "NotImplementedError";
    this.tool = tool;
    this.method = method;
  }
}

export interface PracticeManagementConnector {
  tool: PracticeManagementTool;

  /**
   * Human-readable display name for UI purposes.
   */
  getDisplayName(): string;

  /**
   * Obtain an access credential for subsequent calls.
   */
  authenticate(): Promise<void>;

  listMatters(): Promise<ClioMatter[]>;

  createTimeEntry(input: TimeEntryInput): Promise<ClioTimeEntry>;
}

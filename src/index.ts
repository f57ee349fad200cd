export { ClioClient, createClioClientFromEnv, type ClioClientOptions } from "./lib/clio/client";
export { ClioAPIError, ClioAuthError, ClioValidationError } from "./lib/clio/errors";
export type { ClioAPIErrorCode, ClioAuthErrorCode } from "./lib/clio/errors";
export { parseTimeEntryInput } from "./lib/clio/schemas";
export { SANDBOX_TIME_ENTRY_ID } from "./lib/clio/sandbox";
export { loadMatterOptions, submitTrackedSession, toTimeEntryInput } from "./lib/clio/sessions";
export { getClioConfig, getEnvironmentInfo } from "./lib/config/environment";
export type { ClioConfig, ClioMode, ClioRegion } from "./lib/config/environment";
export { NotImplementedError } from "./lib/connectors/connector";
export type { PracticeManagementConnector } from "./lib/connectors/connector";
export type { ClioMatter, ClioTimeEntry, TimeEntryInput, TrackedSession } from "./lib/connectors/types";

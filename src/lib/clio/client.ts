import { ClioAuthError, ClioValidationError } from "./errors";
import { clioRequest, type ClioTransportOptions } from "./http";
import { sandboxMatters, sandboxTimeEntry } from "./sandbox";
import {
  activityResponseSchema,
  matterListResponseSchema,
  parseTimeEntryInput,
  type ClioMatterRow,
} from "./schemas";
import { CLIO_REGION_BASE_URLS, getClioConfig, type ClioMode } from "../config/environment";
import {
  DEFAULT_BASE_BACKOFF_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  MATTER_PAGE_LIMIT,
} from "../config/limits";
import { NotImplementedError, type PracticeManagementConnector } from "../connectors/connector";
import type { ClioMatter, ClioTimeEntry, TimeEntryInput } from "../connectors/types";

export interface ClioClientOptions {
  mode?: ClioMode;
  apiBaseUrl?: string;
  requestTimeoutMs?: number;
  maxRetries?: number;
  baseBackoffMs?: number;
  tokenExpiresAt?: string | null;
  fetch?: typeof fetch;
}

const MATTER_FIELDS = "id,display_number,description,status";

function toMatter(row: ClioMatterRow): ClioMatter {
  const displayNumber = row.display_number?.trim() || null;
  const description = row.description?.trim() || null;
  const name = [displayNumber, description].filter((part): part is string => part !== null).join(" - ");

  return {
    id: String(row.id),
    name: name || String(row.id),
    display_number: displayNumber,
    status: row.status ?? null,
  };
}

/**
 * Client for the Clio v4 REST API.
 *
 * In sandbox mode (the default) no request leaves the process: matters come back empty
 * and created entries get a fixed placeholder id. Live mode needs a token supplied at
 * construction, since the OAuth2 flow is not available.
 */
export class ClioClient implements PracticeManagementConnector {
  readonly tool = "clio" as const;

  private readonly token: string | null;
  private readonly tokenExpiresAt: string | null;
  private readonly clientMode: ClioMode;
  private readonly transport: ClioTransportOptions;

  constructor(accessToken: string | null = null, options: ClioClientOptions = {}) {
    this.token = accessToken;
    this.tokenExpiresAt = options.tokenExpiresAt ?? null;
    this.clientMode = options.mode ?? "sandbox";
    this.transport = {
      apiBaseUrl: options.apiBaseUrl ?? CLIO_REGION_BASE_URLS.us,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      baseBackoffMs: options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS,
      fetch: options.fetch ?? globalThis.fetch.bind(globalThis),
    };
  }

  get accessToken(): string | null {
    return this.token;
  }

  get mode(): ClioMode {
    return this.clientMode;
  }

  getDisplayName(): string {
    return "Clio";
  }

  /**
   * OAuth2 authorization-code flow. Not available: callers must supply a token instead.
   */
  async authenticate(): Promise<never> {
    throw new NotImplementedError(this.tool, "authenticate");
  }

  async listMatters(): Promise<ClioMatter[]> {
    if (this.clientMode === "sandbox") {
      return sandboxMatters();
    }

    const accessToken = this.requireAccessToken();
    const response = await clioRequest(
      {
        operation: "list_matters",
        method: "GET",
        path: "/matters.json",
        query: { fields: MATTER_FIELDS, limit: String(MATTER_PAGE_LIMIT) },
        accessToken,
        schema: matterListResponseSchema,
        retry: true,
      },
      this.transport,
    );

    return response.data.map(toMatter);
  }

  async createTimeEntry(input: TimeEntryInput): Promise<ClioTimeEntry> {
    const entry = parseTimeEntryInput(input);

    if (this.clientMode === "sandbox") {
      return sandboxTimeEntry(entry);
    }

    const matterId = entry.matterId.trim();
    if (!/^\d+$/.test(matterId)) {
      throw new ClioValidationError("Invalid time entry: matterId must be a numeric Clio id", [
        "matterId: must be a numeric Clio id",
      ]);
    }

    const accessToken = this.requireAccessToken();
    const response = await clioRequest(
      {
        operation: "create_time_entry",
        method: "POST",
        path: "/activities.json",
        query: { fields: "id" },
        body: {
          data: {
            type: "TimeEntry",
            date: entry.startTime.slice(0, 10),
            quantity: Math.round(entry.durationSeconds),
            note: entry.description,
            matter: { id: Number(matterId) },
          },
        },
        accessToken,
        schema: activityResponseSchema,
        retry: false,
      },
      this.transport,
    );

    return {
      id: String(response.data.id),
      matter_id: entry.matterId,
      start_time: entry.startTime,
      end_time: entry.endTime,
      duration_sec: entry.durationSeconds,
      description: entry.description,
    };
  }

  // An expiry that does not parse counts as expired.
  private requireAccessToken(): string {
    if (this.token === null) {
      throw new ClioAuthError("No Clio access token; supply one when constructing the client", {
        code: "missing_access_token",
      });
    }
    if (this.token.trim() === "") {
      throw new ClioAuthError("Clio access token is empty", { code: "empty_access_token" });
    }
    if (this.tokenExpiresAt !== null && !(Date.parse(this.tokenExpiresAt) > Date.now())) {
      throw new ClioAuthError(`Clio access token expired at ${this.tokenExpiresAt}`, { code: "token_expired" });
    }
    return this.token;
  }
}

/**
 * Build a client from CLIO_* environment variables.
 */
export function createClioClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Pick<ClioClientOptions, "fetch" | "baseBackoffMs"> = {},
): ClioClient {
  const config = getClioConfig(env);
  return new ClioClient(config.accessToken, {
    mode: config.mode,
    apiBaseUrl: config.apiBaseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    tokenExpiresAt: config.tokenExpiresAt,
    ...overrides,
  });
}

/**
 * Environment configuration for the Clio integration.
 * Reads CLIO_* variables and fails loudly on values that cannot be used.
 */

import { DEFAULT_MAX_RETRIES, DEFAULT_REQUEST_TIMEOUT_MS } from "./limits";

export type ClioMode = "sandbox" | "live";

export type ClioRegion = "us" | "eu" | "ca" | "au";

export const CLIO_REGION_BASE_URLS: Record<ClioRegion, string> = {
  us: "https://app.clio.com/api/v4",
  eu: "https://eu.app.clio.com/api/v4",
  ca: "https://ca.app.clio.com/api/v4",
  au: "https://au.app.clio.com/api/v4",
};

export interface ClioConfig {
  mode: ClioMode;
  apiBaseUrl: string;
  accessToken: string | null;
  tokenExpiresAt: string | null;
  requestTimeoutMs: number;
  maxRetries: number;
}

type Env = Record<string, string | undefined>;

function isRegion(value: string): value is ClioRegion {
  return Object.keys(CLIO_REGION_BASE_URLS).includes(value);
}

function readMode(env: Env): ClioMode {
  const raw = env.CLIO_MODE?.trim().toLowerCase();
  if (!raw) return "sandbox";
  if (raw === "sandbox" || raw === "live") return raw;
  throw new Error(`CLIO_MODE must be "sandbox" or "live" (got "${env.CLIO_MODE}")`);
}

function readApiBaseUrl(env: Env): string {
  const explicit = env.CLIO_API_BASE_URL?.trim();
  if (explicit) return explicit;

  const region = env.CLIO_REGION?.trim().toLowerCase() || "us";
  if (!isRegion(region)) {
    throw new Error(`CLIO_REGION must be one of ${Object.keys(CLIO_REGION_BASE_URLS).join(", ")} (got "${region}")`);
  }
  return CLIO_REGION_BASE_URLS[region];
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readTimestamp(env: Env, key: string): string | null {
  const raw = env[key]?.trim();
  if (!raw) return null;
  if (Number.isNaN(Date.parse(raw))) {
    throw new Error(`${key} must be an ISO-8601 timestamp (got "${raw}")`);
  }
  return raw;
}

/**
 * Validate and return Clio configuration.
 * An empty CLIO_ACCESS_TOKEN is kept as "" so it can be told apart from an unset one.
 */
export function getClioConfig(env: Env = process.env): ClioConfig {
  return {
    mode: readMode(env),
    apiBaseUrl: readApiBaseUrl(env),
    accessToken: env.CLIO_ACCESS_TOKEN ?? null,
    tokenExpiresAt: readTimestamp(env, "CLIO_TOKEN_EXPIRES_AT"),
    requestTimeoutMs: readInteger(env, "CLIO_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 1),
    maxRetries: readInteger(env, "CLIO_MAX_RETRIES", DEFAULT_MAX_RETRIES, 0),
  };
}

/**
 * Get safe environment info for logging (never logs secrets)
 */
export function getEnvironmentInfo(env: Env = process.env) {
  const config = getClioConfig(env);
  return {
    mode: config.mode,
    apiBaseUrl: config.apiBaseUrl,
    tokenPrefix: config.accessToken ? `${config.accessToken.slice(0, 4)}...` : "not set",
    nodeEnv: env.NODE_ENV || "development",
  };
}

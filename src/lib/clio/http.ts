import type { z } from "zod";

import { ClioAPIError, ClioAuthError } from "./errors";
import { clioErrorBodySchema } from "./schemas";
import { RESPONSE_TEXT_LIMIT } from "../config/limits";
import { logClioRequest, type ClioOperation } from "../telemetry/clioLog";

export interface ClioTransportOptions {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  maxRetries: number;
  baseBackoffMs: number;
  fetch: typeof fetch;
}

export interface ClioRequest<T> {
  operation: ClioOperation;
  method: "GET" | "POST";
  path: string;
  query?: Record<string, string>;
  body?: unknown;
  accessToken: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  // Only idempotent requests may be retried; a retried POST can create a duplicate.
  retry: boolean;
}

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withJitter(base: number) {
  const jitter = Math.random() * 0.25 * base;
  return base + jitter;
}

export function buildClioUrl(apiBaseUrl: string, path: string, query?: Record<string, string>): string {
  const base = apiBaseUrl.endsWith("/") ? apiBaseUrl : `${apiBaseUrl}/`;
  const url = new URL(path.replace(/^\/+/, ""), base);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

function readErrorMessage(text: string): string | null {
  try {
    const parsed = clioErrorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.error.message : null;
  } catch {
    return null;
  }
}

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function toTransportError(err: unknown, timeoutMs: number): ClioAPIError {
  if (isTimeoutError(err)) {
    return new ClioAPIError(`Clio request timed out after ${timeoutMs}ms`, {
      code: "timeout",
      retryable: true,
    });
  }
  return new ClioAPIError(`Clio request failed: ${err instanceof Error ? err.message : String(err)}`, {
    code: "network_error",
    retryable: true,
  });
}

async function sendOnce<T>(request: ClioRequest<T>, transport: ClioTransportOptions): Promise<{ data: T; status: number }> {
  const url = buildClioUrl(transport.apiBaseUrl, request.path, request.query);

  let response: Response;
  try {
    response = await transport.fetch(url, {
      method: request.method,
      headers: {
        Accept: "application/json",
        Authorization: `Bearer ${request.accessToken}`,
        ...(request.body !== undefined ? { "Content-Type": "application/json" } : {}),
      },
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      signal: AbortSignal.timeout(transport.requestTimeoutMs),
    });
  } catch (err) {
    throw toTransportError(err, transport.requestTimeoutMs);
  }

  // The timeout signal also covers the body stream, so reading it can fail the same way.
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    throw toTransportError(err, transport.requestTimeoutMs);
  }

  if (response.status === 401) {
    throw new ClioAuthError("Clio rejected the access token", { code: "unauthorized", status: 401 });
  }
  if (response.status === 403) {
    throw new ClioAuthError(readErrorMessage(text) ?? "Clio denied access to this resource", {
      code: "forbidden",
      status: 403,
    });
  }
  if (!response.ok) {
    throw new ClioAPIError(readErrorMessage(text) ?? `HTTP ${response.status}`, {
      code: "http_error",
      status: response.status,
      retryable: isRetryableStatus(response.status),
      responseText: text.slice(0, RESPONSE_TEXT_LIMIT),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (_err) {
    throw new ClioAPIError("Clio API returned non-JSON response", {
      code: "invalid_json",
      status: response.status,
      responseText: text.slice(0, RESPONSE_TEXT_LIMIT),
    });
  }

  const parsed = request.schema.safeParse(json);
  if (!parsed.success) {
    throw new ClioAPIError("Clio API returned an unexpected response shape", {
      code: "unexpected_response",
      status: response.status,
      responseText: text.slice(0, RESPONSE_TEXT_LIMIT),
    });
  }

  return { data: parsed.data, status: response.status };
}

function statusOf(err: unknown): number | null {
  if (err instanceof ClioAPIError || err instanceof ClioAuthError) {
    return err.status ?? null;
  }
  return null;
}

function codeOf(err: unknown): string {
  if (err instanceof ClioAPIError || err instanceof ClioAuthError) {
    return err.code;
  }
  return "unknown";
}

export async function clioRequest<T>(request: ClioRequest<T>, transport: ClioTransportOptions): Promise<T> {
  const maxRetries = request.retry ? transport.maxRetries : 0;

  for (let attempt = 0; ; ) {
    const startedAt = Date.now();
    try {
      const { data, status } = await sendOnce(request, transport);
      logClioRequest({
        timestamp: new Date().toISOString(),
        operation: request.operation,
        method: request.method,
        path: request.path,
        status,
        attempt: attempt + 1,
        duration_ms: Date.now() - startedAt,
      });
      return data;
    } catch (err) {
      logClioRequest({
        timestamp: new Date().toISOString(),
        operation: request.operation,
        method: request.method,
        path: request.path,
        status: statusOf(err),
        attempt: attempt + 1,
        duration_ms: Date.now() - startedAt,
        error_code: codeOf(err),
      });

      attempt += 1;

      const retryable = err instanceof ClioAPIError && err.retryable;
      if (!retryable || attempt > maxRetries) {
        throw err;
      }

      const backoff = withJitter(transport.baseBackoffMs * 2 ** (attempt - 1));
      console.warn(
        `[CLIO] ${request.operation} failed (${codeOf(err)}), retrying in ${Math.round(backoff)}ms (attempt ${attempt}/${maxRetries})`,
      );
      await sleep(backoff);
    }
  }
}

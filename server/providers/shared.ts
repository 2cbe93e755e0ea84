import { createTimeoutSignal, mergeAbortSignals } from "../abort.js";
import type { ProviderId } from "../types.js";

export const CLAUDE_DEFAULT_URL = "https://api.anthropic.com/v1";
export const OPENAI_DEFAULT_URL = "https://api.openai.com/v1";

export class ProviderApiError extends Error {
  readonly providerId: ProviderId;
  readonly statusCode: number;
  readonly retryAfterMs: number | null;
  readonly responseSnippet: string;

  constructor(input: { providerId: ProviderId; statusCode: number; responseSnippet: string; retryAfterMs: number | null }) {
    super(
      `${input.providerId === "openai" ? "OpenAI" : "Claude"} request failed (${input.statusCode}): ${input.responseSnippet}`
    );
    this.name = "ProviderApiError";
    this.providerId = input.providerId;
    this.statusCode = input.statusCode;
    this.retryAfterMs = input.retryAfterMs;
    this.responseSnippet = input.responseSnippet;
  }
}

export class ProviderResponseError extends Error {
  readonly providerId: ProviderId;

  constructor(providerId: ProviderId, message: string) {
    super(message);
    this.name = "ProviderResponseError";
    this.providerId = providerId;
  }
}

export function isProviderApiError(error: unknown): error is ProviderApiError {
  return error instanceof ProviderApiError;
}

export function parseRetryAfterMs(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const seconds = Number.parseFloat(trimmed);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.floor(seconds * 1000);
  }

  const asDate = Date.parse(trimmed);
  if (!Number.isFinite(asDate)) {
    return null;
  }

  return Math.max(0, asDate - now);
}

export function resolveRequestId(headers: Headers): string | null {
  return headers.get("x-request-id") ?? headers.get("request-id");
}

export function maybeRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

export function parseJsonRecordLoose(value: unknown): Record<string, unknown> | null {
  const direct = maybeRecord(value);
  if (direct) {
    return direct;
  }

  if (typeof value !== "string") {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(value);
    return maybeRecord(parsed);
  } catch {
    return null;
  }
}

export interface JsonPostInput {
  providerId: ProviderId;
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchFn: typeof fetch;
  log?: (message: string) => void;
}

export async function postJson(input: JsonPostInput): Promise<unknown> {
  const timeout = createTimeoutSignal(input.timeoutMs, `Provider request timed out after ${input.timeoutMs}ms`);
  try {
    const response = await input.fetchFn(input.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...input.headers
      },
      body: JSON.stringify(input.body),
      signal: mergeAbortSignals([input.signal, timeout.signal])
    });

    const requestId = resolveRequestId(response.headers);
    if (requestId) {
      input.log?.(`${input.providerId} request id: ${requestId}`);
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderApiError({
        providerId: input.providerId,
        statusCode: response.status,
        responseSnippet: errorBody.slice(0, 320),
        retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after"))
      });
    }

    const body: unknown = await response.json();
    return body;
  } finally {
    timeout.clear();
  }
}

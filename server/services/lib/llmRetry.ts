import { APIConnectionError, APIConnectionTimeoutError, APIUserAbortError } from "openai";
import type { FailureKind } from "@shared/schemas";
import type { BackoffSettings } from "../../lib/config";

/**
 * Custom error class for rate limit errors from LLM APIs
 */
export class RateLimitError extends Error {
  public retryAfter?: Date;

  constructor(message: string, retryAfter?: Date) {
    super(message);
    this.name = "RateLimitError";
    this.retryAfter = retryAfter;
  }
}

type ErrorLike = {
  name?: unknown;
  code?: unknown;
  status?: unknown;
  statusCode?: unknown;
  message?: unknown;
  headers?: unknown;
  response?: { headers?: unknown };
};

function asErrorLike(error: unknown): ErrorLike | null {
  return error && typeof error === "object" ? (error as ErrorLike) : null;
}

function messageOf(err: ErrorLike): string {
  return typeof err.message === "string" ? err.message.toLowerCase() : "";
}

/**
 * Check if an error is a rate limit error from the completion service
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitError) {
    return true;
  }

  const err = asErrorLike(error);
  if (!err) return false;

  // OpenAI SDK wraps errors with status property
  if (err.status === 429 || err.statusCode === 429) {
    return true;
  }

  const message = messageOf(err);
  return (
    message.includes("rate limit") ||
    message.includes("too many requests") ||
    message.includes("429")
  );
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return true;
  }

  const err = asErrorLike(error);
  if (!err) return false;

  return (
    err.name === "AbortError" ||
    err.name === "TimeoutError" ||
    err.status === 408 ||
    err.status === 504 ||
    messageOf(err).includes("timed out")
  );
}

const NETWORK_ERROR_CODES = ["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"];

export function isNetworkError(error: unknown): boolean {
  if (error instanceof APIConnectionError) {
    return true;
  }

  const err = asErrorLike(error);
  if (!err) return false;

  if (typeof err.code === "string" && NETWORK_ERROR_CODES.includes(err.code)) {
    return true;
  }

  const message = messageOf(err);
  return (
    message.includes("fetch failed") ||
    message.includes("network") ||
    NETWORK_ERROR_CODES.some((code) => message.includes(code.toLowerCase()))
  );
}

/**
 * Parse duration strings like "1s", "6m0s", "1m30s" to milliseconds
 */
export function parseDuration(duration: string | null | undefined): number {
  if (!duration) return 0;

  let ms = 0;

  const minutesMatch = duration.match(/(\d+)m(?!s)/);
  const secondsMatch = duration.match(/(\d+(?:\.\d+)?)s/);
  const millisMatch = duration.match(/(\d+)ms/);

  if (minutesMatch?.[1]) ms += parseInt(minutesMatch[1], 10) * 60 * 1000;
  if (millisMatch?.[1]) ms += parseInt(millisMatch[1], 10);
  else if (secondsMatch?.[1]) ms += Math.round(parseFloat(secondsMatch[1]) * 1000);

  return ms;
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (!headers || typeof headers !== "object") return undefined;

  if (typeof (headers as { get?: unknown }).get === "function") {
    const value = (headers as { get: (key: string) => string | null }).get(name);
    return value ?? undefined;
  }

  const value = (headers as Record<string, unknown>)[name];
  return typeof value === "string" ? value : undefined;
}

/**
 * Wait hint in milliseconds from rate limit headers, if the provider sent any
 */
export function parseRateLimitReset(error: unknown): number | undefined {
  if (error instanceof RateLimitError && error.retryAfter) {
    return Math.max(0, error.retryAfter.getTime() - Date.now());
  }

  const err = asErrorLike(error);
  const headers = err?.headers ?? err?.response?.headers;
  if (!headers) return undefined;

  const retryAfter = readHeader(headers, "retry-after");
  const retryAfterSeconds = retryAfter ? Number(retryAfter) : NaN;

  // Use the LONGER of the two resets (wait for both)
  const maxWait = Math.max(
    parseDuration(readHeader(headers, "x-ratelimit-reset-requests")),
    parseDuration(readHeader(headers, "x-ratelimit-reset-tokens")),
    Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : 0
  );

  return maxWait > 0 ? maxWait : undefined;
}

export type FailureClassification = {
  kind: FailureKind;
  retryAfterMs?: number;
  message: string;
};

/**
 * Map a thrown transport error onto a failure kind.
 * Rate limits are checked first because a 429 can also carry a timeout-ish message.
 */
export function classifyFailure(error: unknown): FailureClassification {
  const message = error instanceof Error ? error.message : String(error);

  if (isRateLimitError(error)) {
    return { kind: "rate_limited", retryAfterMs: parseRateLimitReset(error), message };
  }

  if (isTimeoutError(error)) {
    return { kind: "timeout", message };
  }

  if (isNetworkError(error)) {
    return { kind: "network", message };
  }

  return { kind: "unknown", message };
}

/**
 * Delay before the next attempt, given the 1-based number of the attempt that just failed
 */
export type BackoffPolicy = Record<FailureKind, (attempt: number, retryAfterMs?: number) => number>;

/**
 * Rate limits recover on a longer timescale than transient errors, so each kind has its own curve:
 * - rate_limited: base + attempt * step (or the provider's reset hint if longer, capped)
 * - timeout: shortBase + attempt units
 * - everything else: 1 + attempt units
 */
export function createBackoffPolicy(settings: BackoffSettings): BackoffPolicy {
  const linear = (attempt: number) => settings.unitMs + attempt * settings.unitMs;

  return {
    rate_limited: (attempt, retryAfterMs) => {
      const progressive = settings.rateLimitBaseMs + attempt * settings.rateLimitStepMs;
      return Math.min(Math.max(progressive, retryAfterMs ?? 0), settings.rateLimitMaxWaitMs);
    },
    timeout: (attempt) => settings.timeoutBaseMs + attempt * settings.unitMs,
    network: linear,
    malformed: linear,
    unknown: linear,
  };
}

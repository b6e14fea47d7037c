import { APIConnectionTimeoutError } from "openai";
import { describe, expect, it } from "vitest";
import { DEFAULT_BACKOFF } from "../lib/config";
import {
  classifyFailure,
  createBackoffPolicy,
  isRateLimitError,
  parseDuration,
  parseRateLimitReset,
  RateLimitError,
} from "../services/lib/llmRetry";

const withFields = (message: string, fields: Record<string, unknown>) =>
  Object.assign(new Error(message), fields);

describe("classifyFailure", () => {
  it("recognises rate limits", () => {
    expect(classifyFailure(new RateLimitError("slow down")).kind).toBe("rate_limited");
    expect(classifyFailure({ status: 429 }).kind).toBe("rate_limited");
    expect(classifyFailure(new Error("Too Many Requests")).kind).toBe("rate_limited");
  });

  it("recognises timeouts", () => {
    expect(classifyFailure(new APIConnectionTimeoutError()).kind).toBe("timeout");
    expect(classifyFailure(withFields("aborted", { name: "AbortError" })).kind).toBe("timeout");
    expect(classifyFailure(withFields("gateway", { status: 504 })).kind).toBe("timeout");
  });

  it("recognises network failures", () => {
    expect(classifyFailure(new Error("fetch failed")).kind).toBe("network");
    expect(classifyFailure(withFields("socket hang up", { code: "ECONNRESET" })).kind).toBe("network");
  });

  it("falls back to unknown", () => {
    const classification = classifyFailure(new Error("boom"));

    expect(classification).toEqual({ kind: "unknown", message: "boom" });
  });

  it("carries the provider's reset hint for rate limits", () => {
    const error = { status: 429, headers: { "x-ratelimit-reset-requests": "1m30s" } };

    expect(classifyFailure(error).retryAfterMs).toBe(90_000);
  });
});

describe("isRateLimitError", () => {
  it("is false for unrelated errors", () => {
    expect(isRateLimitError(new Error("bad request"))).toBe(false);
    expect(isRateLimitError(undefined)).toBe(false);
  });
});

describe("parseDuration", () => {
  it("parses minutes, seconds and milliseconds", () => {
    expect(parseDuration("6m0s")).toBe(360_000);
    expect(parseDuration("1.5s")).toBe(1500);
    expect(parseDuration("250ms")).toBe(250);
    expect(parseDuration(undefined)).toBe(0);
  });
});

describe("parseRateLimitReset", () => {
  it("takes the longest of the advertised waits", () => {
    const error = {
      status: 429,
      headers: { "retry-after": "12", "x-ratelimit-reset-tokens": "3s" },
    };

    expect(parseRateLimitReset(error)).toBe(12_000);
  });

  it("reads Headers instances", () => {
    const error = { status: 429, headers: new Headers({ "retry-after": "2" }) };

    expect(parseRateLimitReset(error)).toBe(2000);
  });

  it("returns undefined without headers", () => {
    expect(parseRateLimitReset(new Error("429"))).toBeUndefined();
  });
});

describe("createBackoffPolicy", () => {
  const policy = createBackoffPolicy(DEFAULT_BACKOFF);

  it("grows rate-limit waits by a fixed step", () => {
    expect(policy.rate_limited(1)).toBe(10_000);
    expect(policy.rate_limited(2)).toBe(15_000);
  });

  it("honours a longer reset hint up to the cap", () => {
    expect(policy.rate_limited(1, 30_000)).toBe(30_000);
    expect(policy.rate_limited(1, 120_000)).toBe(60_000);
  });

  it("uses short waits for timeouts", () => {
    expect(policy.timeout(1)).toBe(3000);
    expect(policy.timeout(2)).toBe(4000);
  });

  it("grows other failures linearly", () => {
    expect(policy.unknown(1)).toBe(2000);
    expect(policy.malformed(2)).toBe(3000);
    expect(policy.network(3)).toBe(4000);
  });
});

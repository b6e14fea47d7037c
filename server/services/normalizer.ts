import {
  coerceCandidate,
  emptyCandidate,
  type CandidateRecord,
  type ExtractionOutcome,
} from "@shared/schemas";
import { stripCodeFences } from "./lib/textProcessing";

export type NormalizedReply = {
  records: CandidateRecord[];
  /** Per position: "ok" when filled from the reply, "parse_failed" when padded */
  outcomes: ExtractionOutcome[];
  parsed: boolean;
};

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function outermostSpan(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

/**
 * Parse the whole reply, else the outermost {...} or [...] span (whichever opens first)
 */
export function parseReplyJson(rawReply: string): ParseAttempt {
  const content = stripCodeFences(rawReply);
  const whole = tryParse(content);
  if (whole.ok) return whole;

  const objectStart = content.indexOf("{");
  const arrayStart = content.indexOf("[");
  const spans =
    arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart)
      ? [outermostSpan(content, "[", "]"), outermostSpan(content, "{", "}")]
      : [outermostSpan(content, "{", "}"), outermostSpan(content, "[", "]")];

  for (const span of spans) {
    if (span === null) continue;
    const attempt = tryParse(span);
    if (attempt.ok) return attempt;
  }

  return { ok: false };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten a parsed reply into a list of objects; null for shapes that carry no records.
 * Items that hold no object (scalars, empty nested lists) stay as null placeholders.
 */
export function toObjectList(value: unknown): (Record<string, unknown> | null)[] | null {
  if (isPlainObject(value)) {
    return [value];
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => {
      const candidate: unknown = Array.isArray(item) ? item[0] : item;
      return isPlainObject(candidate) ? candidate : null;
    });
  }

  return null;
}

/**
 * Turn a completion reply into exactly expectedCount records. Never throws.
 */
export function normalizeReply(rawReply: string, expectedCount: number): NormalizedReply {
  const count = Number.isFinite(expectedCount) ? Math.max(0, Math.floor(expectedCount)) : 0;
  const parsed = parseReplyJson(rawReply);
  const items = parsed.ok ? toObjectList(parsed.value) : null;

  const records: CandidateRecord[] = [];
  const outcomes: ExtractionOutcome[] = [];

  for (let i = 0; i < count; i++) {
    const item = items?.[i];
    records.push(item ? coerceCandidate(item) : emptyCandidate());
    outcomes.push(item ? "ok" : "parse_failed");
  }

  return { records, outcomes, parsed: items !== null };
}

export function normalize(rawReply: string, expectedCount: number): CandidateRecord[] {
  return normalizeReply(rawReply, expectedCount).records;
}

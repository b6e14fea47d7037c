import type { CandidateRecord } from "@shared/schemas";
import jobTitleLexicon from "./data/jobTitles.json";
import { countDigits, escapeRegExp, toTitleCase } from "./lib/textProcessing";

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;

const EMAIL_EXACT_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/**
 * Tried in order; the first pattern with any match wins.
 */
export const PHONE_PATTERNS: readonly RegExp[] = [
  /\+61\s*\d{3}\s*\d{3}\s*\d{3}\b/, // +61 412 345 678
  /\+\d{1,3}\s*\d{3,4}\s*\d{3,4}\s*\d{3,4}/, // +1 123 456 7890
  /\b04\d{2}\s*\d{3}\s*\d{3}\b/, // 04XX XXX XXX
  /\b0\d{3}\s*\d{3}\s*\d{3}\b/, // 0123 456 789
  /\b06\d\s*\d{3}\s*\d{4}\b/, // 060 XXX XXXX
  /\b\d{3}-\d{3}-\d{4}\b/, // 123-456-7890
  /\(\d{3}\)\s*\d{3}-\d{4}\b/, // (123) 456-7890
  /\b\d{3}\.\d{3}\.\d{4}\b/, // 123.456.7890
  /\b\d{10}\b/, // 1234567890
];

const NAME_SCAN_LINES = 10;
const NAME_BOILERPLATE = ["resume", "cv", "curriculum", "vitae", "profile", "page", "contact"];
const MAX_TITLE_LENGTH = 100;

const LABELLED_TITLE_PATTERNS: readonly RegExp[] = [
  /\b(?:current\s+|present\s+)?(?:position|job\s+title|job|title|role)\s*:\s*([^.\n]+)/i,
  /\b(?:working|employed)\s+as\s+([^.\n]+)/i,
];

export const DEFAULT_JOB_TITLES: readonly string[] = jobTitleLexicon;

export type FallbackOptions = {
  /** Minimum digit count for a model-supplied phone to beat a regex match */
  minPhoneDigits?: number;
  /** Characters after the email searched first for a phone number */
  phoneWindow?: number;
  jobTitles?: readonly string[];
};

export function findEmail(text: string): string {
  return text.match(EMAIL_PATTERN)?.[0] ?? "";
}

export function findPhone(text: string): string {
  for (const pattern of PHONE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[0].trim();
    }
  }
  return "";
}

function locate(text: string, needle: string): number {
  const exact = text.indexOf(needle);
  if (exact !== -1) return exact;
  return text.toLowerCase().indexOf(needle.toLowerCase());
}

/**
 * Phone near the email first (contact blocks keep them together), then anywhere
 */
export function findPhoneNearEmail(text: string, email: string, window: number): string {
  if (email) {
    const position = locate(text, email);
    if (position !== -1) {
      const nearby = findPhone(text.slice(position, position + window));
      if (nearby) return nearby;
    }
  }
  return findPhone(text);
}

function isNameToken(token: string): boolean {
  if (token.length <= 1) return true;
  const letters = token.replace(/[.,]/g, "");
  return /^\p{Lu}/u.test(token) && /^\p{L}+$/u.test(letters);
}

/**
 * Take the first short line of capitalised words near the top of the text as the name
 */
export function findName(text: string): { first_name: string; last_name: string } | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, NAME_SCAN_LINES);

  for (const line of lines) {
    const lower = line.toLowerCase();
    if (NAME_BOILERPLATE.some((word) => lower.includes(word))) continue;

    const tokens = line.split(/\s+/);
    if (tokens.length < 2 || tokens.length > 4) continue;

    if (tokens.every(isNameToken)) {
      const [first, ...rest] = tokens;
      return { first_name: first ?? "", last_name: rest.join(" ") };
    }
  }

  return null;
}

export function findJobTitle(text: string, jobTitles: readonly string[] = DEFAULT_JOB_TITLES): string {
  for (const pattern of LABELLED_TITLE_PATTERNS) {
    const title = text.match(pattern)?.[1]?.trim();
    if (title && title.length < MAX_TITLE_LENGTH) {
      return toTitleCase(title);
    }
  }

  const lower = text.toLowerCase();
  for (const title of jobTitles) {
    if (!lower.includes(title)) continue;

    const context = lower.match(new RegExp(`[^.\\n]*${escapeRegExp(title)}[^.\\n]*`));
    const expanded = context?.[0].trim() ?? "";
    return toTitleCase(expanded && expanded.length < MAX_TITLE_LENGTH ? expanded : title);
  }

  return "";
}

export function cleanPhone(phone: string): string {
  return phone
    .replace(/[^\d\-().+\s]/g, "")
    .replace(/\(\s*\)/g, "") // brackets emptied by the line above, e.g. "(mobile)"
    .replace(/\s+/g, " ")
    .trim();
}

function resolveEmail(modelEmail: string, rawText: string): string {
  return EMAIL_EXACT_PATTERN.test(modelEmail) ? modelEmail : findEmail(rawText);
}

function resolvePhone(
  modelPhone: string,
  rawText: string,
  email: string,
  options: Required<Pick<FallbackOptions, "minPhoneDigits" | "phoneWindow">>
): string {
  const regexPhone = findPhoneNearEmail(rawText, email, options.phoneWindow);
  const phone =
    regexPhone && countDigits(modelPhone) < options.minPhoneDigits ? regexPhone : modelPhone;
  return cleanPhone(phone);
}

/**
 * Merge deterministic regex recoveries into a model-produced record.
 * A structurally valid model value is never replaced.
 */
export function enrich(
  record: CandidateRecord,
  rawText: string,
  options: FallbackOptions = {}
): CandidateRecord {
  const { minPhoneDigits = 8, phoneWindow = 150, jobTitles = DEFAULT_JOB_TITLES } = options;
  const enriched: CandidateRecord = { ...record };

  enriched.email = resolveEmail(record.email, rawText);
  enriched.phone = resolvePhone(record.phone, rawText, enriched.email, {
    minPhoneDigits,
    phoneWindow,
  });

  if (!record.first_name && !record.last_name) {
    const name = findName(rawText);
    if (name) {
      enriched.first_name = name.first_name;
      enriched.last_name = name.last_name;
    }
  }

  if (!record.current_title) {
    enriched.current_title = findJobTitle(rawText, jobTitles);
  }

  return enriched;
}

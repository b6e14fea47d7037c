import { z } from "zod";

export const CANDIDATE_FIELDS = [
  "first_name",
  "last_name",
  "email",
  "phone",
  "current_title",
  "current_org",
  "previous_title",
  "previous_org",
] as const;

export type CandidateField = (typeof CANDIDATE_FIELDS)[number];

export const candidateRecordSchema = z
  .object({
    first_name: z.string(),
    last_name: z.string(),
    email: z.string(),
    phone: z.string(),
    current_title: z.string(),
    current_org: z.string(),
    previous_title: z.string(),
    previous_org: z.string(),
  })
  .strict();

export type CandidateRecord = z.infer<typeof candidateRecordSchema>;

/**
 * Alternate keys models tend to emit for each canonical field.
 * The canonical key is always checked first.
 */
const FIELD_ALIASES: Record<CandidateField, readonly string[]> = {
  first_name: ["firstName", "given_name"],
  last_name: ["lastName", "family_name", "familyName", "surname"],
  email: ["email_address", "emailAddress"],
  phone: ["mobile", "phone_number", "phoneNumber"],
  current_title: ["current_job_title", "currentJobTitle", "job_title"],
  current_org: ["current_company", "currentCompany", "company"],
  previous_title: ["previous_job_title", "previousJobTitle"],
  previous_org: ["previous_company", "previousCompany"],
};

const rawObjectSchema = z.record(z.string(), z.unknown());

/**
 * Scalars become trimmed strings; null, undefined, arrays and objects become "".
 */
export const scalarFieldSchema = z.unknown().transform((value): string => {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return Number.isFinite(value) ? String(value).trim() : "";
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  return "";
});

export function emptyCandidate(): CandidateRecord {
  return {
    first_name: "",
    last_name: "",
    email: "",
    phone: "",
    current_title: "",
    current_org: "",
    previous_title: "",
    previous_org: "",
  };
}

/**
 * Coerce an untyped object from a model reply into a complete CandidateRecord.
 */
export function coerceCandidate(value: unknown): CandidateRecord {
  const parsed = rawObjectSchema.safeParse(value);
  const record = emptyCandidate();

  if (!parsed.success) {
    return record;
  }

  const source = parsed.data;

  for (const field of CANDIDATE_FIELDS) {
    for (const key of [field, ...FIELD_ALIASES[field]]) {
      if (!(key in source)) continue;

      const coerced = scalarFieldSchema.parse(source[key]);
      if (coerced) {
        record[field] = coerced;
        break;
      }
    }
  }

  return record;
}

export function isEmptyCandidate(record: CandidateRecord): boolean {
  return CANDIDATE_FIELDS.every((field) => record[field] === "");
}

import { z } from "zod";
import type { CandidateRecord } from "./candidates";

export type ExtractionOutcome = "ok" | "extraction_failed" | "parse_failed";

export type FailureKind = "timeout" | "rate_limited" | "malformed" | "network" | "unknown";

export type Result<T, E> = { ok: true; value: T } | { ok: false; failure: E };

/**
 * One input text and its position within a batch
 */
export type ParseUnit = {
  index: number;
  text: string;
};

export type BatchEntry = {
  index: number;
  record: CandidateRecord;
  outcome: ExtractionOutcome;
};

export type BatchResult = BatchEntry[];

export const sourceDocumentSchema = z.object({
  filename: z.string().min(1),
  text: z.string(),
});

export type SourceDocument = z.infer<typeof sourceDocumentSchema>;

export type ExtractedCandidate = BatchEntry & {
  filename: string;
};

export type ExtractionSummary = {
  total: number;
  extracted: number;
  parseFailed: number;
  failed: number;
  message: string;
};

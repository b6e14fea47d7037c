import { CANDIDATE_FIELDS } from "@shared/schemas";
import { normalizeText, truncateText } from "./lib/textProcessing";

export const CONNECTION_CHECK_PROMPT = "Hello";

const EXAMPLE_RECORD = {
  first_name: "Alicia",
  last_name: "Tan Li Mei",
  email: "alicia.tan@example.com",
  phone: "+60123456789",
  current_title: "Software Engineer",
  current_org: "Northwind Labs",
  previous_title: "Intern",
  previous_org: "Contoso Energy",
};

export function buildResumeBlock(resumeTexts: readonly string[], maxCharsPerResume: number): string {
  return resumeTexts
    .map((text, i) => `Resume ${i + 1}:\n${truncateText(normalizeText(text), maxCharsPerResume)}\n`)
    .join("\n");
}

/**
 * Build one prompt covering every resume in a chunk; the reply must be a
 * JSON array whose i-th item describes Resume i.
 */
export function buildExtractionPrompt(resumeTexts: readonly string[], maxCharsPerResume: number): string {
  const count = resumeTexts.length;
  const keys = CANDIDATE_FIELDS.map((field) => `- ${field}`).join("\n");

  return `You are a strict JSON generator for resume parsing. Do not include any explanations or markdown. Output must be valid JSON only.

INPUT_RESUMES (ordered):
${buildResumeBlock(resumeTexts, maxCharsPerResume)}
TASK
For each resume, extract the following fields:
${keys}

OUTPUT REQUIREMENTS
1) Return a JSON array with length = ${count}, where ${count} is the number of input resumes.
2) The i-th array item corresponds to Resume i (same order).
3) Keys must be EXACTLY these (snake_case). No extra keys.
4) All values must be strings. If unknown, use "".
5) Do NOT wrap the JSON in code fences or add prose.

DISAMBIGUATION RULES
- Name splitting: if the full name has >= 2 tokens, first_name = first token, last_name = the rest (unchanged). If only one token, first_name = token, last_name = "".
- Phone: return the first plausible phone number found (prefer the header/top of the first page). Keep original formatting.
- Email: return the first valid email found.
- Current vs previous roles: the job with the most recent end date (or ongoing markers like "Present", "Current", "Now") is current. The chronologically prior job is previous. If only one job exists, fill current_* and leave previous_* empty.

OUTPUT JSON EXAMPLE (shape only; values are examples):
${JSON.stringify([EXAMPLE_RECORD], null, 2)}
`;
}

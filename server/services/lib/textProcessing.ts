/**
 * Clean and normalize resume text before it goes into a prompt.
 * Line breaks are kept; the model relies on them to find section headings.
 */
export function normalizeText(text: string): string {
  if (!text) return "";

  return text
    .replace(/\r\n/g, "\n") // normalize line endings
    .replace(/\r/g, "\n") // handle remaining carriage returns
    .replace(/\t/g, " ") // replace tabs with spaces
    .replace(/ {2,}/g, " ") // collapse runs of spaces
    .replace(/ *\n */g, "\n") // strip spaces around line breaks
    .replace(/\n{3,}/g, "\n\n") // at most one blank line
    .trim();
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}...`;
}

/**
 * Remove a Markdown code fence from the very start and end of a reply
 */
export function stripCodeFences(content: string): string {
  let cleaned = content.trim();

  const opening = cleaned.match(/^```(?:json)?/i);
  if (opening) {
    cleaned = cleaned.slice(opening[0].length);
  }

  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }

  return cleaned.trim();
}

/**
 * Upper-case the first letter of every word, lower-case the rest
 */
export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => {
      return boundary + letter.toUpperCase();
    });
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function countDigits(text: string): number {
  return text.replace(/\D/g, "").length;
}

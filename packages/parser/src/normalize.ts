import type { ParseResult } from "@docdigest/types";

/**
 * Collapse runs of spaces, squeeze three or more line breaks (with any
 * whitespace between them) into one blank line, and trim the result.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/ +/g, " ")
    .replace(/\n\s*\n\s*\n+/g, "\n\n")
    .trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/**
 * Normalize extracted text and attach its metadata.
 */
export function toParseResult(raw: string, mimeType: string, pageCount?: number): ParseResult {
  const text = normalizeText(raw);
  return {
    text,
    ...(pageCount === undefined ? {} : { pageCount }),
    metadata: {
      mimeType,
      charCount: text.length,
      wordCount: countWords(text),
    },
  };
}

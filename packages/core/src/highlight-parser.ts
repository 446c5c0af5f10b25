export const MAX_HIGHLIGHTS = 5;

const BULLET_MARKERS = ["-", "•", "*"];
const LEADING_MARKERS = /^[-•*\s]+/;

/**
 * Turn the model's highlight list into at most `limit` strings, in output order.
 *
 * Bulleted lines lose their marker; unbulleted non-empty lines are kept as-is.
 * Never throws: text with no usable lines yields an empty list.
 */
export function parseHighlights(raw: string, limit = MAX_HIGHLIGHTS): string[] {
  const highlights: string[] = [];

  for (const rawLine of raw.split(/\r?\n/)) {
    if (highlights.length >= limit) break;

    const line = rawLine.trim();
    if (!line) continue;

    const isBullet = BULLET_MARKERS.some((marker) => line.startsWith(marker));
    const highlight = isBullet ? line.replace(LEADING_MARKERS, "").trim() : line;
    if (highlight) {
      highlights.push(highlight);
    }
  }

  return highlights;
}

/**
 * Text helpers shared by extraction, injection and rendering.
 */

const ELLIPSIS = "…";

/**
 * Collapse a line of markdown into plain single-line text and cut it to `limit`
 * code points. Backticks are dropped and `<`, `>` and `#` become spaces.
 */
export function shorten(text: string, limit: number = 140): string {
  const clean = text
    .replace(/`+/g, "")
    .replace(/[<>#]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  const chars = Array.from(clean);
  if (chars.length <= limit) {
    return clean;
  }
  return chars.slice(0, limit - 1).join("").trimEnd() + ELLIPSIS;
}

/**
 * Greedy word wrap. Words longer than `width` are split into chunks.
 *
 * @returns Wrapped lines (empty array for blank input)
 */
export function wrapLines(text: string, width: number = 26): string[] {
  const words = text.replace(/\s+/g, " ").trim().split(" ").filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const pieces = chunk(word, width);
    for (const piece of pieces) {
      if (!current) {
        current = piece;
      } else if (
        codePointLength(current) + 1 + codePointLength(piece) <=
        width
      ) {
        current = `${current} ${piece}`;
      } else {
        lines.push(current);
        current = piece;
      }
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

function chunk(word: string, width: number): string[] {
  const chars = Array.from(word);
  if (chars.length <= width) {
    return [word];
  }
  const pieces: string[] = [];
  for (let i = 0; i < chars.length; i += width) {
    pieces.push(chars.slice(i, i + width).join(""));
  }
  return pieces;
}

/**
 * Turn "heading: snippet" into a markdown-table-safe bullet body:
 * leading list markers and backticks removed, pipes escaped.
 */
export function cleanBullet(text: string): string {
  return text
    .trim()
    .replace(/^[-*\d.)\s]+/, "")
    .replace(/`+/g, "")
    .replace(/\|/g, "\\|")
    .trim();
}

/**
 * Title-case a group slug: `control-theory` becomes `Control Theory`.
 */
export function displayName(slug: string): string {
  return slug
    .replace(/-/g, " ")
    .replace(
      /\p{L}+/gu,
      (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
    );
}

/**
 * Length in Unicode code points.
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

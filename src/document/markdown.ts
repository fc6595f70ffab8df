/**
 * Line-level markdown scanning.
 *
 * This is a best-effort scanner, not a markdown parser: the only state it
 * tracks is whether the current line sits inside a fenced code block.
 */

export type LineKind = "fence" | "code" | "title" | "section" | "text";

export interface ScannedLine {
  kind: LineKind;
  /** Raw line without its line terminator */
  raw: string;
  /** Heading text for "title" and "section" lines */
  heading?: string;
  /** Offset of the line's first character in the source text */
  start: number;
  /** Offset just past the line's last character (before the terminator) */
  end: number;
}

const FENCE = /^\s*```/;
const TITLE = /^#[ \t]+(.*\S)/;
const SECTION = /^##[ \t]+(.*\S)/;

export const MD_IMAGE_PATTERN = /!\[[^\]]*?\]\(([^)]+)\)/g;
export const HTML_IMAGE_PATTERN = /<img[^>]+src=["']([^"']+)["']/gi;

/**
 * Classify every line of `text`, honouring code fences.
 */
export function scanLines(text: string): ScannedLine[] {
  const lines: ScannedLine[] = [];
  const pattern = /([^\r\n]*)(\r\n|\r|\n|$)/g;
  let insideCode = false;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const raw = match[1];
    const start = match.index;
    const end = start + raw.length;

    if (FENCE.test(raw)) {
      insideCode = !insideCode;
      lines.push({ kind: "fence", raw, start, end });
    } else if (insideCode) {
      lines.push({ kind: "code", raw, start, end });
    } else {
      const section = SECTION.exec(raw);
      const title = section ? null : TITLE.exec(raw);
      if (section) {
        lines.push({ kind: "section", raw, heading: section[1].trim(), start, end });
      } else if (title) {
        lines.push({ kind: "title", raw, heading: title[1].trim(), start, end });
      } else {
        lines.push({ kind: "text", raw, start, end });
      }
    }

    if (match[2] === "") break;
  }
  return lines;
}

/**
 * First level-1 heading line outside code fences.
 */
export function findTitleLine(text: string): ScannedLine | undefined {
  return scanLines(text).find((line) => line.kind === "title");
}

/**
 * Collect image reference targets in both bracket and tag form.
 */
export function findImageReferences(text: string): string[] {
  const markdown = Array.from(text.matchAll(MD_IMAGE_PATTERN), (m) => m[1]);
  const html = Array.from(text.matchAll(HTML_IMAGE_PATTERN), (m) => m[1]);
  return [...markdown, ...html];
}

import {
  BULLET_MAX_LENGTH,
  GENERATED_DISCLAIMER,
  MAX_BULLETS,
  SENTINEL_MARKER
} from "../utils/constants.js";
import { readDocumentText, writeDocument } from "../utils/encoding.js";
import { cleanBullet, shorten } from "../utils/text.js";
import type { CaseSnippet } from "./extractor.js";
import { findTitleLine } from "./markdown.js";

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Recap bullets for the first sections, or one bullet from the summary.
 */
export function buildBullets(snippet: CaseSnippet): string[] {
  const bullets: string[] = [];
  for (const section of snippet.sections.slice(0, MAX_BULLETS)) {
    const bullet = cleanBullet(`${section.heading}: ${section.snippet}`);
    if (bullet) {
      bullets.push(shorten(bullet, BULLET_MAX_LENGTH));
    }
  }
  if (bullets.length === 0) {
    bullets.push(shorten(snippet.summary, BULLET_MAX_LENGTH));
  }
  return bullets;
}

/**
 * Compose the generated block inserted below the document title.
 */
export function buildDiagramBlock(
  snippet: CaseSnippet,
  diagramFilename: string
): string {
  const bulletList = buildBullets(snippet)
    .map((line) => `- ${line}`)
    .join("\n");

  return [
    `## ${SENTINEL_MARKER}`,
    "",
    "<table>",
    "<tr>",
    '<td width="58%">',
    `<img src="${escapeAttribute(diagramFilename)}" alt="${escapeAttribute(snippet.title)} system diagram" width="100%"/>`,
    "</td>",
    '<td width="42%">',
    "",
    "**Key Points**",
    "",
    bulletList,
    "",
    `> ${GENERATED_DISCLAIMER}`,
    "",
    "</td>",
    "</tr>",
    "</table>"
  ].join("\n");
}

/**
 * Line terminator of the document: CRLF when its first line ends in one.
 */
export function detectLineEnding(content: string): "\r\n" | "\n" {
  const newline = content.indexOf("\n");
  return newline > 0 && content[newline - 1] === "\r" ? "\r\n" : "\n";
}

/**
 * Insert `block` right after the first level-1 heading line,
 * or at the very start when there is none. The block and its blank-line
 * separators use the document's own line terminator.
 */
export function insertBlock(content: string, block: string): string {
  const eol = detectLineEnding(content);
  const insertAt = findTitleLine(content)?.end ?? 0;
  return (
    content.slice(0, insertAt) +
    eol +
    eol +
    block.split("\n").join(eol) +
    eol +
    eol +
    content.slice(insertAt)
  );
}

/**
 * Whether the document already carries this diagram or a generated block.
 */
export function isAlreadyInjected(
  content: string,
  diagramFilename: string
): boolean {
  return content.includes(diagramFilename) || content.includes(SENTINEL_MARKER);
}

/**
 * Insert the generated block into the document on disk.
 *
 * @returns true if the document was rewritten, false if it already had the block
 */
export function injectDiagramBlock(
  snippet: CaseSnippet,
  diagramFilename: string,
  documentPath: string
): boolean {
  const document = readDocumentText(documentPath);
  if (isAlreadyInjected(document.text, diagramFilename)) {
    return false;
  }

  writeDocument(documentPath, {
    text: insertBlock(
      document.text,
      buildDiagramBlock(snippet, diagramFilename)
    ),
    bom: document.bom
  });
  return true;
}

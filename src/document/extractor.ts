import { z } from "zod";
import {
  FALLBACK_SUMMARY,
  MAX_KEYWORDS,
  MAX_KEYWORD_LENGTH,
  MAX_SECTIONS,
  OVERVIEW_HEADING,
  SNIPPET_MAX_LENGTH
} from "../utils/constants.js";
import { codePointLength, displayName, shorten } from "../utils/text.js";
import { findTitleLine, scanLines, type ScannedLine } from "./markdown.js";

/**
 * Zod schema for one extracted section.
 */
export const SectionSchema = z.object({
  heading: z.string().min(1),
  snippet: z.string()
});

export type Section = z.infer<typeof SectionSchema>;

/**
 * Zod schema for the structured summary of one case document.
 */
export const CaseSnippetSchema = z.object({
  /** Directory name of the containing group */
  group: z.string(),

  /** Title-cased group name for display */
  groupDisplay: z.string(),

  /** Case directory name; also the diagram file prefix */
  caseName: z.string(),

  title: z.string(),

  /** At most six sections, in document order */
  sections: z.array(SectionSchema).max(MAX_SECTIONS),

  /** At most six keywords, in order of first appearance */
  keywords: z.array(z.string()).max(MAX_KEYWORDS),

  /** Never empty */
  summary: z.string().min(1)
});

export type CaseSnippet = z.infer<typeof CaseSnippetSchema>;

export interface CaseIdentity {
  group: string;
  caseName: string;
}

const BOLD_SPAN = /\*\*(.+?)\*\*/g;
const TRAILING_COLONS = /[:：\s]+$/u;
const NON_WORD_EDGES = /^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu;
const MARKDOWN_LINK = /\[([^\]]*)\]\([^)]*\)/g;
const STRONG_MARKERS = /\*\*|__/g;

/**
 * Reduce one body line to snippet text, or "" if it does not qualify.
 */
function qualifyLine(line: ScannedLine): string {
  if (line.kind !== "text") {
    return "";
  }
  const stripped = line.raw.trim();
  if (!stripped || stripped.startsWith("!") || /^<img\b/i.test(stripped)) {
    return "";
  }
  return stripped
    .replace(MARKDOWN_LINK, "$1")
    .replace(STRONG_MARKERS, "")
    .replace(/^#+\s*/, "")
    .replace(/^[-*\d.)(]+\s*/, "")
    .trim();
}

/**
 * First qualifying line of a block, shortened.
 */
function firstSnippet(lines: ScannedLine[]): string {
  for (const line of lines) {
    const text = qualifyLine(line);
    if (text) {
      return shorten(text, SNIPPET_MAX_LENGTH);
    }
  }
  return "";
}

/**
 * Collect level-2 sections with a non-empty snippet, up to the cap.
 * Falls back to a single overview section drawn from the whole body.
 */
export function parseSections(content: string): Section[] {
  const lines = scanLines(content);
  const sections: Section[] = [];
  let heading: string | null = null;
  let body: ScannedLine[] = [];

  const flush = () => {
    if (heading === null) return;
    const snippet = firstSnippet(body);
    if (snippet) {
      sections.push({ heading, snippet });
    }
  };

  for (const line of lines) {
    if (sections.length >= MAX_SECTIONS) break;

    if (line.kind === "section" || line.kind === "title") {
      flush();
      heading = line.kind === "section" ? (line.heading ?? null) : null;
      body = [];
    } else if (heading !== null) {
      body.push(line);
    }
  }
  if (sections.length < MAX_SECTIONS) {
    flush();
  }

  if (sections.length === 0) {
    const snippet = firstSnippet(lines);
    if (snippet) {
      sections.push({ heading: OVERVIEW_HEADING, snippet });
    }
  }
  return sections;
}

/**
 * Collect emphasized (`**bold**`) tokens, deduplicated in first-seen order.
 */
export function parseKeywords(content: string): string[] {
  const keywords: string[] = [];
  const seen = new Set<string>();

  for (const match of content.matchAll(BOLD_SPAN)) {
    const token = match[1]
      .trim()
      .replace(TRAILING_COLONS, "")
      .replace(NON_WORD_EDGES, "");
    if (!token || codePointLength(token) > MAX_KEYWORD_LENGTH) {
      continue;
    }
    if (seen.has(token)) {
      continue;
    }
    keywords.push(token);
    seen.add(token);
    if (keywords.length >= MAX_KEYWORDS) {
      break;
    }
  }
  return keywords;
}

/**
 * Extract the structured summary of a case document.
 * Never throws: missing structure degrades to fallback values.
 */
export function extractSnippet(
  content: string,
  identity: CaseIdentity
): CaseSnippet {
  const title =
    findTitleLine(content)?.heading ?? identity.caseName.replace(/_/g, " ");

  const sections = parseSections(content);
  const keywords = parseKeywords(content);
  const summary =
    sections.find((section) => section.snippet)?.snippet ?? FALLBACK_SUMMARY;

  return {
    group: identity.group,
    groupDisplay: displayName(identity.group),
    caseName: identity.caseName,
    title,
    sections,
    keywords,
    summary
  };
}

import type { CaseSnippet } from "../document/extractor.js";
import {
  FOOTER_CAPTION,
  MAX_KEYWORDS,
  QUADRANT_COUNT,
  QUADRANT_WRAP_WIDTH,
  SUMMARY_WRAP_WIDTH
} from "../utils/constants.js";
import { wrapLines } from "../utils/text.js";
import {
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  CONNECTORS,
  FOOTER_Y,
  QUADRANT_HEIGHT,
  QUADRANT_SLOTS,
  QUADRANT_WIDTH,
  SUBTITLE_Y,
  SUMMARY_Y,
  TITLE_Y,
  layoutKeywords,
  toCanvas
} from "./layout.js";
import { selectPalette, type ColorPalette } from "./palette.js";

export const QUADRANT_NAMES = [
  "top-left",
  "top-right",
  "bottom-left",
  "bottom-right"
] as const;

const FONT_FAMILY =
  "'Noto Sans CJK SC', 'Source Han Sans SC', 'Microsoft YaHei', 'PingFang SC', 'DejaVu Sans', sans-serif";

const FONT = {
  title: 30,
  subtitle: 17,
  summary: 15,
  heading: 18,
  body: 15,
  keyword: 15,
  footer: 12
} as const;

const LINE_HEIGHT = 1.35;
/** Rough average glyph advance relative to font size */
const GLYPH_RATIO = 0.55;

const TEXT_COLOR = "#0f172a";
const MUTED_COLOR = "#475569";
const KEYWORD_COLOR = "#334155";
const FOOTER_COLOR = "#94a3b8";
const SUMMARY_FILL = "#f8fafc";
const SUMMARY_BORDER = "#cbd5f5";

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function px(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Multi-line text block; each line becomes a tspan below the previous one.
 */
function textBlock(
  lines: string[],
  x: number,
  y: number,
  attributes: string,
  fontSize: number
): string {
  const spans = lines
    .map(
      (line, i) =>
        `<tspan x="${px(x)}" dy="${i === 0 ? 0 : px(fontSize * LINE_HEIGHT)}">${escapeXml(line)}</tspan>`
    )
    .join("");
  return `<text x="${px(x)}" y="${px(y)}" font-size="${fontSize}" dominant-baseline="hanging" ${attributes}>${spans}</text>`;
}

function header(snippet: CaseSnippet, palette: ColorPalette): string[] {
  const center = CANVAS_WIDTH / 2;
  const title = toCanvas({ x: 0.5, y: TITLE_Y });
  const subtitle = toCanvas({ x: 0.5, y: SUBTITLE_Y });
  return [
    textBlock(
      [snippet.title],
      center,
      title.y,
      `text-anchor="middle" font-weight="bold" fill="${palette.accent}"`,
      FONT.title
    ),
    textBlock(
      [`${snippet.groupDisplay} · ${snippet.caseName}`],
      center,
      subtitle.y,
      `text-anchor="middle" fill="${MUTED_COLOR}"`,
      FONT.subtitle
    )
  ];
}

function summaryBox(snippet: CaseSnippet): string {
  const lines = wrapLines(snippet.summary, SUMMARY_WRAP_WIDTH);
  const top = toCanvas({ x: 0.5, y: SUMMARY_Y }).y;
  const padding = 10;
  const longest = Math.max(0, ...lines.map((line) => Array.from(line).length));
  const width = Math.min(
    CANVAS_WIDTH - 100,
    longest * FONT.summary * GLYPH_RATIO + padding * 2
  );
  const height =
    (lines.length - 1) * FONT.summary * LINE_HEIGHT + FONT.summary + padding * 2;
  const left = (CANVAS_WIDTH - width) / 2;

  return [
    `<g class="summary">`,
    `<rect x="${px(left)}" y="${px(top - padding)}" width="${px(width)}" height="${px(height)}" rx="8" fill="${SUMMARY_FILL}" stroke="${SUMMARY_BORDER}" stroke-width="1.5"/>`,
    textBlock(
      lines,
      CANVAS_WIDTH / 2,
      top,
      `text-anchor="middle" fill="${TEXT_COLOR}"`,
      FONT.summary
    ),
    `</g>`
  ].join("");
}

function quadrants(snippet: CaseSnippet, palette: ColorPalette): string[] {
  const width = QUADRANT_WIDTH * CANVAS_WIDTH;
  const height = QUADRANT_HEIGHT * CANVAS_HEIGHT;

  return snippet.sections.slice(0, QUADRANT_COUNT).map((section, index) => {
    const slot = QUADRANT_SLOTS[index];
    const topLeft = toCanvas({ x: slot.x, y: slot.y + QUADRANT_HEIGHT });
    const body = wrapLines(section.snippet, QUADRANT_WRAP_WIDTH);

    return [
      `<g class="quadrant" data-slot="${QUADRANT_NAMES[index]}">`,
      `<rect x="${px(topLeft.x)}" y="${px(topLeft.y)}" width="${px(width)}" height="${px(height)}" rx="16" fill="${palette.background}" fill-opacity="0.9" stroke="${palette.accent}" stroke-width="2.5"/>`,
      textBlock(
        [section.heading],
        topLeft.x + width / 2,
        topLeft.y + 0.04 * CANVAS_HEIGHT,
        `text-anchor="middle" font-weight="bold" fill="${palette.accent}"`,
        FONT.heading
      ),
      textBlock(
        body,
        topLeft.x + 0.02 * CANVAS_WIDTH,
        topLeft.y + 0.1 * CANVAS_HEIGHT,
        `fill="${TEXT_COLOR}"`,
        FONT.body
      ),
      `</g>`
    ].join("");
  });
}

function connectors(palette: ColorPalette): string {
  const lines = CONNECTORS.map(([from, to]) => {
    const a = toCanvas(from);
    const b = toCanvas(to);
    return `<line x1="${px(a.x)}" y1="${px(a.y)}" x2="${px(b.x)}" y2="${px(b.y)}" stroke="${palette.accent}" stroke-width="2.5" marker-end="url(#arrow)"/>`;
  });
  return `<g class="connectors">${lines.join("")}</g>`;
}

function keywordTags(snippet: CaseSnippet): string {
  const shown = snippet.keywords.slice(0, MAX_KEYWORDS);
  if (shown.length === 0) {
    return "";
  }
  const positions = layoutKeywords(shown.length);
  const tags = shown.map((keyword, i) => {
    const point = toCanvas(positions[i]);
    return `<text class="keyword" x="${px(point.x)}" y="${px(point.y)}" font-size="${FONT.keyword}" dominant-baseline="middle" fill="${KEYWORD_COLOR}">${escapeXml(`- ${keyword}`)}</text>`;
  });
  return `<g class="keywords">${tags.join("")}</g>`;
}

function footer(): string {
  const point = toCanvas({ x: 0.5, y: FOOTER_Y });
  return `<text x="${px(point.x)}" y="${px(point.y)}" font-size="${FONT.footer}" text-anchor="middle" fill="${FOOTER_COLOR}">${escapeXml(FOOTER_CAPTION)}</text>`;
}

/**
 * Compose the diagram for one case as an SVG document.
 * Pure: the same snippet always produces the same markup.
 */
export function buildDiagramSvg(snippet: CaseSnippet): string {
  const palette = selectPalette(snippet.caseName);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CANVAS_WIDTH}" height="${CANVAS_HEIGHT}" viewBox="0 0 ${CANVAS_WIDTH} ${CANVAS_HEIGHT}" font-family="${FONT_FAMILY}">`,
    `<defs><marker id="arrow" viewBox="0 0 10 10" refX="9" refY="5" markerWidth="6" markerHeight="6" orient="auto"><path d="M0,0 L10,5 L0,10 z" fill="${palette.accent}"/></marker></defs>`,
    `<rect width="${CANVAS_WIDTH}" height="${CANVAS_HEIGHT}" fill="#ffffff"/>`,
    ...header(snippet, palette),
    summaryBox(snippet),
    ...quadrants(snippet, palette),
    connectors(palette),
    keywordTags(snippet),
    footer(),
    `</svg>`
  ].join("\n");
}

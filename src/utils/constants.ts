// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT BLOCK
// ═══════════════════════════════════════════════════════════════════════════

/** Heading text that marks a generated block; used for idempotence checks */
export const SENTINEL_MARKER = "System Diagram (AI Generated)";

/** Suffix appended to the case identifier to name its diagram file */
export const DIAGRAM_FILE_SUFFIX = "_ai_diagram.png";

/** Disclaimer closing the generated block */
export const GENERATED_DISCLAIMER =
  "This diagram was generated automatically from the case write-up. It relates the inputs, physical model, control strategy and key metrics, and is meant as a quick guide before reading the full text.";

// ═══════════════════════════════════════════════════════════════════════════
// EXTRACTION LIMITS
// ═══════════════════════════════════════════════════════════════════════════

/** Maximum sections collected per document */
export const MAX_SECTIONS = 6;

/** Maximum keywords collected per document */
export const MAX_KEYWORDS = 6;

/** Keywords longer than this (in code points) are rejected */
export const MAX_KEYWORD_LENGTH = 16;

/** Section snippets are shortened to this many characters */
export const SNIPPET_MAX_LENGTH = 140;

/** Bullets in the injected recap are shortened to this many characters */
export const BULLET_MAX_LENGTH = 110;

/** Sections turned into recap bullets */
export const MAX_BULLETS = 4;

/** Heading used when no level-2 section yields a snippet */
export const OVERVIEW_HEADING = "Overview";

/** Summary used when no section yields a snippet */
export const FALLBACK_SUMMARY =
  "See the case write-up for the model and control strategy.";

// ═══════════════════════════════════════════════════════════════════════════
// DIAGRAM
// ═══════════════════════════════════════════════════════════════════════════

/** Footer caption painted at the bottom of every diagram */
export const FOOTER_CAPTION =
  "AI Diagram Generator · structured overview parsed from the case document";

/** Number of quadrant panels in the layout */
export const QUADRANT_COUNT = 4;

/** Wrap width (characters) of the summary box */
export const SUMMARY_WRAP_WIDTH = 65;

/** Wrap width (characters) of quadrant body text */
export const QUADRANT_WRAP_WIDTH = 28;

/** White border added around the trimmed raster, in pixels */
export const RASTER_PADDING = 24;

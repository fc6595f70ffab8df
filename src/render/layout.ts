/**
 * Fixed diagram geometry.
 *
 * Positions are expressed on a unit square with the origin at the bottom
 * left and mapped onto the canvas by `toCanvas`.
 */

export const CANVAS_WIDTH = 1200;
export const CANVAS_HEIGHT = 800;

export interface Point {
  x: number;
  y: number;
}

export const TITLE_Y = 0.95;
export const SUBTITLE_Y = 0.91;
export const SUMMARY_Y = 0.86;

export const QUADRANT_WIDTH = 0.4;
export const QUADRANT_HEIGHT = 0.28;

/** Bottom-left corners: top-left, top-right, bottom-left, bottom-right */
export const QUADRANT_SLOTS: readonly Point[] = [
  { x: 0.05, y: 0.55 },
  { x: 0.55, y: 0.55 },
  { x: 0.05, y: 0.23 },
  { x: 0.55, y: 0.23 }
];

/** Static connectors, drawn whether or not the quadrants are populated */
export const CONNECTORS: readonly [Point, Point][] = [
  [
    { x: 0.45, y: 0.69 },
    { x: 0.55, y: 0.69 }
  ],
  [
    { x: 0.45, y: 0.37 },
    { x: 0.55, y: 0.37 }
  ],
  [
    { x: 0.25, y: 0.55 },
    { x: 0.25, y: 0.51 }
  ],
  [
    { x: 0.75, y: 0.55 },
    { x: 0.75, y: 0.51 }
  ]
];

export const KEYWORD_ORIGIN: Point = { x: 0.05, y: 0.08 };
export const KEYWORD_STEP = 0.18;
export const KEYWORD_ROW_LIMIT = 0.8;
export const KEYWORD_ROW_STEP = 0.05;

export const FOOTER_Y = 0.02;

/**
 * Map a unit-square point to canvas pixels (y grows downwards).
 */
export function toCanvas(point: Point): Point {
  return {
    x: round(point.x * CANVAS_WIDTH),
    y: round((1 - point.y) * CANVAS_HEIGHT)
  };
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Positions of the keyword tags, wrapping to a new row once the
 * horizontal budget is exceeded.
 */
export function layoutKeywords(count: number): Point[] {
  const positions: Point[] = [];
  let x = KEYWORD_ORIGIN.x;
  let y = KEYWORD_ORIGIN.y;

  for (let i = 0; i < count; i++) {
    positions.push({ x, y });
    x = round(x + KEYWORD_STEP);
    if (x > KEYWORD_ROW_LIMIT) {
      x = KEYWORD_ORIGIN.x;
      y = round(y - KEYWORD_ROW_STEP);
    }
  }
  return positions;
}

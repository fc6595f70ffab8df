export interface ColorPalette {
  background: string;
  accent: string;
}

export const COLOR_PALETTES: readonly ColorPalette[] = [
  { background: "#e0f2ff", accent: "#0369a1" },
  { background: "#f1f5f9", accent: "#0f172a" },
  { background: "#fef3c7", accent: "#b45309" },
  { background: "#f3e8ff", accent: "#6b21a8" },
  { background: "#fdf2f8", accent: "#be185d" },
  { background: "#dcfce7", accent: "#15803d" },
  { background: "#fff7ed", accent: "#9a3412" },
  { background: "#e0f7fa", accent: "#006064" }
];

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a over UTF-16 code units. Stable across processes.
 */
export function stableHash(value: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function paletteIndex(caseName: string): number {
  return stableHash(caseName) % COLOR_PALETTES.length;
}

/**
 * Palette for a case, chosen from its identifier alone.
 */
export function selectPalette(caseName: string): ColorPalette {
  return COLOR_PALETTES[paletteIndex(caseName)];
}

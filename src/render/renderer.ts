import { mkdirSync } from "fs";
import { dirname } from "path";
import sharp from "sharp";
import type { CaseSnippet } from "../document/extractor.js";
import { RASTER_PADDING } from "../utils/constants.js";
import { RenderError } from "../utils/errors.js";
import { Logger } from "../utils/logger.js";
import { buildDiagramSvg } from "./svg.js";

const logger = new Logger("diagram-renderer");

/**
 * Paints a case diagram to a raster file.
 * Implementations must let failures propagate to the caller.
 */
export interface DiagramRenderer {
  /**
   * Render the diagram for `snippet` and write it to `outputPath`,
   * creating parent directories and overwriting any existing file.
   */
  render(snippet: CaseSnippet, outputPath: string): Promise<void>;

  /**
   * Get human-readable name of this renderer.
   */
  getName(): string;
}

export interface SharpRendererOptions {
  /** Rasterisation density in dpi; 72 maps one SVG unit to one pixel */
  density?: number;
  /** White border around the trimmed image, in pixels */
  padding?: number;
}

/**
 * Renders the SVG layout to PNG through sharp (libvips + librsvg).
 */
export class SharpDiagramRenderer implements DiagramRenderer {
  private readonly density: number;
  private readonly padding: number;

  constructor(options: SharpRendererOptions = {}) {
    this.density = options.density ?? 144;
    this.padding = options.padding ?? RASTER_PADDING;
  }

  getName(): string {
    return "sharp";
  }

  async render(snippet: CaseSnippet, outputPath: string): Promise<void> {
    const svg = buildDiagramSvg(snippet);
    mkdirSync(dirname(outputPath), { recursive: true });

    try {
      const info = await sharp(Buffer.from(svg, "utf8"), {
        density: this.density
      })
        .flatten({ background: "#ffffff" })
        .trim()
        .extend({
          top: this.padding,
          bottom: this.padding,
          left: this.padding,
          right: this.padding,
          background: "#ffffff"
        })
        .png({ compressionLevel: 9 })
        .toFile(outputPath);

      logger.debug("Diagram written", {
        outputPath,
        width: info.width,
        height: info.height,
        bytes: info.size
      });
    } catch (error) {
      throw new RenderError(
        `Failed to render diagram for ${snippet.caseName}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        outputPath,
        error
      );
    }
  }
}

/**
 * Create the default renderer.
 */
export function createDiagramRenderer(
  options: SharpRendererOptions = {}
): DiagramRenderer {
  return new SharpDiagramRenderer(options);
}

#!/usr/bin/env node
/**
 * Writes the Mermaid view of the per-case pipeline to a markdown file.
 *
 * Usage: tsx src/scripts/generate-diagram.ts [--out docs/PIPELINE-GRAPH.md]
 */

import { resolve } from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { ConfigurationError, describeError } from "../utils/errors.js";
import { saveMermaidDiagram } from "../utils/graph-viz.js";
import { Logger } from "../utils/logger.js";

export const DEFAULT_GRAPH_PATH = "docs/PIPELINE-GRAPH.md";

const logger = new Logger("generate-diagram");

/**
 * Resolve the output path from `--out`/`-o`.
 *
 * @throws ConfigurationError on unknown flags or stray arguments
 */
export function resolveGraphPath(argv: string[], cwd: string): string {
  try {
    const { values } = parseArgs({
      args: argv,
      options: { out: { type: "string", short: "o" } },
      strict: true,
      allowPositionals: false
    });
    return resolve(cwd, values.out ?? DEFAULT_GRAPH_PATH);
  } catch (error) {
    throw new ConfigurationError(`Invalid arguments: ${describeError(error)}`);
  }
}

/**
 * Generate the graph document.
 *
 * @returns Process exit code
 */
export function generatePipelineGraph(
  argv: string[],
  cwd: string = process.cwd()
): number {
  try {
    const outputPath = resolveGraphPath(argv, cwd);
    saveMermaidDiagram(outputPath);
    logger.info("Pipeline graph generated", { outputPath });
    return 0;
  } catch (error) {
    logger.error("Failed to generate pipeline graph", {
      error: describeError(error)
    });
    return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = generatePipelineGraph(process.argv.slice(2));
}

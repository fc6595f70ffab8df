import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { Logger } from "./logger.js";
import { compileCaseGraph } from "../graph/workflow.js";
import type { DiagramRenderer } from "../render/renderer.js";

const logger = new Logger("graph-viz");

// Drawing the graph never renders anything; the renderer is only a placeholder.
const inertRenderer: DiagramRenderer = {
  render: async () => undefined,
  getName: () => "inert"
};

/**
 * Generate a Mermaid diagram of the per-case workflow.
 * Returns the raw Mermaid diagram string.
 */
export function generateMermaidDiagram(): string {
  try {
    const graph = compileCaseGraph({ renderer: inertRenderer });
    return graph.getGraph().drawMermaid();
  } catch (error) {
    logger.error("Failed to generate Mermaid diagram", {
      error: String(error)
    });
    return "graph TD\n  Error[Failed to generate diagram]";
  }
}

/**
 * Save the Mermaid diagram to a markdown file.
 *
 * @param filepath - Path to save the markdown file
 */
export function saveMermaidDiagram(filepath: string): void {
  const diagram = generateMermaidDiagram();
  const content = `# Case Pipeline Graph

\`\`\`mermaid
${diagram}
\`\`\`

## Step Descriptions

- **readiness**: Reads the document and skips it if it already has a diagram
- **extract**: Pulls the title, sections and keywords out of the document
- **render**: Paints the four-panel diagram and writes the PNG
- **inject**: Inserts the diagram block below the document title
`;
  mkdirSync(dirname(filepath), { recursive: true });
  writeFileSync(filepath, content);
  logger.info("Mermaid diagram saved", { filepath });
}

import { join } from "path";
import type { CaseState } from "../graph/state.js";
import { StepNames } from "../graph/routes.js";
import {
  createDiagramRenderer,
  type DiagramRenderer
} from "../render/renderer.js";
import { DIAGRAM_FILE_SUFFIX } from "../utils/constants.js";
import { createLoggerWithCorrelationId } from "../utils/logger.js";

/**
 * Diagram file name for a case: `<case>_ai_diagram.png`.
 */
export function diagramFilenameFor(caseName: string): string {
  return `${caseName}${DIAGRAM_FILE_SUFFIX}`;
}

/**
 * Factory function to create the render step with an injectable renderer.
 */
export function createRenderStep(renderer?: DiagramRenderer) {
  const activeRenderer = renderer ?? createDiagramRenderer();

  return async function renderStep(
    state: CaseState
  ): Promise<Partial<CaseState>> {
    const logger = createLoggerWithCorrelationId(
      "render-step",
      state.correlationId
    );
    const { caseRef, snippet } = state;
    if (!caseRef || !snippet) {
      throw new Error("Render step requires a case reference and a snippet");
    }

    const diagramFilename = diagramFilenameFor(caseRef.caseName);
    const diagramPath = join(caseRef.caseDir, diagramFilename);

    // Failures propagate; the step wrapper records them for this case.
    await activeRenderer.render(snippet, diagramPath);

    logger.info("Diagram rendered", {
      renderer: activeRenderer.getName(),
      diagramPath
    });

    return {
      diagramFilename,
      diagramPath,
      currentStep: StepNames.RENDER
    };
  };
}

import type { CaseState } from "../graph/state.js";
import { StepNames } from "../graph/routes.js";
import { injectDiagramBlock } from "../document/injector.js";
import { createLoggerWithCorrelationId } from "../utils/logger.js";

/**
 * Inject step: links the rendered diagram into the document.
 */
export async function injectStep(
  state: CaseState
): Promise<Partial<CaseState>> {
  const logger = createLoggerWithCorrelationId(
    "inject-step",
    state.correlationId
  );
  const { caseRef, snippet, diagramFilename } = state;
  if (!caseRef || !snippet || !diagramFilename) {
    throw new Error(
      "Inject step requires a case reference, a snippet and a diagram"
    );
  }

  const documentUpdated = injectDiagramBlock(
    snippet,
    diagramFilename,
    caseRef.documentPath
  );

  if (documentUpdated) {
    logger.info("Document updated", { documentPath: caseRef.documentPath });
  } else {
    logger.info("Document already links the diagram, left unchanged", {
      documentPath: caseRef.documentPath
    });
  }

  return {
    documentUpdated,
    currentStep: StepNames.INJECT
  };
}

import type { CaseState } from "../graph/state.js";
import { StepNames } from "../graph/routes.js";
import { extractSnippet } from "../document/extractor.js";
import { createLoggerWithCorrelationId } from "../utils/logger.js";

/**
 * Extract step: turns the document text into a CaseSnippet.
 */
export async function extractStep(
  state: CaseState
): Promise<Partial<CaseState>> {
  const logger = createLoggerWithCorrelationId(
    "extract-step",
    state.correlationId
  );
  const caseRef = state.caseRef;
  if (!caseRef) {
    throw new Error("Extract step requires a case reference");
  }

  const snippet = extractSnippet(state.content ?? "", {
    group: caseRef.group,
    caseName: caseRef.caseName
  });

  logger.debug("Snippet extracted", {
    caseName: snippet.caseName,
    title: snippet.title,
    sections: snippet.sections.length,
    keywords: snippet.keywords.length
  });

  return {
    snippet,
    currentStep: StepNames.EXTRACT
  };
}

import type { CaseState } from "../graph/state.js";
import { StepNames } from "../graph/routes.js";
import {
  SkipReasons,
  classifyReadiness,
  type Readiness
} from "../document/readiness.js";
import { readDocument } from "../utils/encoding.js";
import { createLoggerWithCorrelationId } from "../utils/logger.js";

/**
 * Readiness step: reads the document and decides whether it needs a diagram.
 *
 * A document that cannot be read at all is classified as unreadable
 * rather than failing the case.
 */
export async function readinessStep(
  state: CaseState
): Promise<Partial<CaseState>> {
  const logger = createLoggerWithCorrelationId(
    "readiness-step",
    state.correlationId
  );
  const caseRef = state.caseRef;
  if (!caseRef) {
    throw new Error("Readiness step requires a case reference");
  }

  let content: string;
  try {
    content = readDocument(caseRef.documentPath);
  } catch (error) {
    const readiness: Readiness = {
      needsDiagram: false,
      outcome: SkipReasons.UNREADABLE,
      error: error instanceof Error ? error.message : String(error)
    };
    logger.warn("Document could not be read", {
      documentPath: caseRef.documentPath,
      error: readiness.error
    });
    return {
      content: null,
      readiness,
      currentStep: StepNames.READINESS
    };
  }

  const readiness = classifyReadiness(content, caseRef.caseDir);
  logger.debug("Readiness classified", {
    caseDir: caseRef.caseDir,
    outcome: readiness.outcome
  });

  return {
    content,
    readiness,
    currentStep: StepNames.READINESS
  };
}

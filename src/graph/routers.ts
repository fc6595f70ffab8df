import { END } from "@langchain/langgraph";
import type { CaseState } from "./state.js";
import { Logger } from "../utils/logger.js";
import {
  StepNames,
  type ExtractRoute,
  type ReadinessRoute,
  type RenderRoute
} from "./routes.js";

const logger = new Logger("routers");

/**
 * Checks if state has an error and ends the case.
 * Should be called first in any router.
 *
 * @returns END if an error is present, null otherwise
 */
export function checkForError(state: CaseState): typeof END | null {
  if (state.errorContext) {
    logger.warn("Error detected in state, ending case", {
      failedStep: state.errorContext.failedStep,
      errorMessage: state.errorContext.errorMessage
    });
    return END;
  }
  return null;
}

/**
 * Routes from the readiness step.
 *
 * @returns StepNames.EXTRACT if the document needs a diagram, END otherwise
 */
export function readinessRouter(state: CaseState): ReadinessRoute {
  const errorRoute = checkForError(state);
  if (errorRoute) return errorRoute;

  const route = state.readiness?.needsDiagram ? StepNames.EXTRACT : END;

  logger.debug("Readiness router decision", {
    caseDir: state.caseRef?.caseDir,
    outcome: state.readiness?.outcome ?? null,
    route
  });

  return route;
}

/**
 * Routes from the extract step.
 */
export function extractRouter(state: CaseState): ExtractRoute {
  const errorRoute = checkForError(state);
  if (errorRoute) return errorRoute;

  if (!state.snippet) {
    logger.warn("No snippet after extraction, ending case");
    return END;
  }
  return StepNames.RENDER;
}

/**
 * Routes from the render step.
 */
export function renderRouter(state: CaseState): RenderRoute {
  const errorRoute = checkForError(state);
  if (errorRoute) return errorRoute;

  if (!state.diagramFilename) {
    logger.warn("No diagram after rendering, ending case");
    return END;
  }
  return StepNames.INJECT;
}

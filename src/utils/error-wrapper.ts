import type { CaseState, ErrorContext, StepName } from "../graph/state.js";
import { describeError } from "./errors.js";
import { createLoggerWithCorrelationId } from "./logger.js";

/**
 * Type for step functions that take state and return partial state updates.
 */
export type StepFunction = (state: CaseState) => Promise<Partial<CaseState>>;

/**
 * Wraps a step function so that an exception ends the case instead of the batch.
 *
 * When the wrapped step throws:
 * 1. Logs the error with case, step and stack trace
 * 2. Populates errorContext so routers send the case to END
 * 3. Leaves partially produced artifacts (e.g. a written diagram) in place
 *
 * @example
 * ```typescript
 * .addNode("render", withErrorHandling("render", renderNode))
 * ```
 */
export function withErrorHandling(
  stepName: StepName,
  stepFn: StepFunction
): StepFunction {
  return async (state: CaseState): Promise<Partial<CaseState>> => {
    const logger = createLoggerWithCorrelationId(
      `error-wrapper:${stepName}`,
      state.correlationId
    );

    try {
      return await stepFn(state);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);

      logger.error("Step failed", {
        stepName,
        caseDir: state.caseRef?.caseDir,
        errorMessage,
        stack: error instanceof Error ? error.stack : undefined,
        errorType: error instanceof Error ? error.name : typeof error
      });

      const errorContext: ErrorContext = {
        failedStep: stepName,
        errorMessage,
        description: describeError(error),
        errorType: error instanceof Error ? error.name : typeof error,
        originalError: error
      };

      return {
        errorContext,
        currentStep: stepName
      };
    }
  };
}

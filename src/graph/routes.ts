import { END } from "@langchain/langgraph";

/**
 * Step name constants for graph nodes and routing.
 * Using const object instead of enum for better tree-shaking and type inference.
 */
export const StepNames = {
  READINESS: "readiness",
  EXTRACT: "extract",
  RENDER: "render",
  INJECT: "inject"
} as const;

/**
 * Union type of all step names.
 */
export type StepName = (typeof StepNames)[keyof typeof StepNames];

/**
 * Routes available from the readiness router.
 */
export type ReadinessRoute = typeof StepNames.EXTRACT | typeof END;

/**
 * Routes available from the extract router.
 */
export type ExtractRoute = typeof StepNames.RENDER | typeof END;

/**
 * Routes available from the render router.
 */
export type RenderRoute = typeof StepNames.INJECT | typeof END;

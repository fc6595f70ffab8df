import { StateGraph, START, END } from "@langchain/langgraph";
import { CaseStateAnnotation } from "./state.js";
import { extractRouter, readinessRouter, renderRouter } from "./routers.js";
import {
  createRenderStep,
  extractStep,
  injectStep,
  readinessStep
} from "../steps/index.js";
import type { DiagramRenderer } from "../render/renderer.js";
import { withErrorHandling } from "../utils/error-wrapper.js";
import { StepNames } from "./routes.js";

export interface CaseWorkflowDeps {
  /** Renderer used by the render step (defaults to sharp) */
  renderer?: DiagramRenderer;
}

/**
 * Builds the per-case workflow graph (uncompiled).
 *
 * Graph structure:
 * START → readiness → [extract OR END]
 *         extract   → [render OR END on error]
 *         render    → [inject OR END on error]
 *         inject    → END
 */
export function buildCaseWorkflow(deps: CaseWorkflowDeps = {}) {
  return (
    new StateGraph(CaseStateAnnotation)
      // ─── Node Definitions ───
      // Every step is wrapped: an exception becomes errorContext and the
      // routers end the case, so one failing case never aborts the batch.
      .addNode(
        StepNames.READINESS,
        withErrorHandling(StepNames.READINESS, readinessStep)
      )
      .addNode(
        StepNames.EXTRACT,
        withErrorHandling(StepNames.EXTRACT, extractStep)
      )
      .addNode(
        StepNames.RENDER,
        withErrorHandling(StepNames.RENDER, createRenderStep(deps.renderer))
      )
      .addNode(
        StepNames.INJECT,
        withErrorHandling(StepNames.INJECT, injectStep)
      )

      // ─── Entry Edge ───
      .addEdge(START, StepNames.READINESS)

      // ─── Readiness Routing ───
      .addConditionalEdges(StepNames.READINESS, readinessRouter, {
        [StepNames.EXTRACT]: StepNames.EXTRACT,
        [END]: END
      })

      // ─── Extract Routing ───
      .addConditionalEdges(StepNames.EXTRACT, extractRouter, {
        [StepNames.RENDER]: StepNames.RENDER,
        [END]: END
      })

      // ─── Render Routing ───
      .addConditionalEdges(StepNames.RENDER, renderRouter, {
        [StepNames.INJECT]: StepNames.INJECT,
        [END]: END
      })

      // ─── Inject Terminal Edge ───
      .addEdge(StepNames.INJECT, END)
  );
}

/**
 * Compile the per-case workflow. No checkpointer: case state is never persisted.
 */
export function compileCaseGraph(deps: CaseWorkflowDeps = {}) {
  return buildCaseWorkflow(deps).compile();
}

export type CaseGraph = ReturnType<typeof compileCaseGraph>;

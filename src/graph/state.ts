import { z } from "zod";
import { Annotation } from "@langchain/langgraph";
import type { CaseRef } from "../corpus/discovery.js";
import type { CaseSnippet } from "../document/extractor.js";
import type { Readiness } from "../document/readiness.js";
import type { StepName } from "./routes.js";
import { StepNames } from "./routes.js";

export type { StepName } from "./routes.js";

// ═══════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Zod schema for error context set when a step throws.
 */
export const ErrorContextSchema = z.object({
  failedStep: z.string(),
  errorMessage: z.string(),
  /** `Name: message`, as written to the batch report */
  description: z.string(),
  errorType: z.string(),
  originalError: z.unknown().optional()
});

export type ErrorContext = z.infer<typeof ErrorContextSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// REDUCER HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Default "last write wins" reducer.
 */
const lastWriteWins = <T>(_: T, update: T): T => update;

// ═══════════════════════════════════════════════════════════════════════════
// STATE ANNOTATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * LangGraph state for processing one case.
 *
 * Every field uses "last write wins". State lives for a single
 * invocation; the graph is compiled without a checkpointer.
 */
export const CaseStateAnnotation = Annotation.Root({
  // ─── Input ───
  caseRef: Annotation<CaseRef | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  // ─── Readiness ───
  /** Document text as read by the readiness step */
  content: Annotation<string | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  readiness: Annotation<Readiness | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  // ─── Extraction ───
  snippet: Annotation<CaseSnippet | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  // ─── Rendering ───
  diagramFilename: Annotation<string | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  diagramPath: Annotation<string | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  // ─── Injection ───
  /**
   * True when the block was inserted, false when the document already had it.
   * Null until the inject step has run.
   */
  documentUpdated: Annotation<boolean | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  // ─── Metadata ───
  currentStep: Annotation<StepName>({
    reducer: lastWriteWins,
    default: () => StepNames.READINESS
  }),

  errorContext: Annotation<ErrorContext | null>({
    reducer: lastWriteWins,
    default: () => null
  }),

  /** Batch run ID, included in every log entry */
  correlationId: Annotation<string | null>({
    reducer: lastWriteWins,
    default: () => null
  })
});

export type CaseState = typeof CaseStateAnnotation.State;
export type CaseStateUpdate = typeof CaseStateAnnotation.Update;

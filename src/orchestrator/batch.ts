import { discoverCases, type CaseRef } from "../corpus/discovery.js";
import type {
  BatchReport,
  FailedRecord,
  GeneratedRecord,
  SkippedRecord
} from "../corpus/report.js";
import { describeSkip } from "../document/readiness.js";
import { compileCaseGraph, type CaseGraph } from "../graph/workflow.js";
import type { CaseState } from "../graph/state.js";
import type { DiagramRenderer } from "../render/renderer.js";
import { describeError } from "../utils/errors.js";
import {
  createLoggerWithCorrelationId,
  generateCorrelationId,
  type Logger
} from "../utils/logger.js";

export interface BatchOptions {
  corpusRoot: string;
  /** Group names to process; all groups when empty or absent */
  groupFilters?: Iterable<string>;
  /** Stop once this many cases have been generated */
  limit?: number;
  casesSubpath?: string;
  documentFilename?: string;
  /** Renderer for the render step (defaults to sharp) */
  renderer?: DiagramRenderer;
  /** Correlation ID for this run (generated when absent) */
  correlationId?: string;
  /** Clock for the report timestamp */
  now?: () => Date;
}

type CaseOutcome =
  | { status: "generated"; record: GeneratedRecord }
  | { status: "skipped"; record: SkippedRecord }
  | { status: "failed"; record: FailedRecord };

/**
 * Runs the per-case workflow over every discovered case, one at a time,
 * and aggregates the outcomes into a report.
 */
export class BatchOrchestrator {
  private readonly options: BatchOptions;
  private readonly graph: CaseGraph;
  private readonly correlationId: string;
  private readonly logger: Logger;

  constructor(options: BatchOptions) {
    this.options = options;
    this.graph = compileCaseGraph({ renderer: options.renderer });
    this.correlationId = options.correlationId ?? generateCorrelationId();
    this.logger = createLoggerWithCorrelationId(
      "orchestrator",
      this.correlationId
    );
  }

  async run(): Promise<BatchReport> {
    const { corpusRoot, limit } = this.options;
    const generated: GeneratedRecord[] = [];
    const skipped: SkippedRecord[] = [];
    const failed: FailedRecord[] = [];
    const cases = discoverCases({
      corpusRoot,
      groupFilters: new Set(this.options.groupFilters ?? []),
      casesSubpath: this.options.casesSubpath ?? "code/examples",
      documentFilename: this.options.documentFilename ?? "README.md"
    });

    this.logger.info("Batch started", {
      corpusRoot,
      candidates: cases.length,
      limit: limit ?? null
    });

    for (const caseRef of cases) {
      if (limit !== undefined && generated.length >= limit) {
        this.logger.info("Generation limit reached, stopping", { limit });
        break;
      }

      const outcome = await this.processCase(caseRef);
      switch (outcome.status) {
        case "generated":
          generated.push(outcome.record);
          break;
        case "skipped":
          skipped.push(outcome.record);
          break;
        case "failed":
          failed.push(outcome.record);
          break;
      }
    }

    const report: BatchReport = {
      timestamp: (this.options.now ?? (() => new Date()))().toISOString(),
      corpusRoot,
      totalCases: cases.length,
      generated: generated.length,
      skipped: skipped.length,
      failed: failed.length,
      details: { generated, skipped, failed }
    };

    this.logger.info("Batch finished", {
      generated: report.generated,
      skipped: report.skipped,
      failed: report.failed
    });
    return report;
  }

  /**
   * Run one case through the workflow. Never throws.
   */
  private async processCase(caseRef: CaseRef): Promise<CaseOutcome> {
    const base = {
      group: caseRef.group,
      caseDir: caseRef.caseDir,
      document: caseRef.documentPath
    };

    const caseLogger = this.logger.child(caseRef.caseName);
    caseLogger.debug("Processing case", { caseDir: caseRef.caseDir });

    let state: CaseState;
    try {
      state = await this.graph.invoke({
        caseRef,
        correlationId: this.correlationId
      });
    } catch (error) {
      caseLogger.error("Case workflow failed", {
        caseDir: caseRef.caseDir,
        error: describeError(error)
      });
      return {
        status: "failed",
        record: { ...base, error: describeError(error) }
      };
    }

    return this.toOutcome(base, state, caseLogger);
  }

  private toOutcome(
    base: Pick<GeneratedRecord, "group" | "caseDir" | "document">,
    state: CaseState,
    logger: Logger
  ): CaseOutcome {
    if (state.errorContext) {
      logger.error("Diagram generation failed", {
        caseDir: base.caseDir,
        failedStep: state.errorContext.failedStep,
        error: state.errorContext.description
      });
      return {
        status: "failed",
        record: {
          ...base,
          error: state.errorContext.description,
          failedStep: state.errorContext.failedStep
        }
      };
    }

    const readiness = state.readiness;
    if (readiness && !readiness.needsDiagram) {
      const detail = describeSkip(readiness);
      logger.info("Case skipped", { caseDir: base.caseDir, detail });
      return {
        status: "skipped",
        record: { ...base, reason: readiness.outcome, detail }
      };
    }

    if (state.diagramFilename && state.documentUpdated !== null) {
      logger.info("Diagram generated", {
        caseDir: base.caseDir,
        diagram: state.diagramFilename,
        documentUpdated: state.documentUpdated
      });
      return {
        status: "generated",
        record: {
          ...base,
          diagram: state.diagramFilename,
          documentUpdated: state.documentUpdated
        }
      };
    }

    return {
      status: "failed",
      record: {
        ...base,
        error: `Error: workflow ended at ${state.currentStep} without an outcome`,
        failedStep: state.currentStep
      }
    };
  }
}

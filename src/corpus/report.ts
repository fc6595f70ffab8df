import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { SkipReasons } from "../document/readiness.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("report");

const CaseRecordBase = z.object({
  group: z.string(),
  caseDir: z.string(),
  document: z.string()
});

/**
 * A case whose diagram was rendered.
 * `documentUpdated` is false when the document already carried the block.
 */
export const GeneratedRecordSchema = CaseRecordBase.extend({
  diagram: z.string(),
  documentUpdated: z.boolean()
});

export const SkippedRecordSchema = CaseRecordBase.extend({
  reason: z.nativeEnum(SkipReasons),
  detail: z.string()
});

export const FailedRecordSchema = CaseRecordBase.extend({
  error: z.string(),
  failedStep: z.string().optional()
});

export const BatchReportSchema = z.object({
  timestamp: z.string().datetime(),
  corpusRoot: z.string(),
  totalCases: z.number().int().nonnegative(),
  generated: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  details: z.object({
    generated: z.array(GeneratedRecordSchema),
    skipped: z.array(SkippedRecordSchema),
    failed: z.array(FailedRecordSchema)
  })
});

export type GeneratedRecord = z.infer<typeof GeneratedRecordSchema>;
export type SkippedRecord = z.infer<typeof SkippedRecordSchema>;
export type FailedRecord = z.infer<typeof FailedRecordSchema>;
export type BatchReport = z.infer<typeof BatchReportSchema>;

/**
 * Serialize the report as indented JSON, replacing any existing file.
 */
export function writeReport(report: BatchReport, reportPath: string): void {
  mkdirSync(dirname(reportPath), { recursive: true });
  writeFileSync(reportPath, JSON.stringify(report, null, 2) + "\n", "utf-8");
  logger.info("Report written", { reportPath });
}

/**
 * One-line outcome summary for the console.
 */
export function formatReportSummary(report: BatchReport): string {
  return `generated ${report.generated}, skipped ${report.skipped}, failed ${report.failed} (of ${report.totalCases} cases)`;
}

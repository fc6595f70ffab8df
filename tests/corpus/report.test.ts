import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  BatchReportSchema,
  formatReportSummary,
  writeReport,
  type BatchReport
} from "../../src/corpus/report.js";

const report: BatchReport = {
  timestamp: "2026-01-02T03:04:05.000Z",
  corpusRoot: "/corpus",
  totalCases: 3,
  generated: 1,
  skipped: 1,
  failed: 1,
  details: {
    generated: [
      {
        group: "control-theory",
        caseDir: "/corpus/control-theory/code/examples/drone_hover",
        document: "/corpus/control-theory/code/examples/drone_hover/README.md",
        diagram: "drone_hover_ai_diagram.png",
        documentUpdated: true
      }
    ],
    skipped: [
      {
        group: "control-theory",
        caseDir: "/corpus/control-theory/code/examples/servo_tuning",
        document: "/corpus/control-theory/code/examples/servo_tuning/README.md",
        reason: "already-injected",
        detail: "Document already contains a generated diagram block"
      }
    ],
    failed: [
      {
        group: "signals",
        caseDir: "/corpus/signals/code/examples/bad",
        document: "/corpus/signals/code/examples/bad/README.md",
        error: "RenderError: canvas exploded",
        failedStep: "render"
      }
    ]
  }
};

describe("writeReport", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "report-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should write indented JSON that parses back to the report", () => {
    const reportPath = join(dir, "out", "report.json");

    writeReport(report, reportPath);

    const text = readFileSync(reportPath, "utf-8");
    expect(text.startsWith('{\n  "timestamp": "2026-01-02T03:04:05.000Z",')).toBe(
      true
    );
    expect(text.endsWith("}\n")).toBe(true);
    expect(BatchReportSchema.parse(JSON.parse(text))).toEqual(report);
  });

  it("should replace an existing report", () => {
    const reportPath = join(dir, "report.json");
    writeReport(report, reportPath);

    writeReport({ ...report, corpusRoot: "/other" }, reportPath);

    expect(JSON.parse(readFileSync(reportPath, "utf-8")).corpusRoot).toBe(
      "/other"
    );
  });
});

describe("BatchReportSchema", () => {
  it("should reject unknown skip reasons", () => {
    const invalid = {
      ...report,
      details: {
        ...report.details,
        skipped: [{ ...report.details.skipped[0], reason: "bored" }]
      }
    };

    expect(BatchReportSchema.safeParse(invalid).success).toBe(false);
  });
});

describe("formatReportSummary", () => {
  it("should summarise the counts", () => {
    expect(formatReportSummary(report)).toBe(
      "generated 1, skipped 1, failed 1 (of 3 cases)"
    );
  });
});

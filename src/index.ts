#!/usr/bin/env node
// Load environment variables FIRST before any other imports
// Import config.ts first - it loads dotenv at module level
import "./utils/config.js";

import { resolve } from "path";
import { loadConfig, type AppConfig } from "./utils/config.js";
import {
  parseCliOptions,
  USAGE,
  type CliOptions
} from "./utils/cli-options.js";
import { ConfigurationError } from "./utils/errors.js";
import {
  Logger,
  generateCorrelationId,
  setLogLevel
} from "./utils/logger.js";
import { BatchOrchestrator } from "./orchestrator/batch.js";
import { createDiagramRenderer } from "./render/renderer.js";
import { formatReportSummary, writeReport } from "./corpus/report.js";

const logger = new Logger("cli");

async function main(): Promise<number> {
  let config: AppConfig;
  let options: CliOptions;
  try {
    config = loadConfig();
    options = parseCliOptions(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  setLogLevel(config.logLevel);

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const corpusRoot = resolve(options.root ?? config.corpusRoot);
  const reportPath = resolve(options.report ?? config.reportPath);
  const correlationId = generateCorrelationId();
  logger.setCorrelationId(correlationId);
  logger.info("Starting diagram generation", {
    corpusRoot,
    reportPath,
    groups: options.groups,
    limit: options.limit ?? null
  });

  const orchestrator = new BatchOrchestrator({
    corpusRoot,
    groupFilters: options.groups,
    limit: options.limit,
    casesSubpath: config.casesSubpath,
    documentFilename: config.documentFilename,
    renderer: createDiagramRenderer({ density: config.renderDensity }),
    correlationId
  });

  const report = await orchestrator.run();
  writeReport(report, reportPath);

  for (const record of report.details.failed) {
    console.log(`❌ ${record.caseDir}: ${record.error}`);
  }
  console.log(
    `\nReport written to ${reportPath}: ${formatReportSummary(report)}`
  );
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });

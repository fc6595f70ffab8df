/**
 * Command-line option parsing and validation.
 *
 * Uses Zod for validation, consistent with configuration loading.
 * Options are validated before the batch starts so the orchestrator
 * only ever sees well-formed input.
 */

import { parseArgs } from "util";
import { z } from "zod";
import { formatIssues } from "./config.js";
import { ConfigurationError } from "./errors.js";

export const USAGE = `Usage: case-diagrams [options]

Options:
  --root <dir>       Corpus root containing one directory per group
  --group <name>     Only process this group (repeatable, comma-separated)
  --limit <n>        Stop after generating n diagrams
  --report <file>    Where to write the JSON report
  -h, --help         Show this help`;

/**
 * Zod schema for validated command-line options.
 */
export const CliOptionsSchema = z.object({
  root: z.string().trim().min(1, "--root cannot be empty").optional(),
  groups: z
    .array(z.string())
    .transform((values) =>
      values
        .flatMap((value) => value.split(","))
        .map((value) => value.trim())
        .filter(Boolean)
    )
    .default([]),
  limit: z
    .string()
    .regex(/^\d+$/, "--limit must be a positive integer")
    .transform((value) => Number(value))
    .refine((value) => value > 0, {
      message: "--limit must be a positive integer"
    })
    .optional(),
  report: z.string().trim().min(1, "--report cannot be empty").optional(),
  help: z.boolean().default(false)
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parse and validate command-line arguments.
 *
 * @param argv - Arguments after the executable and script path
 * @throws ConfigurationError on unknown flags or invalid values
 */
export function parseCliOptions(argv: string[]): CliOptions {
  let values: {
    root?: string;
    group?: string[];
    limit?: string;
    report?: string;
    help?: boolean;
  };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        root: { type: "string" },
        group: { type: "string", multiple: true },
        limit: { type: "string" },
        report: { type: "string" },
        help: { type: "boolean", short: "h" }
      },
      strict: true,
      allowPositionals: false
    }));
  } catch (error) {
    throw new ConfigurationError(
      `Invalid arguments: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = CliOptionsSchema.safeParse({
    root: values.root,
    groups: values.group ?? [],
    limit: values.limit,
    report: values.report,
    help: values.help ?? false
  });
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid arguments: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}

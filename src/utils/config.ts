import { z } from "zod";
import { config as loadEnv } from "dotenv";
import { ConfigurationError } from "./errors.js";

// Load .env file
loadEnv();

/**
 * Zod schema for application configuration.
 */
const AppConfigSchema = z.object({
  corpusRoot: z.string().trim().min(1).default("books"),
  reportPath: z
    .string()
    .trim()
    .min(1)
    .default("ai_diagram_generation_report.json"),
  casesSubpath: z
    .string()
    .trim()
    .min(1)
    .default("code/examples")
    .refine((value) => !value.split(/[\\/]/).includes(".."), {
      message: "must stay inside the group directory"
    }),
  documentFilename: z
    .string()
    .trim()
    .min(1)
    .default("README.md")
    .refine((value) => !/[\\/]/.test(value), {
      message: "must be a bare file name"
    }),
  renderDensity: z.coerce.number().int().min(72).max(600).default(144),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Format zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join(", ");
}

/**
 * Load configuration from the environment.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError when a value fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    corpusRoot: env.CORPUS_ROOT || undefined,
    reportPath: env.REPORT_PATH || undefined,
    casesSubpath: env.CASES_SUBPATH || undefined,
    documentFilename: env.DOCUMENT_FILENAME || undefined,
    renderDensity: env.RENDER_DENSITY || undefined,
    logLevel: env.LOG_LEVEL?.toLowerCase() || undefined
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(result.error)}`
    );
  }

  return result.data;
}

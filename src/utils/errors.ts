/**
 * Error thrown for invalid configuration or command-line input.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when a diagram cannot be painted or written.
 */
export class RenderError extends Error {
  constructor(
    message: string,
    public readonly outputPath: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "RenderError";
  }
}

/**
 * Describe an error the way it appears in the batch report: `Name: message`.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  return String(error);
}

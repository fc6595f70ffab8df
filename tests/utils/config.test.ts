import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/utils/config.js";
import { ConfigurationError } from "../../src/utils/errors.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      corpusRoot: "books",
      reportPath: "ai_diagram_generation_report.json",
      casesSubpath: "code/examples",
      documentFilename: "README.md",
      renderDensity: 144,
      logLevel: "info"
    });
  });

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      CORPUS_ROOT: "corpus",
      REPORT_PATH: "out/report.json",
      CASES_SUBPATH: "examples",
      DOCUMENT_FILENAME: "index.md",
      RENDER_DENSITY: "300",
      LOG_LEVEL: "DEBUG"
    });

    expect(config).toEqual({
      corpusRoot: "corpus",
      reportPath: "out/report.json",
      casesSubpath: "examples",
      documentFilename: "index.md",
      renderDensity: 300,
      logLevel: "debug"
    });
  });

  it("should treat empty variables as unset", () => {
    expect(loadConfig({ CORPUS_ROOT: "" }).corpusRoot).toBe("books");
  });

  it("should reject a density outside the supported range", () => {
    expect(() => loadConfig({ RENDER_DENSITY: "10" })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfig({ RENDER_DENSITY: "10" })).toThrow(
      /^Invalid configuration: renderDensity: /
    );
  });

  it("should reject a document filename containing a path", () => {
    expect(() => loadConfig({ DOCUMENT_FILENAME: "docs/README.md" })).toThrow(
      "documentFilename: must be a bare file name"
    );
  });

  it("should reject a cases subpath that leaves the group directory", () => {
    expect(() => loadConfig({ CASES_SUBPATH: "../elsewhere" })).toThrow(
      "casesSubpath: must stay inside the group directory"
    );
  });

  it("should reject an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/logLevel/);
  });
});

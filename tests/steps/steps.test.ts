import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import {
  createRenderStep,
  diagramFilenameFor,
  extractStep,
  injectStep,
  readinessStep
} from "../../src/steps/index.js";
import type { CaseRef } from "../../src/corpus/discovery.js";
import { DRONE_DOCUMENT, TempCorpus } from "../helpers/corpus.js";
import {
  createFailingRenderer,
  createRecordingRenderer,
  createTestCaseRef,
  createTestSnippet,
  createTestState
} from "../helpers/test-factories.js";

describe("steps", () => {
  let corpus: TempCorpus;
  let caseRef: CaseRef;

  beforeEach(() => {
    corpus = new TempCorpus();
    caseRef = {
      group: "control-theory",
      caseName: "drone_hover",
      caseDir: corpus.caseDir("control-theory", "drone_hover"),
      documentPath: corpus.documentPath("control-theory", "drone_hover")
    };
  });

  afterEach(() => {
    corpus.cleanup();
  });

  describe("readinessStep", () => {
    it("should read the document and classify it", async () => {
      corpus.addCase("control-theory", "drone_hover", DRONE_DOCUMENT);

      const result = await readinessStep(createTestState({ caseRef }));

      expect(result).toEqual({
        content: DRONE_DOCUMENT,
        readiness: { needsDiagram: true, outcome: "needs-diagram" },
        currentStep: "readiness"
      });
    });

    it("should classify a document that cannot be read as unreadable", async () => {
      corpus.addFile(
        "control-theory/code/examples/drone_hover/README.md/inner.txt",
        "x"
      );

      const result = await readinessStep(createTestState({ caseRef }));

      expect(result.content).toBeNull();
      expect(result.readiness).toMatchObject({
        needsDiagram: false,
        outcome: "unreadable"
      });
      expect(result.readiness).toHaveProperty(
        "error",
        expect.stringMatching(/^EISDIR/)
      );
    });

    it("should throw without a case reference", async () => {
      await expect(readinessStep(createTestState())).rejects.toThrow(
        "Readiness step requires a case reference"
      );
    });
  });

  describe("extractStep", () => {
    it("should build a snippet from the document text", async () => {
      const result = await extractStep(
        createTestState({ caseRef: createTestCaseRef(), content: DRONE_DOCUMENT })
      );

      expect(result.snippet?.sections).toEqual(createTestSnippet().sections);
      expect(result.currentStep).toBe("extract");
    });
  });

  describe("render step", () => {
    it("should name the diagram after the case", () => {
      expect(diagramFilenameFor("drone_hover")).toBe(
        "drone_hover_ai_diagram.png"
      );
    });

    it("should render beside the document", async () => {
      const renderer = createRecordingRenderer();
      const snippet = createTestSnippet();

      const result = await createRenderStep(renderer)(
        createTestState({ caseRef, snippet })
      );

      const diagramPath = join(caseRef.caseDir, "drone_hover_ai_diagram.png");
      expect(result).toEqual({
        diagramFilename: "drone_hover_ai_diagram.png",
        diagramPath,
        currentStep: "render"
      });
      expect(renderer.render).toHaveBeenCalledWith(snippet, diagramPath);
    });

    it("should propagate renderer failures", async () => {
      const step = createRenderStep(createFailingRenderer());

      await expect(
        step(createTestState({ caseRef, snippet: createTestSnippet() }))
      ).rejects.toThrow("canvas exploded");
    });
  });

  describe("injectStep", () => {
    it("should report whether the document changed", async () => {
      corpus.addCase("control-theory", "drone_hover", DRONE_DOCUMENT);
      const state = createTestState({
        caseRef,
        snippet: createTestSnippet(),
        diagramFilename: "drone_hover_ai_diagram.png"
      });

      expect((await injectStep(state)).documentUpdated).toBe(true);
      const injected = readFileSync(caseRef.documentPath, "utf-8");
      expect((await injectStep(state)).documentUpdated).toBe(false);
      expect(readFileSync(caseRef.documentPath, "utf-8")).toBe(injected);
    });

    it("should throw without a diagram", async () => {
      await expect(
        injectStep(createTestState({ caseRef, snippet: createTestSnippet() }))
      ).rejects.toThrow(
        "Inject step requires a case reference, a snippet and a diagram"
      );
    });
  });
});

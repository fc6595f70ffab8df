import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  Logger,
  createLoggerWithCorrelationId,
  createLoggerWithTransport,
  generateCorrelationId,
  resolveLogLevel,
  setLogLevel,
  type LogEntry,
  type LogTransport
} from "../../src/utils/logger.js";

describe("logger", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    process.env.LOG_LEVEL = "debug";
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    setLogLevel(undefined);
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  const firstLine = (): unknown[] => consoleLogSpy.mock.calls[0];

  describe("generateCorrelationId", () => {
    const UUID_REGEX =
      /^[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}$/;

    it("should generate unique UUIDs", () => {
      const id1 = generateCorrelationId();
      const id2 = generateCorrelationId();

      expect(id1).toMatch(UUID_REGEX);
      expect(id2).toMatch(UUID_REGEX);
      expect(id1).not.toBe(id2);
    });
  });

  describe("resolveLogLevel", () => {
    it("should accept known levels case-insensitively", () => {
      expect(resolveLogLevel("ERROR")).toBe("error");
    });

    it("should fall back to info", () => {
      expect(resolveLogLevel("verbose")).toBe("info");
      expect(resolveLogLevel(undefined)).toBe("info");
    });
  });

  describe("ConsoleTransport", () => {
    it("should include context and correlation ID in the prefix", () => {
      const logger = new Logger("orchestrator", "run-123");

      logger.info("Batch started");

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(String(firstLine()[0])).toContain(
        "[INFO] [orchestrator] [correlation_id:run-123]"
      );
      expect(firstLine()[1]).toBe("Batch started");
    });

    it("should serialise structured data on the same line", () => {
      const logger = new Logger("orchestrator", "run-456");

      logger.info("Batch finished", { generated: 2 });

      expect(JSON.parse(String(firstLine()[2]))).toEqual({
        generated: 2,
        correlation_id: "run-456"
      });
    });

    it("should send warnings and errors to stderr", () => {
      const logger = new Logger("discovery");

      logger.warn("Corpus root does not exist");
      logger.error("Step failed");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
    });

    it("should omit the correlation part without an ID", () => {
      new Logger("cli").info("Starting");

      expect(String(firstLine()[0])).not.toContain("correlation_id");
      expect(firstLine()).toHaveLength(2);
    });
  });

  describe("levels", () => {
    it("should drop entries below LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "warn";
      const logger = new Logger("routers");

      logger.debug("hidden");
      logger.info("hidden");
      logger.warn("shown");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it("should read the level when logging, not when constructed", () => {
      const logger = new Logger("routers");
      process.env.LOG_LEVEL = "error";

      logger.info("hidden");

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it("should let a pinned level win over LOG_LEVEL", () => {
      setLogLevel("error");
      const logger = new Logger("report");

      logger.warn("hidden");
      logger.error("shown");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("child", () => {
    it("should extend the context and keep the correlation ID", () => {
      const logger = new Logger("orchestrator", "run-789").child("case");

      logger.info("Processing");

      expect(String(firstLine()[0])).toContain(
        "[orchestrator:case] [correlation_id:run-789]"
      );
    });

    it("should share the parent's transport", () => {
      const entries: LogEntry[] = [];
      const transport: LogTransport = { write: (entry) => entries.push(entry) };

      new Logger("orchestrator", undefined, transport).child("case").debug("x");

      expect(entries).toMatchObject([
        { level: "debug", context: "orchestrator:case", message: "x" }
      ]);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe("createLoggerWithCorrelationId", () => {
    it("should accept a null correlation ID", () => {
      createLoggerWithCorrelationId("render-step", null).info("Diagram rendered");

      expect(String(firstLine()[0])).not.toContain("correlation_id");
    });
  });

  describe("createLoggerWithTransport", () => {
    it("should hand entries with the run ID to the transport", () => {
      const entries: LogEntry[] = [];
      const logger = createLoggerWithTransport("report", "run-1", {
        write: (entry) => entries.push(entry)
      });

      logger.info("Report written", { reportPath: "out.json" });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: "info",
        context: "report",
        message: "Report written",
        correlationId: "run-1",
        data: { reportPath: "out.json", correlation_id: "run-1" }
      });
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it("should accept a null correlation ID", () => {
      const entries: LogEntry[] = [];
      createLoggerWithTransport("report", null, {
        write: (entry) => entries.push(entry)
      }).warn("Slow write");

      expect(entries[0].correlationId).toBeUndefined();
      expect(entries[0].data).toBeUndefined();
    });
  });
});

import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * One structured log record, as handed to a transport.
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  /** Logger context, e.g. "orchestrator" or "orchestrator:case" */
  context: string;
  message: string;
  data?: Record<string, unknown>;
  /** Batch run the entry belongs to */
  correlationId?: string;
}

/**
 * Destination for log entries.
 */
export interface LogTransport {
  write(entry: LogEntry): void;
}

/**
 * Writes one line per entry; warnings and errors go to stderr.
 */
export class ConsoleTransport implements LogTransport {
  write(entry: LogEntry): void {
    const run = entry.correlationId
      ? ` [correlation_id:${entry.correlationId}]`
      : "";
    const prefix = `[${entry.timestamp.toISOString()}] [${entry.level.toUpperCase()}] [${entry.context}]${run}`;
    const sink =
      entry.level === "warn" || entry.level === "error"
        ? console.error
        : console.log;

    if (entry.data && Object.keys(entry.data).length > 0) {
      sink(prefix, entry.message, JSON.stringify(entry.data));
    } else {
      sink(prefix, entry.message);
    }
  }
}

const consoleTransport = new ConsoleTransport();

let levelOverride: LogLevel | undefined;

/**
 * Pin the minimum level for every logger, or pass undefined to
 * go back to reading LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

/**
 * Resolve a level name, falling back to "info".
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const candidate = (raw ?? "info").toLowerCase();
  return isLogLevel(candidate) ? candidate : "info";
}

function activeLevel(): LogLevel {
  return levelOverride ?? resolveLogLevel(process.env.LOG_LEVEL);
}

/**
 * Generate a correlation ID for one batch run.
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

export class Logger {
  private readonly context: string;
  private readonly transport: LogTransport;
  private correlationId?: string;

  constructor(
    context: string,
    correlationId?: string,
    transport: LogTransport = consoleTransport
  ) {
    this.context = context;
    this.correlationId = correlationId;
    this.transport = transport;
  }

  /**
   * Attach the run ID once it is known.
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  /**
   * Logger for a sub-context sharing this logger's transport and run ID.
   */
  child(context: string): Logger {
    return new Logger(
      `${this.context}:${context}`,
      this.correlationId,
      this.transport
    );
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit("error", message, data);
  }

  private emit(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[activeLevel()]) {
      return;
    }

    this.transport.write({
      timestamp: new Date(),
      level,
      context: this.context,
      message,
      data: this.correlationId
        ? { ...data, correlation_id: this.correlationId }
        : data,
      correlationId: this.correlationId
    });
  }
}

/**
 * Logger bound to the run ID carried in graph state.
 */
export function createLoggerWithCorrelationId(
  context: string,
  correlationId?: string | null
): Logger {
  return new Logger(context, correlationId ?? undefined);
}

/**
 * Logger writing to `transport` instead of the console.
 */
export function createLoggerWithTransport(
  context: string,
  correlationId: string | null,
  transport: LogTransport
): Logger {
  return new Logger(context, correlationId ?? undefined, transport);
}

/**
 * OneDrive Logging
 *
 * Structured logging for session and transfer operations.
 */

/**
 * Log level.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * Log context fields.
 */
export interface LogContext {
  /** Public operation being executed */
  operation?: string;
  /** Local path or remote name of the item being transferred */
  item?: string;
  /** 1-based attempt counter */
  attempt?: number;
  /** 1-based batch counter */
  batch?: number;
  /** HTTP status code */
  status?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code */
  errorCode?: string;
  /** Additional fields */
  [key: string]: unknown;
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;

  /**
   * Create child logger with additional context.
   */
  child(context: LogContext): Logger;
}

/**
 * No-op logger implementation.
 */
export const noOpLogger: Logger = {
  trace(): void {},
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
  child(): Logger {
    return noOpLogger;
  },
};

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 *
 * Children share the parent's entry list so a test can inspect everything
 * logged below the logger it handed to the client.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly baseContext: LogContext;

  constructor(baseContext: LogContext = {}, entries: LogEntry[] = []) {
    this.baseContext = baseContext;
    this.entries = entries;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({
      level,
      message,
      context: { ...this.baseContext, ...context },
      timestamp: new Date(),
    });
  }

  trace(message: string, context?: LogContext): void {
    this.log("trace", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((l) => l.level === level);
  }

  getMessages(level?: LogLevel): string[] {
    return this.entries
      .filter((l) => level === undefined || l.level === level)
      .map((l) => l.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

type ConsoleMethod = "debug" | "info" | "warn" | "error";

const CONSOLE_METHOD: Record<LogLevel, ConsoleMethod> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

/**
 * Prints one line per entry: `[LEVEL] message {"context":"as JSON"}`.
 *
 * This is the sink that makes the per-file transfer lines visible.
 */
export class ConsoleLogger implements Logger {
  private readonly baseContext: LogContext;
  private readonly minLevel: LogLevel;

  constructor(options?: { minLevel?: LogLevel; context?: LogContext }) {
    this.minLevel = options?.minLevel ?? "info";
    this.baseContext = options?.context ?? {};
  }

  trace(message: string, context?: LogContext): void {
    this.write("trace", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      context: { ...this.baseContext, ...context },
    });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const fields = Object.entries({ ...this.baseContext, ...context }).filter(
      ([, value]) => value !== undefined
    );
    const suffix = fields.length > 0 ? ` ${JSON.stringify(Object.fromEntries(fields))}` : "";
    console[CONSOLE_METHOD[level]](`[${level.toUpperCase()}] ${message}${suffix}`);
  }
}

export function createInMemoryLogger(context?: LogContext): InMemoryLogger {
  return new InMemoryLogger(context);
}

export function createConsoleLogger(options?: {
  minLevel?: LogLevel;
  context?: LogContext;
}): ConsoleLogger {
  return new ConsoleLogger(options);
}

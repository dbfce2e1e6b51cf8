// Structured logging service with multiple levels and secret redaction
// Provides consistent JSON log lines across the reader's components

import { appendFileSync } from "node:fs";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  // Threshold only: nothing is logged at this level
  FATAL = 4,
}

export interface LogContext {
  component?: string;
  queryId?: number;
  server?: string;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  service: string;
  message: string;
  component?: string;
  queryId?: number;
  server?: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  service: string;
  enableConsole: boolean;
  filePath?: string;
  redactSensitive: boolean;
}

/**
 * Common surface of the root logger and its context-bound children.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  child(context: LogContext): Logger;
}

export class StructuredLogger implements Logger {
  private config: LoggerConfig;
  private sensitiveFields = new Set([
    "password",
    "passwd",
    "secret",
    "token",
    "credential",
    "authorization",
  ]);

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  debug(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.DEBUG) {
      this.log(LogLevel.DEBUG, message, data, context);
    }
  }

  info(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.INFO) {
      this.log(LogLevel.INFO, message, data, context);
    }
  }

  warn(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.WARN) {
      this.log(LogLevel.WARN, message, data, context);
    }
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.ERROR) {
      this.log(LogLevel.ERROR, message, data, context, describeError(error));
    }
  }

  /**
   * Build the entry that would be written; exposed so formatting can be checked without I/O.
   */
  format(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    context?: LogContext,
    error?: LogEntry["error"],
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      service: this.config.service,
      message,
      ...(context?.component ? { component: context.component } : {}),
      ...(context?.queryId !== undefined ? { queryId: context.queryId } : {}),
      ...(context?.server ? { server: context.server } : {}),
    };

    if (data) {
      entry.data = this.config.redactSensitive ? this.redactSensitiveData(data) : data;
    }

    if (error) {
      entry.error = error;
    }

    return entry;
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    context?: LogContext,
    error?: LogEntry["error"],
  ): void {
    const entry = this.format(level, message, data, context, error);

    if (this.config.enableConsole) {
      this.logToConsole(level, entry);
    }

    if (this.config.filePath) {
      this.logToFile(this.config.filePath, entry);
    }
  }

  private logToConsole(level: LogLevel, entry: LogEntry): void {
    const formatted = JSON.stringify(entry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.ERROR:
        console.error(formatted);
        break;
    }
  }

  private logToFile(filePath: string, entry: LogEntry): void {
    try {
      appendFileSync(filePath, JSON.stringify(entry) + "\n");
    } catch (error) {
      // Fallback to console if file logging fails
      console.error("Failed to write to log file:", error);
      console.error("Original log entry:", JSON.stringify(entry));
    }
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redactRecursive = (obj: Record<string, unknown>): Record<string, unknown> => {
      const result: Record<string, unknown> = {};

      for (const [key, value] of Object.entries(obj)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = Array.from(this.sensitiveFields).some((field) => lowerKey.includes(field));

        if (isSensitive) {
          result[key] = "[REDACTED]";
        } else if (isPlainRecord(value)) {
          result[key] = redactRecursive(value);
        } else {
          result[key] = value;
        }
      }

      return result;
    };

    return redactRecursive(data);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): ContextLogger {
    return new ContextLogger(this, context);
  }

  addSensitiveFields(...fields: string[]): void {
    fields.forEach((field) => this.sensitiveFields.add(field.toLowerCase()));
  }
}

/**
 * Logger bound to a component (and optionally a query) of one reader session
 */
export class ContextLogger implements Logger {
  constructor(
    private parent: StructuredLogger,
    private context: LogContext,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.parent.debug(message, data, this.context);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.parent.info(message, data, this.context);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.parent.warn(message, data, this.context);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.parent.error(message, error, data, this.context);
  }

  child(context: LogContext): ContextLogger {
    return new ContextLogger(this.parent, { ...this.context, ...context });
  }
}

function describeError(error: unknown): LogEntry["error"] {
  if (!(error instanceof Error)) return undefined;
  return {
    name: error.name,
    message: error.message,
    ...(error.stack ? { stack: error.stack } : {}),
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !ArrayBuffer.isView(value);
}

/**
 * Create a logger instance with environment-based configuration
 */
export function createLogger(
  service: string,
  env: Record<string, string | undefined> = process.env,
): StructuredLogger {
  const level = parseLogLevel(env.LDAPREADER_LOG_LEVEL || "INFO");
  const verbose = env.LDAPREADER_VERBOSE === "true";
  const filePath = env.LDAPREADER_LOG_FILE;

  return new StructuredLogger({
    level: verbose ? LogLevel.DEBUG : level,
    service,
    enableConsole: true,
    ...(filePath ? { filePath } : {}),
    redactSensitive: env.LDAPREADER_LOG_REDACT_SENSITIVE !== "false",
  });
}

export function parseLogLevel(levelStr: string): LogLevel {
  switch (levelStr.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "FATAL":
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

export default StructuredLogger;

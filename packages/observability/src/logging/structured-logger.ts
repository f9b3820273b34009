import { activePolicies } from "@policy-report/core";
import { serializeError } from "../errors/serialize";
import type { LogEntry, LogLevel, LogSink, LoggingOptions } from "./interfaces";

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const consoleSink: LogSink = (payload) => {
  console.log(payload);
};

/**
 * JSON-line logger. Entries written while a report is active carry the
 * policies recorded so far, so a log line can be traced back to the check
 * that produced it.
 */
export class StructuredLogger {
  constructor(
    private readonly options: LoggingOptions,
    private readonly sink: LogSink = consoleSink,
  ) {}

  debug(message: string, context?: Record<string, unknown>) {
    this.emit("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>) {
    this.emit("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.emit("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>) {
    this.emit("error", message, context);
  }

  async profile<T>(
    label: string,
    fn: () => Promise<T> | T,
    context?: Record<string, unknown>,
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      this.emit("debug", `${label} completed`, context, {
        label,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      this.emit(
        "error",
        `${label} failed`,
        { ...context, error },
        { label, durationMs: Date.now() - startedAt },
      );
      throw error;
    }
  }

  private emit(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    profiler?: LogEntry["profiler"],
  ) {
    if (!this.shouldLog(level)) {
      return;
    }
    const policies = activePolicies();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.options.serviceName,
      policies: policies ? [...policies] : undefined,
      context: context ? normalizeContext(context) : undefined,
      profiler,
    };
    this.sink(JSON.stringify(entry), entry);
  }

  private shouldLog(level: LogLevel): boolean {
    const configured = this.options.logLevel ?? "info";
    return severity[level] >= severity[configured];
  }
}

const normalizeContext = (context: Record<string, unknown>) =>
  Object.fromEntries(
    Object.entries(context).map(([key, value]) => [
      key,
      value instanceof Error ? serializeError(value) : value,
    ]),
  );

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggingOptions {
  serviceName: string;
  logLevel?: LogLevel;
}

export type LogSink = (payload: string, entry: LogEntry) => void;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  policies?: string[];
  context?: Record<string, unknown>;
  profiler?: {
    label: string;
    durationMs: number;
  };
}

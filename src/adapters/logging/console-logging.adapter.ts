// =============================================================================
// ConsoleLoggingAdapter — LoggingPort backed by the console
// =============================================================================

import type {
  LogEntry,
  LogLevel,
  LogThreshold,
  LoggingPort,
} from "../../ports/logging.port.js";
import { LOG_LEVEL_ORDER } from "../../ports/logging.port.js";

export interface ConsoleLoggingOptions {
  /** Entries below this level are dropped (default: "warn") */
  level?: LogThreshold;
  /** Custom sink (defaults to console[level]) */
  sink?: (entry: LogEntry) => void;
}

function writeToConsole(entry: LogEntry): void {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
  // eslint-disable-next-line no-console
  console[entry.level](`${prefix} ${entry.event}`, entry.data ?? "");
}

export class ConsoleLoggingAdapter implements LoggingPort {
  private readonly threshold: number;
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: ConsoleLoggingOptions = {}) {
    this.threshold = LOG_LEVEL_ORDER[options.level ?? "warn"];
    this.sink = options.sink ?? writeToConsole;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.emit("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.emit("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.emit("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.emit("error", event, data);
  }

  private emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.threshold) return;
    this.sink({ timestamp: Date.now(), level, event, data });
  }
}

let defaultLogger: LoggingPort | undefined;

/** Shared console logger used when a primitive is built without one. */
export function getDefaultLogger(): LoggingPort {
  defaultLogger ??= new ConsoleLoggingAdapter();
  return defaultLogger;
}

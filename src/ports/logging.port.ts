// =============================================================================
// LoggingPort — Structured runtime event logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Minimum level accepted by adapters; "silent" drops everything. */
export type LogThreshold = LogLevel | "silent";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  /** `component:action`, e.g. `scheduler:spawn` */
  event: string;
  data?: Record<string, unknown>;
}

export interface LoggingPort {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

export const LOG_LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Serialize an unknown thrown value for a log entry's data bag. */
export function describeError(error: unknown): Record<string, unknown> | string {
  return error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : String(error);
}

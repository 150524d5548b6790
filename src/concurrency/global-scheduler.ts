// =============================================================================
// Global scheduler — Lazily built process-wide instance
// =============================================================================

import { ConsoleLoggingAdapter } from "../adapters/logging/console-logging.adapter.js";
import { loadRuntimeConfig } from "../config/runtime-config.js";
import { Scheduler } from "./scheduler.js";

let globalScheduler: Scheduler | null = null;

/**
 * Process-wide scheduler built from `SPINDLE_*` environment variables on first
 * use. Prefer constructing and passing a {@link Scheduler} explicitly; this
 * accessor is a convenience for scripts.
 */
export function getGlobalScheduler(): Scheduler {
  if (!globalScheduler || globalScheduler.isShutdown) {
    const config = loadRuntimeConfig();
    globalScheduler = new Scheduler(config.scheduler, {
      logger: new ConsoleLoggingAdapter({ level: config.logLevel }),
    });
  }
  return globalScheduler;
}

/** Shut down and forget the global scheduler, if one was built. */
export async function resetGlobalScheduler(): Promise<void> {
  const current = globalScheduler;
  globalScheduler = null;
  await current?.shutdown();
}

// =============================================================================
// Runtime config — Environment-driven defaults for the global scheduler
// =============================================================================

import type { z } from "zod";
import { ConfigError } from "../errors.js";
import { RuntimeConfigSchema } from "../domain/runtime.schema.js";
import type { RuntimeConfig } from "../domain/runtime.schema.js";

export const ENV_KEYS = {
  workers: "SPINDLE_WORKERS",
  queuePolicy: "SPINDLE_QUEUE_POLICY",
  logLevel: "SPINDLE_LOG_LEVEL",
} as const;

type Env = Record<string, string | undefined>;

function parseWorkers(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "" || raw === "auto") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`expected a positive integer or "auto", got "${raw}"`, ENV_KEYS.workers);
  }
  return n;
}

/**
 * Parse and validate any config shape with a schema, turning zod issues into
 * a single {@link ConfigError} naming the first offending field.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
  throw new ConfigError(issue?.message ?? "invalid configuration", field);
}

/** Build the runtime config from environment variables. */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const scheduler: Record<string, unknown> = {};
  const workerCount = parseWorkers(env[ENV_KEYS.workers]);
  if (workerCount !== undefined) scheduler.workerCount = workerCount;
  const queuePolicy = env[ENV_KEYS.queuePolicy];
  if (queuePolicy) scheduler.queuePolicy = queuePolicy;

  return parseConfig(RuntimeConfigSchema, {
    scheduler,
    logLevel: env[ENV_KEYS.logLevel] || undefined,
  });
}

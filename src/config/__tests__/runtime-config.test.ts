import { describe, it, expect } from "vitest";
import { availableParallelism } from "node:os";
import { loadRuntimeConfig, parseConfig } from "../runtime-config.js";
import { ChannelConfigSchema } from "../../domain/runtime.schema.js";
import { ConfigError } from "../../errors.js";

describe("loadRuntimeConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadRuntimeConfig({})).toEqual({
      scheduler: { workerCount: availableParallelism(), queuePolicy: "fifo" },
      logLevel: "warn",
    });
  });

  it("reads every SPINDLE_ variable", () => {
    expect(
      loadRuntimeConfig({
        SPINDLE_WORKERS: "3",
        SPINDLE_QUEUE_POLICY: "priority",
        SPINDLE_LOG_LEVEL: "debug",
      }),
    ).toEqual({
      scheduler: { workerCount: 3, queuePolicy: "priority" },
      logLevel: "debug",
    });
  });

  it("treats auto and empty values as unset", () => {
    const config = loadRuntimeConfig({ SPINDLE_WORKERS: "auto", SPINDLE_LOG_LEVEL: "" });
    expect(config.scheduler.workerCount).toBe(availableParallelism());
    expect(config.logLevel).toBe("warn");
  });

  it("names the variable when the worker count is not a number", () => {
    expect(() => loadRuntimeConfig({ SPINDLE_WORKERS: "many" })).toThrow(
      'Invalid "SPINDLE_WORKERS": expected a positive integer or "auto", got "many"',
    );
  });

  it("names the config path when a value fails validation", () => {
    try {
      loadRuntimeConfig({ SPINDLE_WORKERS: "0" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: "CONFIG_ERROR", field: "scheduler.workerCount" });
    }
  });

  it("rejects an unknown queue policy", () => {
    expect(() => loadRuntimeConfig({ SPINDLE_QUEUE_POLICY: "random" })).toThrow(ConfigError);
  });
});

describe("parseConfig", () => {
  it("applies schema defaults", () => {
    expect(parseConfig(ChannelConfigSchema, {})).toEqual({ capacity: 100 });
  });

  it("turns the first issue into a ConfigError", () => {
    expect(() => parseConfig(ChannelConfigSchema, { capacity: "ten" })).toThrow(/^Invalid "capacity": /);
  });
});

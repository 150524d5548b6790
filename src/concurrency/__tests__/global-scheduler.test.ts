import { afterEach, describe, it, expect, vi } from "vitest";
import { getGlobalScheduler, resetGlobalScheduler } from "../global-scheduler.js";

describe("global scheduler", () => {
  afterEach(async () => {
    await resetGlobalScheduler();
    vi.unstubAllEnvs();
  });

  it("builds one shared scheduler from the environment", () => {
    vi.stubEnv("SPINDLE_WORKERS", "2");
    vi.stubEnv("SPINDLE_LOG_LEVEL", "silent");

    const scheduler = getGlobalScheduler();

    expect(getGlobalScheduler()).toBe(scheduler);
    expect(scheduler.getStats().workerCount).toBe(2);
  });

  it("builds a fresh scheduler after a reset", async () => {
    vi.stubEnv("SPINDLE_WORKERS", "1");
    vi.stubEnv("SPINDLE_LOG_LEVEL", "silent");

    const first = getGlobalScheduler();
    await resetGlobalScheduler();

    expect(first.isShutdown).toBe(true);
    expect(getGlobalScheduler()).not.toBe(first);
  });

  it("runs work spawned through it", async () => {
    vi.stubEnv("SPINDLE_WORKERS", "1");
    vi.stubEnv("SPINDLE_LOG_LEVEL", "silent");

    const scheduler = getGlobalScheduler();
    const task = scheduler.spawn(function* () {
      return "global";
    });
    await scheduler.awaitAll();

    expect(await task.join()).toEqual({ status: "completed", value: "global" });
  });

  it("tolerates a reset when nothing was built", async () => {
    await expect(resetGlobalScheduler()).resolves.toBeUndefined();
  });
});

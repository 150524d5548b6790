import { describe, it, expect } from "vitest";
import { Task } from "../task.js";
import { Channel } from "../channel.js";
import { TaskFailureError, TaskStateError } from "../../errors.js";
import { createRecordingLogger, delay, silentLogger } from "../../__tests__/helpers/test-utils.js";

describe("Task", () => {
  it("runs to the first suspension, then to completion", async () => {
    const steps: string[] = [];
    const task = new Task(
      function* (ctx) {
        steps.push("before");
        yield* ctx.yieldNow();
        steps.push("after");
        return 7;
      },
      { name: "two-step", logger: silentLogger },
    );

    expect(task.state).toBe("created");
    expect(await task.resume()).toEqual({ kind: "yield" });
    expect(task.state).toBe("suspended");
    expect(steps).toEqual(["before"]);

    expect(await task.resume()).toBeUndefined();
    expect(task.state).toBe("completed");
    expect(task.isDone()).toBe(true);
    expect(await task.join()).toEqual({ status: "completed", value: 7 });
  });

  it("accepts async generator bodies", async () => {
    const task = new Task(
      async function* (ctx) {
        await delay(1);
        yield* ctx.yieldNow();
        return "done";
      },
      { logger: silentLogger },
    );

    await task.resume();
    await task.resume();
    expect(await task.join()).toEqual({ status: "completed", value: "done" });
  });

  it("names itself after its id by default", () => {
    const task = new Task(function* () {}, { logger: silentLogger });
    expect(task.id).toMatch(/^task-\d+$/);
    expect(task.name).toBe(task.id);
  });

  it("suspends with a wake-up time when sleeping", async () => {
    const task = new Task(
      function* (ctx) {
        yield* ctx.sleep(50);
      },
      { logger: silentLogger },
    );

    const before = Date.now();
    const suspension = await task.resume();
    expect(suspension?.kind).toBe("sleep");
    if (suspension?.kind === "sleep") {
      expect(suspension.wakeAt).toBeGreaterThanOrEqual(before + 50);
    }
  });

  it("hands the settled value of a wait back to the body", async () => {
    const task = new Task(
      function* (ctx) {
        const n = yield* ctx.wait(Promise.resolve(20));
        return n + 1;
      },
      { logger: silentLogger },
    );

    const suspension = await task.resume();
    if (suspension?.kind !== "wait") throw new Error("expected a wait");
    await suspension.settled;
    await task.resume();

    expect(await task.join()).toEqual({ status: "completed", value: 21 });
  });

  it("rethrows a rejected wait inside the body", async () => {
    const task = new Task(
      function* (ctx) {
        try {
          yield* ctx.wait(Promise.reject(new Error("nope")));
          return "unreachable";
        } catch (error) {
          return error instanceof Error ? error.message : "?";
        }
      },
      { logger: silentLogger },
    );

    const suspension = await task.resume();
    if (suspension?.kind !== "wait") throw new Error("expected a wait");
    await suspension.settled;
    await task.resume();

    expect(await task.join()).toEqual({ status: "completed", value: "nope" });
  });

  it("sends and receives through channels", async () => {
    const channel = new Channel<number>(1, { logger: silentLogger });
    const task = new Task(
      function* (ctx) {
        yield* ctx.send(channel, 5);
        const result = yield* ctx.receive(channel);
        return result.done ? -1 : result.value * 2;
      },
      { logger: silentLogger },
    );

    let suspension = await task.resume();
    while (suspension) {
      if (suspension.kind === "wait") await suspension.settled;
      suspension = await task.resume();
    }

    expect(await task.join()).toEqual({ status: "completed", value: 10 });
  });

  describe("failure", () => {
    it("records a thrown error instead of propagating it", async () => {
      const logger = createRecordingLogger();
      const task = new Task(
        function* () {
          throw new Error("exploded");
        },
        { name: "bomb", logger },
      );

      expect(await task.resume()).toBeUndefined();
      expect(task.state).toBe("failed");
      expect(task.failure).toBeInstanceOf(TaskFailureError);
      expect(task.failure?.message).toBe('Task "bomb" failed: exploded');
      expect(task.failure?.cause).toBeInstanceOf(Error);
      expect(logger.events("error")).toEqual(["task:failed"]);

      const outcome = await task.join();
      expect(outcome.status).toBe("failed");
    });

    it("wraps non-Error throws", async () => {
      const task = new Task(
        function* () {
          throw "plain string";
        },
        { logger: silentLogger },
      );

      await task.resume();
      expect(task.failure?.message).toContain("plain string");
    });
  });

  describe("resume", () => {
    it("refuses to resume a finished task", async () => {
      const task = new Task(function* () {}, { name: "once", logger: silentLogger });
      await task.resume();

      await expect(task.resume()).rejects.toThrow(TaskStateError);
      await expect(task.resume()).rejects.toThrow('Task "once" is already done');
    });

    it("refuses to resume a task that is mid-step", async () => {
      const task = new Task(
        async function* (ctx) {
          await delay(10);
          yield* ctx.yieldNow();
        },
        { name: "busy", logger: silentLogger },
      );

      const first = task.resume();
      await expect(task.resume()).rejects.toThrow('Task "busy" is already running');
      await first;
    });
  });

  describe("destroy", () => {
    it("runs finally blocks and resolves join as dropped", async () => {
      const cleaned: string[] = [];
      const task = new Task(
        function* (ctx) {
          try {
            yield* ctx.yieldNow();
            yield* ctx.yieldNow();
          } finally {
            cleaned.push("released");
          }
        },
        { logger: silentLogger },
      );

      await task.resume();
      await task.destroy();

      expect(cleaned).toEqual(["released"]);
      expect(task.isDone()).toBe(true);
      expect(await task.join()).toEqual({ status: "dropped" });
    });

    it("aborts the task signal", async () => {
      const seen: { signal?: AbortSignal } = {};
      const task = new Task(
        function* (ctx) {
          seen.signal = ctx.signal;
          yield* ctx.yieldNow();
        },
        { logger: silentLogger },
      );

      await task.resume();
      await task.destroy();
      expect(task.destroyed).toBe(true);
      expect(seen.signal?.aborted).toBe(true);
      expect(seen.signal?.reason).toBeInstanceOf(TaskStateError);
    });

    it("withdraws a pending channel receive", async () => {
      const channel = new Channel<number>(1, { logger: silentLogger });
      const task = new Task(
        function* (ctx) {
          yield* ctx.receive(channel);
        },
        { logger: silentLogger },
      );

      await task.resume();
      await task.destroy();

      // A value sent afterwards stays in the buffer
      expect(channel.trySend(3)).toBe(true);
      expect(channel.size()).toBe(1);
    });

    it("keeps unwinding while a finally block suspends", async () => {
      const cleaned: string[] = [];
      const task = new Task(
        function* (ctx) {
          try {
            yield* ctx.yieldNow();
          } finally {
            yield* ctx.yieldNow();
            cleaned.push("after-suspend");
          }
        },
        { logger: silentLogger },
      );

      await task.resume();
      await task.destroy();
      expect(cleaned).toEqual(["after-suspend"]);
    });

    it("waits on a promise settled inside a finally block", async () => {
      const logger = createRecordingLogger();
      const cleaned: string[] = [];
      const task = new Task(
        function* (ctx) {
          try {
            yield* ctx.yieldNow();
          } finally {
            yield* ctx.wait(delay(5));
            cleaned.push("after-wait");
          }
        },
        { logger },
      );

      await task.resume();
      await task.destroy();

      expect(cleaned).toEqual(["after-wait"]);
      expect(logger.events("warn")).toEqual([]);
      expect(await task.join()).toEqual({ status: "dropped" });
    });

    it("is idempotent", async () => {
      const task = new Task(
        function* (ctx) {
          yield* ctx.yieldNow();
        },
        { logger: silentLogger },
      );
      await task.destroy();
      await task.destroy();
      expect(await task.join()).toEqual({ status: "dropped" });
    });
  });

  it("wraps an async function with fromAsync", async () => {
    const task = Task.fromAsync(async () => {
      await delay(1);
      return "async-result";
    }, { logger: silentLogger });

    const suspension = await task.resume();
    if (suspension?.kind !== "wait") throw new Error("expected a wait");
    await suspension.settled;
    await task.resume();

    expect(await task.join()).toEqual({ status: "completed", value: "async-result" });
  });

  it("cannot be claimed while it is mid-step", async () => {
    const task = new Task(
      async function* (ctx) {
        await delay(10);
        yield* ctx.yieldNow();
      },
      { name: "in-flight", logger: silentLogger },
    );

    const first = task.resume();
    expect(() => task.claim()).toThrow('Task "in-flight" is already running');
    await first;
  });

  it("can be claimed only once", () => {
    const task = new Task(function* () {}, { name: "solo", logger: silentLogger });
    task.claim();
    expect(() => task.claim()).toThrow('Task "solo" was already spawned');
  });
});

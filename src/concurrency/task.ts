// =============================================================================
// Task<R> — Suspendable unit of work driven one step at a time
// =============================================================================

import { getDefaultLogger } from "../adapters/logging/console-logging.adapter.js";
import { TaskFailureError, TaskStateError } from "../errors.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { describeError } from "../ports/logging.port.js";
import type { Channel, ReceiveResult } from "./channel.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** What a task asks for when it gives its worker back. */
export type Suspension =
  | { readonly kind: "yield" }
  | { readonly kind: "sleep"; readonly wakeAt: number }
  | { readonly kind: "wait"; readonly settled: Promise<void> };

export type TaskState = "created" | "suspended" | "completed" | "failed";

export type TaskOutcome<R> =
  | { status: "completed"; value: R }
  | { status: "failed"; error: TaskFailureError }
  | { status: "dropped" };

export type TaskContinuation<R> =
  | Generator<Suspension, R, void>
  | AsyncGenerator<Suspension, R, void>;

export type TaskBody<R> = (ctx: TaskContext) => TaskContinuation<R>;

/** The slice of a task a scheduler drives, independent of its result type. */
export interface Runnable {
  readonly id: string;
  readonly name: string;
  readonly state: TaskState;
  readonly failure: TaskFailureError | undefined;
  /** True once destroy() has started, whoever called it. */
  readonly destroyed: boolean;
  resume(): Promise<Suspension | undefined>;
  isDone(): boolean;
  destroy(): Promise<void>;
  claim(): void;
}

export interface TaskOptions {
  name?: string;
  logger?: LoggingPort;
}

/** Cap on steps spent running `finally` blocks that suspend during destroy(). */
const MAX_TEARDOWN_STEPS = 32;

let nextTaskId = 1;

// ── Settlement ───────────────────────────────────────────────────────────────

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/** Records a promise's outcome so a resumed task can read it synchronously. */
class Settlement<T> {
  readonly settled: Promise<void>;
  private result: Settled<T> | undefined;

  constructor(promise: PromiseLike<T>) {
    this.settled = Promise.resolve(
      promise.then(
        (value) => {
          this.result = { ok: true, value };
        },
        (error: unknown) => {
          this.result = { ok: false, error };
        },
      ),
    );
  }

  unwrap(taskName: string): T {
    const result = this.result;
    if (!result) throw new TaskStateError(taskName, "was resumed before its wait settled");
    if (!result.ok) throw result.error;
    return result.value;
  }
}

// ── Context ──────────────────────────────────────────────────────────────────

/**
 * Handed to a task body. Every helper is a generator meant for `yield*`:
 *
 * ```ts
 * scheduler.spawn(function* (ctx) {
 *   yield* ctx.sleep(10);
 *   const item = yield* ctx.receive(inbox);
 *   if (!item.done) yield* ctx.send(outbox, item.value * 2);
 * });
 * ```
 */
export class TaskContext {
  constructor(
    readonly id: string,
    readonly name: string,
    /** Aborted when the task is destroyed. */
    readonly signal: AbortSignal,
  ) {}

  /** Go to the back of the ready queue. */
  *yieldNow(): Generator<Suspension, void, void> {
    yield { kind: "yield" };
  }

  /** Leave the worker for at least `ms` milliseconds. */
  *sleep(ms = 1): Generator<Suspension, void, void> {
    yield { kind: "sleep", wakeAt: Date.now() + Math.max(0, ms) };
  }

  /** Leave the worker until `promise` settles; rethrows its rejection. */
  *wait<T>(promise: PromiseLike<T>): Generator<Suspension, T, void> {
    const settlement = new Settlement(promise);
    yield { kind: "wait", settled: settlement.settled };
    return settlement.unwrap(this.name);
  }

  *send<T>(channel: Channel<T>, value: T): Generator<Suspension, boolean, void> {
    return yield* this.wait(channel.send(value, { signal: this.signal }));
  }

  *receive<T>(channel: Channel<T>): Generator<Suspension, ReceiveResult<T>, void> {
    return yield* this.wait(channel.receive({ signal: this.signal }));
  }
}

async function* drive<R>(
  body: TaskBody<R>,
  ctx: TaskContext,
  onReturn: (value: R) => void,
): AsyncGenerator<Suspension, void, void> {
  onReturn(yield* body(ctx));
}

// ── Task ─────────────────────────────────────────────────────────────────────

export class Task<R = unknown> implements Runnable {
  readonly id: string;
  readonly name: string;
  readonly createdAt: number;

  private continuation: AsyncGenerator<Suspension, void, void> | null;
  private _state: TaskState = "created";
  private running = false;
  private claimed = false;
  private _failure: TaskFailureError | undefined;
  private readonly abortController = new AbortController();
  private readonly logger: LoggingPort;
  private readonly outcome: Promise<TaskOutcome<R>>;
  private resolveOutcome: (outcome: TaskOutcome<R>) => void = () => {};

  constructor(body: TaskBody<R>, options: TaskOptions = {}) {
    this.id = `task-${nextTaskId++}`;
    this.name = options.name ?? this.id;
    this.createdAt = Date.now();
    this.logger = options.logger ?? getDefaultLogger();
    this.outcome = new Promise<TaskOutcome<R>>((resolve) => {
      this.resolveOutcome = resolve;
    });

    const ctx = new TaskContext(this.id, this.name, this.abortController.signal);
    this.continuation = drive(body, ctx, (value) => this.complete(value));
  }

  /** Wrap an async function; the task stays parked (off any worker) while it runs. */
  static fromAsync<R>(
    fn: (signal: AbortSignal) => Promise<R>,
    options?: TaskOptions,
  ): Task<R> {
    return new Task(function* (ctx) {
      return yield* ctx.wait(fn(ctx.signal));
    }, options);
  }

  get state(): TaskState {
    return this._state;
  }

  get destroyed(): boolean {
    return this.abortController.signal.aborted;
  }

  /** Why the task failed, once it has. */
  get failure(): TaskFailureError | undefined {
    return this._failure;
  }

  isDone(): boolean {
    return (
      this._state === "completed" ||
      this._state === "failed" ||
      this.continuation === null
    );
  }

  /**
   * Run the continuation to its next suspension (returned) or to the end
   * (`undefined`). Errors from the body mark the task failed and are logged;
   * they never escape this call.
   */
  async resume(): Promise<Suspension | undefined> {
    const continuation = this.continuation;
    if (!continuation || this.isDone()) {
      throw new TaskStateError(this.name, "is already done");
    }
    if (this.running) throw new TaskStateError(this.name, "is already running");

    this.running = true;
    try {
      const step = await continuation.next();
      if (step.done) {
        this.continuation = null;
        return undefined;
      }
      this._state = "suspended";
      return step.value;
    } catch (error) {
      this.fail(error);
      return undefined;
    } finally {
      this.running = false;
    }
  }

  /** Resolves once with how the task ended. Never rejects. */
  join(): Promise<TaskOutcome<R>> {
    return this.outcome;
  }

  /**
   * Release the continuation without completing it. Aborts the task signal,
   * then unwinds the generator so its `finally` blocks run. Idempotent.
   */
  async destroy(): Promise<void> {
    const continuation = this.continuation;
    if (!continuation) return;
    this.continuation = null;
    this.abortController.abort(new TaskStateError(this.name, "was destroyed"));

    try {
      // A finally block that suspends is stepped on with next() until it ends.
      // Waits are awaited; sleeps and yields continue at once.
      let step = await continuation.return();
      let steps = 0;
      while (!step.done) {
        if (++steps >= MAX_TEARDOWN_STEPS) {
          this.logger.warn("task:teardown-abandoned", { taskId: this.id, name: this.name, steps });
          break;
        }
        if (step.value.kind === "wait") await step.value.settled;
        step = await continuation.next();
      }
    } catch (error) {
      this.logger.warn("task:teardown-failed", {
        taskId: this.id,
        name: this.name,
        error: describeError(error),
      });
    }
    this.resolveOutcome({ status: "dropped" });
  }

  /** Marks the task as owned by a scheduler; a task can be spawned only once. */
  claim(): void {
    if (this.claimed) throw new TaskStateError(this.name, "was already spawned");
    if (this.isDone()) throw new TaskStateError(this.name, "is already done");
    if (this.running) throw new TaskStateError(this.name, "is already running");
    this.claimed = true;
  }

  private complete(value: R): void {
    // Unwinding a destroyed body can fall through to the end of drive()
    if (this.abortController.signal.aborted) return;
    this._state = "completed";
    this.resolveOutcome({ status: "completed", value });
  }

  private fail(error: unknown): void {
    this.continuation = null;
    this._state = "failed";
    const cause = error instanceof Error ? error : new Error(String(error));
    const failure = new TaskFailureError(this.id, this.name, cause);
    this._failure = failure;
    this.logger.error("task:failed", {
      taskId: this.id,
      name: this.name,
      error: describeError(cause),
    });
    this.resolveOutcome({ status: "failed", error: failure });
  }
}

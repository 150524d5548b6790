// =============================================================================
// Scheduler — Fixed pool of worker loops driving tasks step by step
// =============================================================================

import { setImmediate as nextMacrotask } from "node:timers/promises";
import { getDefaultLogger } from "../adapters/logging/console-logging.adapter.js";
import { parseConfig } from "../config/runtime-config.js";
import { SchedulerConfigSchema, SpawnOptionsSchema } from "../domain/runtime.schema.js";
import type {
  SchedulerConfig,
  SchedulerEvent,
  SchedulerStats,
} from "../domain/runtime.schema.js";
import { SchedulerStoppedError } from "../errors.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { describeError } from "../ports/logging.port.js";
import { createReadyQueue } from "./ready-queue.js";
import type { Queued, ReadyQueue } from "./ready-queue.js";
import { Task } from "./task.js";
import type { Runnable, Suspension, TaskBody } from "./task.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface SchedulerDeps {
  logger?: LoggingPort;
  onEvent?: (event: SchedulerEvent) => void;
}

export interface SpawnOptions {
  /** Used when spawning a body; a prebuilt Task keeps its own name. */
  name?: string;
  /** Only consulted by the "priority" queue policy (lower runs first). */
  priority?: number;
}

interface ScheduledTask extends Queued {
  readonly task: Runnable;
  readonly spawnedAt: number;
}

type WorkerState = "idle" | "busy" | "dead";

interface WorkerSlot {
  state: WorkerState;
  wakeResolve: (() => void) | null;
}

/** Sleeping tasks hold their timer; waiting tasks hold null. */
type ParkedHandle = ReturnType<typeof setTimeout> | null;

// ── Implementation ───────────────────────────────────────────────────────────

/**
 * Runs spawned tasks on `workerCount` worker loops. A worker is held for one
 * step of one task; a task that suspends is requeued (yield) or parked off
 * the workers until its timer fires or its promise settles.
 *
 * Queue discipline follows `queuePolicy`; see {@link createReadyQueue}.
 */
export class Scheduler {
  private readonly config: SchedulerConfig;
  private readonly queue: ReadyQueue<ScheduledTask>;
  private readonly parked = new Map<ScheduledTask, ParkedHandle>();
  private readonly workers = new Map<number, WorkerSlot>();
  private readonly workerLoops: Promise<void>[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly logger: LoggingPort;
  private readonly onEvent?: (event: SchedulerEvent) => void;

  private stopping = false;
  private stopped: Promise<void> | null = null;
  private created = 0;
  private completed = 0;
  private failed = 0;
  private dropped = 0;
  private active = 0;

  constructor(config?: Partial<SchedulerConfig>, deps: SchedulerDeps = {}) {
    this.config = parseConfig(SchedulerConfigSchema, config ?? {});
    this.logger = deps.logger ?? getDefaultLogger();
    this.onEvent = deps.onEvent;
    this.queue = createReadyQueue<ScheduledTask>(this.config.queuePolicy);

    for (let id = 0; id < this.config.workerCount; id++) {
      this.spawnWorker(id);
    }
    this.logger.info("scheduler:start", {
      workerCount: this.config.workerCount,
      queuePolicy: this.config.queuePolicy,
    });
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  /** Queue a task (or a body to wrap in one) and wake an idle worker. */
  spawn<R>(taskOrBody: Task<R> | TaskBody<R>, options: SpawnOptions = {}): Task<R> {
    if (this.stopping) throw new SchedulerStoppedError();
    const { name, priority } = parseConfig(SpawnOptionsSchema, options);

    const task =
      taskOrBody instanceof Task
        ? taskOrBody
        : new Task(taskOrBody, { name, logger: this.logger });
    task.claim();

    this.created++;
    this.active++;
    this.queue.push({
      task,
      priority,
      seq: 0,
      spawnedAt: Date.now(),
    });

    this.logger.debug("scheduler:spawn", { taskId: task.id, name: task.name });
    this.emit({
      type: "task:spawned",
      taskId: task.id,
      name: task.name,
      queueDepth: this.queue.size,
    });
    this.wakeOneIdleWorker();
    return task;
  }

  /** Resolves when no spawned task is still active. */
  awaitAll(): Promise<void> {
    if (this.active === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop the workers and drop whatever has not finished. Each worker finishes
   * the step it is on; queued and parked tasks are destroyed without being
   * resumed again. Idempotent.
   */
  shutdown(): Promise<void> {
    this.stopped ??= this.stop();
    return this.stopped;
  }

  getStats(): SchedulerStats {
    let running = 0;
    for (const slot of this.workers.values()) {
      if (slot.state === "busy") running++;
    }
    return {
      active: this.active,
      created: this.created,
      completed: this.completed,
      failed: this.failed,
      dropped: this.dropped,
      queued: this.queue.size,
      running,
      parked: this.parked.size,
      workerCount: this.workers.size,
    };
  }

  get isShutdown(): boolean {
    return this.stopping;
  }

  // ── Worker lifecycle ───────────────────────────────────────────────────────

  private spawnWorker(id: number): void {
    const slot: WorkerSlot = { state: "idle", wakeResolve: null };
    this.workers.set(id, slot);
    this.workerLoops.push(this.workerLoop(id, slot));
  }

  private async workerLoop(workerId: number, slot: WorkerSlot): Promise<void> {
    this.emit({ type: "worker:started", workerId });

    while (!this.stopping) {
      const entry = this.queue.pop();

      if (!entry) {
        slot.state = "idle";
        // Park until spawn, unpark or shutdown wakes us
        await new Promise<void>((resolve) => {
          slot.wakeResolve = resolve;
        });
        continue;
      }

      slot.state = "busy";
      await this.step(entry, workerId);
      slot.state = "idle";

      // Give timers and I/O a turn between steps
      await nextMacrotask();
    }

    slot.state = "dead";
    this.emit({ type: "worker:stopped", workerId });
  }

  private async step(entry: ScheduledTask, workerId: number): Promise<void> {
    const { task } = entry;
    // destroy() called from outside while the scheduler still held the task
    if (task.destroyed) {
      this.discard(entry);
      return;
    }
    this.emit({ type: "task:started", taskId: task.id, workerId });

    let suspension: Suspension | undefined;
    try {
      suspension = await task.resume();
    } catch (error) {
      // resume() only throws for a task driven from outside the scheduler
      this.logger.error("scheduler:resume-rejected", {
        taskId: task.id,
        name: task.name,
        error: describeError(error),
      });
      this.finish(entry);
      return;
    }

    if (task.destroyed) {
      this.discard(entry);
      return;
    }
    if (suspension === undefined) {
      this.finish(entry);
      return;
    }

    switch (suspension.kind) {
      case "yield":
        this.emit({ type: "task:suspended", taskId: task.id, reason: "yield" });
        this.queue.push(entry);
        break;
      case "sleep": {
        const delayMs = Math.max(0, suspension.wakeAt - Date.now());
        this.parked.set(entry, setTimeout(() => this.unpark(entry), delayMs));
        this.emit({ type: "task:suspended", taskId: task.id, reason: "sleep" });
        break;
      }
      case "wait":
        this.parked.set(entry, null);
        this.emit({ type: "task:suspended", taskId: task.id, reason: "wait" });
        void suspension.settled.then(
          () => this.unpark(entry),
          () => this.unpark(entry),
        );
        break;
    }
  }

  /** Move a parked task back to the ready queue, unless shutdown already took it. */
  private unpark(entry: ScheduledTask): void {
    if (!this.parked.delete(entry)) return;
    this.queue.push(entry);
    this.wakeOneIdleWorker();
  }

  private finish(entry: ScheduledTask): void {
    const { task } = entry;
    const durationMs = Date.now() - entry.spawnedAt;
    this.active--;

    if (task.state === "completed") {
      this.completed++;
      this.logger.debug("scheduler:task-completed", { taskId: task.id, name: task.name, durationMs });
      this.emit({ type: "task:completed", taskId: task.id, durationMs });
    } else {
      this.failed++;
      const error = task.failure ?? new Error(`Task "${task.name}" ended in state ${task.state}`);
      this.emit({ type: "task:failed", taskId: task.id, error, durationMs });
    }

    this.signalIfIdle();
  }

  // ── Shutdown ───────────────────────────────────────────────────────────────

  private async stop(): Promise<void> {
    this.stopping = true;
    this.logger.info("scheduler:shutdown", { active: this.active });

    for (const slot of this.workers.values()) {
      if (slot.wakeResolve) {
        slot.wakeResolve();
        slot.wakeResolve = null;
      }
    }
    await Promise.all(this.workerLoops);

    for (const handle of this.parked.values()) {
      if (handle !== null) clearTimeout(handle);
    }
    const leftovers = [...this.queue.drain(), ...this.parked.keys()];
    this.parked.clear();

    await Promise.all(leftovers.map((entry) => this.drop(entry)));

    this.logger.info("scheduler:stopped", {
      completed: this.completed,
      failed: this.failed,
      dropped: leftovers.length,
    });
    this.emit({ type: "scheduler:shutdown", dropped: leftovers.length });
  }

  private async drop(entry: ScheduledTask): Promise<void> {
    await entry.task.destroy();
    this.discard(entry);
  }

  private discard(entry: ScheduledTask): void {
    this.active--;
    this.dropped++;
    this.logger.debug("scheduler:task-dropped", { taskId: entry.task.id, name: entry.task.name });
    this.emit({ type: "task:dropped", taskId: entry.task.id });
    this.signalIfIdle();
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private signalIfIdle(): void {
    if (this.active !== 0) return;
    this.emit({ type: "scheduler:idle", completed: this.completed, failed: this.failed });
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }

  private wakeOneIdleWorker(): void {
    for (const slot of this.workers.values()) {
      if (slot.state === "idle" && slot.wakeResolve) {
        slot.wakeResolve();
        slot.wakeResolve = null;
        return;
      }
    }
  }

  private emit(event: SchedulerEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      this.logger.warn("scheduler:listener-error", {
        event: event.type,
        error: describeError(error),
      });
    }
  }
}

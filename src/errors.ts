/**
 * Structured error hierarchy for spindle.
 *
 * All runtime errors extend {@link SpindleError} to enable type-safe catch blocks:
 *
 * ```ts
 * try {
 *   await cell.borrowShared((v) => v);
 * } catch (e) {
 *   if (e instanceof UseAfterTransferError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all spindle errors. Includes an error code for programmatic matching. */
export class SpindleError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SpindleError";
    this.code = code;
  }
}

/** Thrown when a cell is borrowed or transferred after its value has been moved out. */
export class UseAfterTransferError extends SpindleError {
  readonly owner: string;
  readonly operation: "borrow" | "transfer";
  constructor(owner: string, operation: "borrow" | "transfer") {
    super(
      "USE_AFTER_TRANSFER",
      operation === "borrow"
        ? `Value was transferred to "${owner}" and can no longer be borrowed`
        : `Value was already transferred to "${owner}"`,
    );
    this.name = "UseAfterTransferError";
    this.owner = owner;
    this.operation = operation;
  }
}

/** Thrown when a borrow reference is used after its callback settled. */
export class BorrowExpiredError extends SpindleError {
  constructor() {
    super("BORROW_EXPIRED", "Borrowed reference used after the borrow ended");
    this.name = "BorrowExpiredError";
  }
}

/** Wraps an error raised inside a task body. Recorded on the task, never rethrown. */
export class TaskFailureError extends SpindleError {
  readonly taskId: string;
  readonly taskName: string;
  constructor(taskId: string, taskName: string, cause: Error) {
    super("TASK_FAILURE", `Task "${taskName}" failed: ${cause.message}`, { cause });
    this.name = "TaskFailureError";
    this.taskId = taskId;
    this.taskName = taskName;
  }
}

/** Thrown when a task is resumed or spawned in a state that does not allow it. */
export class TaskStateError extends SpindleError {
  readonly taskName: string;
  constructor(taskName: string, message: string) {
    super("TASK_STATE", `Task "${taskName}" ${message}`);
    this.name = "TaskStateError";
    this.taskName = taskName;
  }
}

/** Thrown by spawn() once shutdown has begun. */
export class SchedulerStoppedError extends SpindleError {
  constructor() {
    super("SCHEDULER_STOPPED", "Scheduler is shut down, cannot spawn");
    this.name = "SchedulerStoppedError";
  }
}

/** Thrown when a pool has reached its slab limit and every block is in use. */
export class PoolExhaustedError extends SpindleError {
  readonly capacity: number;
  constructor(capacity: number) {
    super("POOL_EXHAUSTED", `Memory pool exhausted: all ${capacity} blocks are in use`);
    this.name = "PoolExhaustedError";
    this.capacity = capacity;
  }
}

/** Thrown when a block handle from another pool is passed in. */
export class ForeignBlockError extends SpindleError {
  constructor(expectedPool: number, actualPool: number) {
    super("FOREIGN_BLOCK", `Block belongs to pool ${actualPool}, not pool ${expectedPool}`);
    this.name = "ForeignBlockError";
  }
}

export type InvalidBlockReason = "double-free" | "stale" | "out-of-range";

/** Thrown on double free, stale handles and slots that do not exist. */
export class InvalidBlockError extends SpindleError {
  readonly reason: InvalidBlockReason;
  constructor(reason: InvalidBlockReason, slab: number, index: number) {
    super("INVALID_BLOCK", `Invalid block ${slab}:${index} (${reason})`);
    this.name = "InvalidBlockError";
    this.reason = reason;
  }
}

/** Thrown when configuration validation fails. */
export class ConfigError extends SpindleError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIG_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigError";
    this.field = field;
  }
}

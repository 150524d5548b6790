// =============================================================================
// Concurrency — Public API
// =============================================================================

export { AsyncMutex } from "./async-mutex.js";
export { OwnershipCell } from "./ownership-cell.js";
export type { CellRef, OwnershipCellOptions } from "./ownership-cell.js";
export { Channel } from "./channel.js";
export type { ChannelOptions, ReceiveResult, WaitOptions } from "./channel.js";
export { Task, TaskContext } from "./task.js";
export type {
  Runnable,
  Suspension,
  TaskBody,
  TaskContinuation,
  TaskOptions,
  TaskOutcome,
  TaskState,
} from "./task.js";
export { createReadyQueue } from "./ready-queue.js";
export type { Queued, ReadyQueue } from "./ready-queue.js";
export { Scheduler } from "./scheduler.js";
export type { SchedulerDeps, SpawnOptions } from "./scheduler.js";
export { MemoryPool } from "./memory-pool.js";
export type { Block, MemoryPoolDeps } from "./memory-pool.js";
export { getGlobalScheduler, resetGlobalScheduler } from "./global-scheduler.js";

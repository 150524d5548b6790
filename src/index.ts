// =============================================================================
// spindle — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Concurrency primitives
// ─────────────────────────────────────────────────────────────────────────────

export {
  AsyncMutex,
  OwnershipCell,
  Channel,
  Task,
  TaskContext,
  createReadyQueue,
  Scheduler,
  MemoryPool,
  getGlobalScheduler,
  resetGlobalScheduler,
} from "./concurrency/index.js";
export type {
  CellRef,
  OwnershipCellOptions,
  ChannelOptions,
  ReceiveResult,
  WaitOptions,
  Runnable,
  Suspension,
  TaskBody,
  TaskContinuation,
  TaskOptions,
  TaskOutcome,
  TaskState,
  Queued,
  ReadyQueue,
  SchedulerDeps,
  SpawnOptions,
  Block,
  MemoryPoolDeps,
} from "./concurrency/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas & config
// ─────────────────────────────────────────────────────────────────────────────

export {
  QUEUE_POLICIES,
  LOG_THRESHOLDS,
  SchedulerConfigSchema,
  SpawnOptionsSchema,
  ChannelConfigSchema,
  MemoryPoolConfigSchema,
  RuntimeConfigSchema,
} from "./domain/runtime.schema.js";
export type {
  QueuePolicy,
  SchedulerConfig,
  ChannelConfig,
  MemoryPoolConfig,
  RuntimeConfig,
  SchedulerStats,
  MemoryPoolStats,
  ParkReason,
  SchedulerEvent,
} from "./domain/runtime.schema.js";
export { ENV_KEYS, loadRuntimeConfig, parseConfig } from "./config/runtime-config.js";

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export type { LogEntry, LogLevel, LogThreshold, LoggingPort } from "./ports/logging.port.js";
export { LOG_LEVEL_ORDER, describeError } from "./ports/logging.port.js";
export {
  ConsoleLoggingAdapter,
  getDefaultLogger,
} from "./adapters/logging/console-logging.adapter.js";
export type { ConsoleLoggingOptions } from "./adapters/logging/console-logging.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  SpindleError,
  UseAfterTransferError,
  BorrowExpiredError,
  TaskFailureError,
  TaskStateError,
  SchedulerStoppedError,
  PoolExhaustedError,
  ForeignBlockError,
  InvalidBlockError,
  ConfigError,
} from "./errors.js";
export type { InvalidBlockReason } from "./errors.js";

// =============================================================================
// Runtime Schema — Configuration & event types for the concurrency primitives
// =============================================================================

import { availableParallelism } from "node:os";
import { z } from "zod";

export const QUEUE_POLICIES = ["fifo", "lifo", "priority"] as const;

export type QueuePolicy = (typeof QUEUE_POLICIES)[number];

export const SchedulerConfigSchema = z.object({
  workerCount: z.number().int().positive().default(() => availableParallelism()),
  queuePolicy: z.enum(QUEUE_POLICIES).default("fifo"),
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

export const SpawnOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  priority: z.number().finite().default(0),
});

export const ChannelConfigSchema = z.object({
  capacity: z.number().int().positive().default(100),
});

export type ChannelConfig = z.infer<typeof ChannelConfigSchema>;

export const MemoryPoolConfigSchema = z.object({
  blockSize: z.number().int().positive(),
  blocksPerSlab: z.number().int().positive().default(1024),
  maxSlabs: z.number().int().positive().default(64),
});

export type MemoryPoolConfig = z.infer<typeof MemoryPoolConfigSchema>;

export const LOG_THRESHOLDS = ["debug", "info", "warn", "error", "silent"] as const;

export const RuntimeConfigSchema = z.object({
  scheduler: SchedulerConfigSchema.default({}),
  logLevel: z.enum(LOG_THRESHOLDS).default("warn"),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export interface SchedulerStats {
  active: number;
  created: number;
  completed: number;
  failed: number;
  dropped: number;
  queued: number;
  /** Workers currently inside a task step. */
  running: number;
  parked: number;
  workerCount: number;
}

export interface MemoryPoolStats {
  blockSize: number;
  slabCount: number;
  capacity: number;
  inUse: number;
  free: number;
}

export type ParkReason = "sleep" | "wait";

export type SchedulerEvent =
  | { type: "task:spawned"; taskId: string; name: string; queueDepth: number }
  | { type: "task:started"; taskId: string; workerId: number }
  | { type: "task:suspended"; taskId: string; reason: "yield" | ParkReason }
  | { type: "task:completed"; taskId: string; durationMs: number }
  | { type: "task:failed"; taskId: string; error: Error; durationMs: number }
  | { type: "task:dropped"; taskId: string }
  | { type: "worker:started"; workerId: number }
  | { type: "worker:stopped"; workerId: number }
  | { type: "scheduler:idle"; completed: number; failed: number }
  | { type: "scheduler:shutdown"; dropped: number };

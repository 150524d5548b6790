// =============================================================================
// ReadyQueue — Explicit queue disciplines for runnable tasks
// =============================================================================

import type { QueuePolicy } from "../domain/runtime.schema.js";

export interface Queued {
  /** Lower runs first under the "priority" policy. */
  readonly priority: number;
  /** Enqueue order, assigned by the queue; breaks priority ties FIFO. */
  seq: number;
}

export interface ReadyQueue<T extends Queued> {
  readonly policy: QueuePolicy;
  readonly size: number;
  push(item: T): void;
  pop(): T | undefined;
  /** Remove and return everything still queued. */
  drain(): T[];
}

/** Oldest first. A task that re-yields goes behind everything already waiting. */
class FifoQueue<T extends Queued> implements ReadyQueue<T> {
  readonly policy = "fifo" as const;
  private items: T[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head++];
    // Compact once the consumed prefix dominates
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  drain(): T[] {
    const rest = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return rest;
  }
}

/**
 * Newest first. A re-yielding task is picked again before older work, so
 * older tasks can starve while it keeps yielding.
 */
class LifoQueue<T extends Queued> implements ReadyQueue<T> {
  readonly policy = "lifo" as const;
  private items: T[] = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    return this.items.pop();
  }

  drain(): T[] {
    const rest = this.items;
    this.items = [];
    return rest;
  }
}

/** Binary min-heap on (priority, seq). */
class PriorityReadyQueue<T extends Queued> implements ReadyQueue<T> {
  readonly policy = "priority" as const;
  private heap: T[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(item: T): void {
    this.heap.push(item);
    this.bubbleUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    if (this.heap.length === 0) return undefined;
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.sinkDown(0);
    }
    return top;
  }

  drain(): T[] {
    const rest = this.heap;
    this.heap = [];
    return rest;
  }

  private before(a: T, b: T): boolean {
    return a.priority !== b.priority ? a.priority < b.priority : a.seq < b.seq;
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.before(this.heap[i], this.heap[parent])) break;
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private sinkDown(i: number): void {
    const n = this.heap.length;
    while (true) {
      let smallest = i;
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      if (left < n && this.before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) break;
      [this.heap[i], this.heap[smallest]] = [this.heap[smallest], this.heap[i]];
      i = smallest;
    }
  }
}

/** Stamps each pushed item with a monotonically increasing sequence number. */
class Sequenced<T extends Queued> implements ReadyQueue<T> {
  private nextSeq = 0;

  constructor(private readonly inner: ReadyQueue<T>) {}

  get policy(): QueuePolicy {
    return this.inner.policy;
  }

  get size(): number {
    return this.inner.size;
  }

  push(item: T): void {
    item.seq = this.nextSeq++;
    this.inner.push(item);
  }

  pop(): T | undefined {
    return this.inner.pop();
  }

  drain(): T[] {
    return this.inner.drain();
  }
}

export function createReadyQueue<T extends Queued>(policy: QueuePolicy): ReadyQueue<T> {
  switch (policy) {
    case "fifo":
      return new Sequenced(new FifoQueue<T>());
    case "lifo":
      return new Sequenced(new LifoQueue<T>());
    case "priority":
      return new Sequenced(new PriorityReadyQueue<T>());
  }
}

// =============================================================================
// Channel<T> — Bounded, closable FIFO implementing AsyncIterable
// =============================================================================

import { getDefaultLogger } from "../adapters/logging/console-logging.adapter.js";
import { parseConfig } from "../config/runtime-config.js";
import { ChannelConfigSchema } from "../domain/runtime.schema.js";
import type { LoggingPort } from "../ports/logging.port.js";

export type ReceiveResult<T> = IteratorResult<T, undefined>;

export interface ChannelOptions {
  logger?: LoggingPort;
}

export interface WaitOptions {
  /** Withdraws a parked send/receive; the promise rejects with `signal.reason`. */
  signal?: AbortSignal;
}

interface ParkedReceiver<T> {
  resolve: (result: ReceiveResult<T>) => void;
  detach: () => void;
}

interface ParkedSender<T> {
  value: T;
  resolve: (sent: boolean) => void;
  detach: () => void;
}

const END: ReceiveResult<never> = { value: undefined, done: true };

export class Channel<T> implements AsyncIterable<T> {
  readonly capacity: number;
  private readonly buffer: T[] = [];
  private receivers: ParkedReceiver<T>[] = [];
  private senders: ParkedSender<T>[] = [];
  private closed = false;
  private readonly logger: LoggingPort;

  constructor(capacity = 100, options: ChannelOptions = {}) {
    this.capacity = parseConfig(ChannelConfigSchema, { capacity }).capacity;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Enqueue `value`, parking while the buffer is full.
   * Resolves `false` if the channel is closed before the value is accepted.
   */
  send(value: T, options: WaitOptions = {}): Promise<boolean> {
    if (this.trySend(value)) return Promise.resolve(true);
    if (this.closed) return Promise.resolve(false);

    const { signal } = options;
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<boolean>((resolve, reject) => {
      const parked: ParkedSender<T> = {
        value,
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      const onAbort = () => {
        this.senders = this.senders.filter((s) => s !== parked);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.senders.push(parked);
      this.logger.debug("channel:send-parked", { size: this.buffer.length, parkedSenders: this.senders.length });
    });
  }

  /** Non-blocking send: `true` if the value was accepted now. */
  trySend(value: T): boolean {
    if (this.closed) {
      this.logger.debug("channel:send-closed");
      return false;
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.detach();
      receiver.resolve({ value, done: false });
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  /**
   * Dequeue the oldest value, parking while the channel is empty and open.
   * Resolves `{ done: true }` once the channel is closed and drained.
   */
  receive(options: WaitOptions = {}): Promise<ReceiveResult<T>> {
    const ready = this.tryReceive();
    if (ready) return Promise.resolve(ready);

    const { signal } = options;
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<ReceiveResult<T>>((resolve, reject) => {
      const parked: ParkedReceiver<T> = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      const onAbort = () => {
        this.receivers = this.receivers.filter((r) => r !== parked);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(parked);
    });
  }

  /** Non-blocking receive: `null` when empty but still open. */
  tryReceive(): ReceiveResult<T> | null {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      this.admitParkedSender();
      return { value, done: false };
    }
    return this.closed ? END : null;
  }

  /** Stop accepting values. Buffered values stay receivable. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sender of this.senders) {
      sender.detach();
      sender.resolve(false);
    }
    for (const receiver of this.receivers) {
      receiver.detach();
      receiver.resolve(END);
    }
    this.logger.debug("channel:close", {
      buffered: this.buffer.length,
      rejectedSenders: this.senders.length,
      releasedReceivers: this.receivers.length,
    });
    this.senders = [];
    this.receivers = [];
  }

  size(): number {
    return this.buffer.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  /** Move the oldest parked sender's value into the slot a receive just freed. */
  private admitParkedSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    sender.detach();
    this.buffer.push(sender.value);
    sender.resolve(true);
  }
}

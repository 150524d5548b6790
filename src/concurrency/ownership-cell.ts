// =============================================================================
// OwnershipCell<T> — Single-owner container with guarded borrows and transfer
// =============================================================================

import { getDefaultLogger } from "../adapters/logging/console-logging.adapter.js";
import { BorrowExpiredError, UseAfterTransferError } from "../errors.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { AsyncMutex } from "./async-mutex.js";

/** Mutable handle passed to an exclusive borrow. Revoked when the borrow ends. */
export interface CellRef<T> {
  value: T;
}

export interface OwnershipCellOptions {
  logger?: LoggingPort;
}

type Slot<T> = { readonly value: T } | null;

/**
 * Holds one value and one owner label. Shared and exclusive borrows run
 * under the same lock, one at a time; `transfer()` moves the value out and
 * leaves the cell permanently empty.
 */
export class OwnershipCell<T> {
  private slot: Slot<T>;
  private owner: string;
  private readonly lock = new AsyncMutex();
  private readonly logger: LoggingPort;

  constructor(value: T, owner = "anonymous", options: OwnershipCellOptions = {}) {
    this.slot = { value };
    this.owner = owner;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /** Run `fn` with read access to the value. */
  borrowShared<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
    return this.lock.runExclusive(() => fn(this.occupied("borrow").value), this.owner);
  }

  /**
   * Run `fn` with a reference whose `value` can be read and replaced.
   * The reference stops working once `fn` settles.
   */
  borrowExclusive<R>(fn: (ref: CellRef<T>) => R | Promise<R>): Promise<R> {
    return this.lock.runExclusive(async () => {
      this.occupied("borrow");
      let live = true;
      const ref = this.makeRef(() => live);
      try {
        return await fn(ref);
      } finally {
        live = false;
      }
    }, this.owner);
  }

  /** Move the value out to `newOwner`. The cell is empty afterwards. */
  transfer(newOwner: string): Promise<T> {
    return this.lock.runExclusive(() => {
      const { value } = this.occupied("transfer");
      const previous = this.owner;
      this.slot = null;
      this.owner = newOwner;
      this.logger.info("cell:transfer", { from: previous, to: newOwner });
      return value;
    }, this.owner);
  }

  isAvailable(): boolean {
    return this.slot !== null;
  }

  currentOwner(): string {
    return this.owner;
  }

  private occupied(operation: "borrow" | "transfer"): { readonly value: T } {
    if (this.slot === null) {
      this.logger.warn("cell:use-after-transfer", { owner: this.owner, operation });
      throw new UseAfterTransferError(this.owner, operation);
    }
    return this.slot;
  }

  private makeRef(isLive: () => boolean): CellRef<T> {
    const read = (): T => {
      if (!isLive()) throw new BorrowExpiredError();
      return this.occupied("borrow").value;
    };
    const write = (next: T): void => {
      if (!isLive()) throw new BorrowExpiredError();
      this.occupied("borrow");
      this.slot = { value: next };
    };
    return {
      get value(): T {
        return read();
      },
      set value(next: T) {
        write(next);
      },
    };
  }
}

// =============================================================================
// AsyncMutex — FIFO hand-off lock with a labelled holder
// =============================================================================

/**
 * Non re-entrant mutual exclusion for async critical sections.
 *
 * Waiters are granted the lock strictly in arrival order; release hands the
 * lock straight to the next waiter, so no late arrival can barge in.
 */
export class AsyncMutex {
  private locked = false;
  private holder: string | undefined;
  private readonly waiters: Array<() => void> = [];

  async runExclusive<R>(fn: () => R | Promise<R>, holder = "anonymous"): Promise<R> {
    await this.acquire(holder);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Label of the current holder, `undefined` when free. */
  currentHolder(): string | undefined {
    return this.holder;
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers parked behind the current holder. */
  get pending(): number {
    return this.waiters.length;
  }

  private acquire(holder: string): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      this.holder = holder;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.holder = holder;
        resolve();
      });
    });
  }

  private release(): void {
    const grant = this.waiters.shift();
    if (grant) {
      grant();
      return;
    }
    this.locked = false;
    this.holder = undefined;
  }
}

/**
 * At most one task runs at a time; callers that arrive while it is busy wait in
 * arrival order. Release hands ownership straight to the next waiter so a new
 * caller can never jump the queue.
 */
export class SingleFlight {
  private busy = false;
  private readonly waiters: Array<() => void> = [];

  private async acquire(): Promise<void> {
    if (!this.busy) {
      this.busy = true;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release() {
    const next = this.waiters.shift();
    if (next) next();
    else this.busy = false;
  }

  async run<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get active(): boolean {
    return this.busy;
  }

  get pending(): number {
    return this.waiters.length;
  }
}

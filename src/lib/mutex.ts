/**
 * Async mutex: one holder at a time, waiters served in arrival order.
 * Usage: await mutex.runExclusive(async () => { ... })
 */
export class Mutex {
  private waiters: Array<() => void> = [];
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    // ownership passes straight to the next waiter
    if (next) next();
    else this.held = false;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

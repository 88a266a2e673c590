interface Waiter {
  resolve: () => void;
}

/**
 * Single-writer lock for cache mutations that span awaits. Waiters are
 * served in arrival order; reads never take it.
 */
export class WriteLock {
  private held = false;
  private readonly waiting: Waiter[] = [];

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push({ resolve });
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next.resolve();
      return;
    }
    this.held = false;
  }
}

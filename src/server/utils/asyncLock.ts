/**
 * Promise-based mutex.
 *
 * Callers queue behind the previous holder; `runExclusive` releases the lock
 * whether the critical section resolves or throws.
 */
export class AsyncLock {
  private lock: Promise<void> = Promise.resolve();

  async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const previousLock = this.lock;
    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previousLock;
    return release;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

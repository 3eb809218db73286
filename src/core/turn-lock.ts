// TurnLock: one agent turn at a time against the shared engine session

export class TurnLock {
  private current: Promise<void> | null = null;

  /**
   * Acquire the lock. Returns a release function.
   * If the lock is already held, waits for it to release first.
   */
  async acquire(): Promise<() => void> {
    while (this.current) {
      await this.current;
    }

    let release!: () => void;
    this.current = new Promise<void>((resolve) => {
      release = () => {
        this.current = null;
        resolve();
      };
    });
    return release;
  }

  /** Run `fn` while holding the lock. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.current !== null;
  }
}

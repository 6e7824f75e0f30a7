/**
 * Promise-chain lock. Callers queue in arrival order; a callback that throws releases the
 * lock and rethrows to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get isLocked(): boolean {
    return this.held;
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    this.held = true;
    try {
      return await task();
    } finally {
      this.held = false;
      release();
    }
  }
}

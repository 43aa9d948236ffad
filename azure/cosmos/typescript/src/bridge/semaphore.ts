/**
 * Counting semaphore used by the bridge's worker dispatcher.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  /**
   * Acquire a permit, waiting if necessary
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Release a permit, potentially unblocking a waiting caller
   */
  release(): void {
    this.permits++;
    const resolve = this.waiting.shift();
    if (resolve) {
      this.permits--;
      resolve();
    }
  }

  /** Number of callers waiting for a permit */
  get pending(): number {
    return this.waiting.length;
  }

  /** Permits currently free */
  get available(): number {
    return this.permits;
  }
}

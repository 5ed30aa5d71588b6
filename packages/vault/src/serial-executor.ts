/**
 * Serial Executor — single-writer queue.
 *
 * Runs submitted operations one at a time in FIFO order. An operation
 * starts only after the previous one has settled, so each one observes
 * the state its predecessor committed or rolled back.
 *
 * No timeouts and no cancellation: a queued operation always runs.
 */

export interface SerialExecutorStats {
  /** 1 while an operation runs, else 0 */
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly totalExecuted: number;
  readonly totalFailed: number;
}

export class SerialExecutor {
  private active = false;
  private readonly queue: Array<() => void> = [];
  private totalExecuted = 0;
  private totalFailed = 0;

  /**
   * Submit an operation. Resolves or rejects with the operation's own result.
   */
  run<T>(operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.execute(operation).then(resolve, reject);
      });
      this.processQueue();
    });
  }

  getStats(): SerialExecutorStats {
    return {
      activeCount: this.active ? 1 : 0,
      queuedCount: this.queue.length,
      totalExecuted: this.totalExecuted,
      totalFailed: this.totalFailed,
    };
  }

  /** True when nothing is running or waiting */
  get idle(): boolean {
    return !this.active && this.queue.length === 0;
  }

  private async execute<T>(operation: () => Promise<T>): Promise<T> {
    try {
      const result = await operation();
      this.totalExecuted++;
      return result;
    } catch (error) {
      this.totalFailed++;
      throw error;
    } finally {
      this.active = false;
      this.processQueue();
    }
  }

  private processQueue(): void {
    if (this.active) {
      return;
    }

    const next = this.queue.shift();
    if (!next) {
      return;
    }

    this.active = true;
    next();
  }
}

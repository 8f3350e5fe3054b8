/**
 * CommandWorkerPool - bounded fan-out for command execution.
 *
 * At most `size` tasks run at once; further tasks wait in FIFO order.
 * The orchestrator awaits each task's promise, so a slow subprocess only
 * occupies one slot and never blocks the control flow of other targets.
 */
export class CommandWorkerPool {
  readonly size: number;
  private running = 0;
  private queue: Array<() => void> = [];

  constructor(size: number = 5) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /** Tasks currently holding a slot */
  get active(): number {
    return this.running;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Runs `task` once a slot is free. The task's result or rejection is
   * passed through unchanged.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.size) {
      this.running++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  private release(): void {
    this.running--;
    const next = this.queue.shift();
    if (next) next();
  }
}

/**
 * Bounded task pool. At most `size` tasks run at once; the rest wait in
 * FIFO order. Used to keep slow actions off the dispatch loop.
 */

export class WorkerPool {
  private running = 0;
  private readonly backlog: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`pool size must be a positive integer, got ${size}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.backlog.length;
  }

  /** Run `task` when a slot is free. The returned promise settles with the task. */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.running++;
        Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.next();
          });
      };
      if (this.running < this.size) start();
      else this.backlog.push(start);
    });
  }

  /** Resolves once nothing is running or queued. */
  idle(): Promise<void> {
    if (this.running === 0 && this.backlog.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private next(): void {
    const start = this.backlog.shift();
    if (start) {
      start();
      return;
    }
    if (this.running === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}

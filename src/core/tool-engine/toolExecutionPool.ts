/**
 * Caps how many invocations of one batch run at once. Tasks beyond the cap wait in FIFO order.
 */

export type PooledTask<T> = () => Promise<T>;

interface Queued {
  start: () => void;
}

export class InvocationPool {
  private readonly maxConcurrent: number;
  private readonly queue: Queued[] = [];
  private runningCount = 0;

  constructor(maxConcurrent: number) {
    this.maxConcurrent = Math.max(1, maxConcurrent);
  }

  run<T>(task: PooledTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => {
          void task()
            .then(resolve, reject)
            .finally(() => {
              this.runningCount--;
              this.tryRunNext();
            });
        },
      });
      this.tryRunNext();
    });
  }

  /**
   * Runs every task under the cap; results keep the input order whatever the completion order.
   */
  all<T>(tasks: PooledTask<T>[]): Promise<T[]> {
    return Promise.all(tasks.map((t) => this.run(t)));
  }

  get running(): number {
    return this.runningCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  private tryRunNext(): void {
    while (this.runningCount < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) return;
      this.runningCount++;
      next.start();
    }
  }
}

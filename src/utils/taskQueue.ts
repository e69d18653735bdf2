interface PendingTask {
  run: () => Promise<void>;
}

/** Runs queued async tasks with at most `concurrency` in flight. */
export class BoundedTaskQueue {
  private running = 0;

  private readonly pending: PendingTask[] = [];

  constructor(private readonly concurrency: number = 1) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Task queue concurrency must be a positive integer, got ${concurrency}.`);
    }
  }

  get activeCount(): number {
    return this.running;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });
      this.pump();
    });
  }

  private pump(): void {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) {
        return;
      }
      this.running += 1;
      void next.run().finally(() => {
        this.running -= 1;
        this.pump();
      });
    }
  }
}

type QueueItem = {
  start: () => void;
};

/**
 * FIFO concurrency gate in front of the external generative services.
 * Every pipeline run shares one instance, so concurrent runs never fan out past `concurrency` calls.
 */
export class GenerationLimiter {
  readonly concurrency: number;
  private active = 0;
  private readonly queue: QueueItem[] = [];

  constructor(options?: { concurrency?: number }) {
    this.concurrency = Math.max(1, Math.floor(options?.concurrency ?? 1));
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => {
          this.active += 1;
          void Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              this.active -= 1;
              this.drain();
            });
        }
      });
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      next.start();
    }
  }
}

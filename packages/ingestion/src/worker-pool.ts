export type WorkerTask = () => Promise<void>;

export type KeyedWorkerPoolOptions = {
  concurrency: number;
  onTaskError: (key: string, error: unknown) => void;
};

type QueuedTask = {
  key: string;
  task: WorkerTask;
};

/**
 * Bounded pool that runs at most `concurrency` tasks at once and never two
 * tasks with the same key at the same time. Same-key tasks run in submit order.
 */
export class KeyedWorkerPool {
  private readonly concurrency: number;
  private readonly onTaskError: (key: string, error: unknown) => void;
  private readonly queue: QueuedTask[] = [];
  private readonly runningKeys = new Set<string>();
  private idleWaiters: Array<() => void> = [];

  constructor(options: KeyedWorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error("Worker pool concurrency must be a positive integer.");
    }
    this.concurrency = options.concurrency;
    this.onTaskError = options.onTaskError;
  }

  get activeCount(): number {
    return this.runningKeys.size;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  submit(key: string, task: WorkerTask): void {
    this.queue.push({ key, task });
    this.schedule();
  }

  /** Resolves once every submitted task has settled. */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private schedule(): void {
    let index = 0;
    while (this.runningKeys.size < this.concurrency && index < this.queue.length) {
      const candidate = this.queue[index];
      if (this.runningKeys.has(candidate.key)) {
        index += 1;
        continue;
      }
      this.queue.splice(index, 1);
      this.start(candidate);
    }
  }

  private start(queued: QueuedTask): void {
    this.runningKeys.add(queued.key);
    void this.run(queued).finally(() => {
      this.runningKeys.delete(queued.key);
      this.schedule();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
          resolve();
        }
      }
    });
  }

  private async run(queued: QueuedTask): Promise<void> {
    try {
      await queued.task();
    } catch (error) {
      this.onTaskError(queued.key, error);
    }
  }

  private isIdle(): boolean {
    return this.runningKeys.size === 0 && this.queue.length === 0;
  }
}

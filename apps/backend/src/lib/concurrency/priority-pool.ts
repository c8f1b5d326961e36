export type TaskPriority = "query" | "background";

export class QueueFullError extends Error {
  constructor(readonly priority: TaskPriority, readonly limit: number) {
    super(`Worker queue full (${priority}, limit ${limit})`);
    this.name = "QueueFullError";
  }
}

interface QueuedTask {
  start: () => void;
}

export interface PriorityPoolStatus {
  active: number;
  queued: { query: number; background: number };
}

/**
 * Bounded worker pool with two lanes. Interactive ("query") work is always
 * dequeued before background work, and each lane has its own depth cap so a
 * burst of background submissions is rejected instead of growing without
 * bound.
 */
export class PriorityWorkerPool {
  private active = 0;
  private lanes: Record<TaskPriority, QueuedTask[]> = {
    query: [],
    background: [],
  };

  constructor(
    private readonly options: { concurrency: number; queueLimit: number },
  ) {
    if (options.concurrency < 1) {
      throw new Error("Pool concurrency must be at least 1");
    }
  }

  run<T>(task: () => Promise<T>, priority: TaskPriority = "background"): Promise<T> {
    const lane = this.lanes[priority];
    if (this.active >= this.options.concurrency && lane.length >= this.options.queueLimit) {
      return Promise.reject(new QueueFullError(priority, this.options.queueLimit));
    }

    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        void task()
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.drain();
          });
      };

      if (this.active < this.options.concurrency) {
        start();
      } else {
        lane.push({ start });
      }
    });
  }

  getStatus(): PriorityPoolStatus {
    return {
      active: this.active,
      queued: {
        query: this.lanes.query.length,
        background: this.lanes.background.length,
      },
    };
  }

  private drain(): void {
    while (this.active < this.options.concurrency) {
      const next = this.lanes.query.shift() ?? this.lanes.background.shift();
      if (!next) return;
      next.start();
    }
  }
}

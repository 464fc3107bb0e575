// =============================================================================
// TaskPool — Bounded cooperative task pool with per-lane mutual exclusion
// =============================================================================

// ── Types ────────────────────────────────────────────────────────────────────

export interface TaskPoolConfig {
  /** Maximum number of tasks running at once, across all lanes. */
  maxConcurrency: number;
}

export interface TaskPoolMetrics {
  activeTasks: number;
  queueDepth: number;
  totalCompleted: number;
  totalFailed: number;
  totalDiscarded: number;
}

export class TaskDiscardedError extends Error {
  constructor(readonly taskId: string) {
    super(`Task "${taskId}" was discarded before it started`);
    this.name = "TaskDiscardedError";
  }
}

interface PoolTask {
  readonly id: string;
  readonly lane: string;
  /** Runs the work and returns the callback that settles the submitter's promise. */
  readonly work: () => Promise<() => void>;
  readonly fail: (error: unknown) => void;
}

const DEFAULT_POOL_CONFIG: TaskPoolConfig = {
  maxConcurrency: 8,
};

// ── Implementation ───────────────────────────────────────────────────────────

/**
 * Tasks sharing a lane never overlap; tasks on different lanes run concurrently
 * up to `maxConcurrency`. Queued tasks start in submission order, skipping those
 * whose lane is busy.
 */
export class TaskPool {
  private readonly queue: PoolTask[] = [];
  private readonly busyLanes = new Set<string>();
  private readonly config: TaskPoolConfig;

  private active = 0;
  private closed = false;
  private totalCompleted = 0;
  private totalFailed = 0;
  private totalDiscarded = 0;

  constructor(config?: Partial<TaskPoolConfig>) {
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    if (this.config.maxConcurrency < 1) {
      throw new Error("TaskPool maxConcurrency must be at least 1");
    }
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  submit<R>(lane: string, id: string, work: () => Promise<R>): Promise<R> {
    if (this.closed) {
      return Promise.reject(new TaskDiscardedError(id));
    }
    return new Promise<R>((resolve, reject) => {
      this.queue.push({
        id,
        lane,
        work: async () => {
          const result = await work();
          return () => resolve(result);
        },
        fail: reject,
      });
      this.pump();
    });
  }

  /** Stops accepting work and rejects every queued task with {@link TaskDiscardedError}. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const discarded = this.queue.splice(0, this.queue.length);
    for (const task of discarded) {
      this.totalDiscarded++;
      task.fail(new TaskDiscardedError(task.id));
    }
  }

  getMetrics(): TaskPoolMetrics {
    return {
      activeTasks: this.active,
      queueDepth: this.queue.length,
      totalCompleted: this.totalCompleted,
      totalFailed: this.totalFailed,
      totalDiscarded: this.totalDiscarded,
    };
  }

  // ── Scheduling ─────────────────────────────────────────────────────────────

  private pump(): void {
    while (this.active < this.config.maxConcurrency) {
      const index = this.queue.findIndex((t) => !this.busyLanes.has(t.lane));
      if (index < 0) return;
      const [task] = this.queue.splice(index, 1);
      this.run(task);
    }
  }

  private run(task: PoolTask): void {
    this.active++;
    this.busyLanes.add(task.lane);

    const settle = (): void => {
      this.active--;
      this.busyLanes.delete(task.lane);
      this.pump();
    };

    void task
      .work()
      .then(
        (deliver) => {
          this.totalCompleted++;
          settle();
          deliver();
        },
        (error: unknown) => {
          this.totalFailed++;
          settle();
          task.fail(error);
        },
      );
  }
}

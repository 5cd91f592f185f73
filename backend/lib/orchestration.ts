import { LoggingWrapper } from "./logging.js";

export type RenderJob = () => Promise<void>;

interface QueuedJob {
  taskId: string;
  run: RenderJob;
}

/**
 * FIFO queue that runs at most `concurrency` render jobs at a time.
 * Submitting never blocks; a job's failure is logged and does not stop
 * the queue.
 */
export class RenderQueue {
  private readonly pending: QueuedJob[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly logger = new LoggingWrapper("render-queue");

  constructor(private readonly concurrency = 1) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Render concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get size(): number {
    return this.pending.length;
  }

  get running(): number {
    return this.active;
  }

  submit(taskId: string, run: RenderJob): void {
    this.pending.push({ taskId, run });
    this.logger.info("Render task queued", {
      taskId,
      queued: this.pending.length,
      active: this.active,
    });
    this.drain();
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain() {
    while (this.active < this.concurrency && this.pending.length > 0) {
      const job = this.pending.shift();
      if (!job) {
        break;
      }
      this.active++;
      // Start on a later tick so submit() returns before work begins
      setImmediate(() => {
        this.execute(job).catch(error => {
          this.logger.error("Render queue bookkeeping failed", {
            taskId: job.taskId,
            error: error instanceof Error ? error.message : String(error),
          });
        });
      });
    }
  }

  private async execute(job: QueuedJob) {
    try {
      await job.run();
    } catch (error) {
      this.logger.error("Render task threw outside the pipeline", {
        taskId: job.taskId,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.active--;
      this.drain();
      if (this.active === 0 && this.pending.length === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
      }
    }
  }
}

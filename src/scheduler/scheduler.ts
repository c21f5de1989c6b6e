import type { JobId } from "../core/ids.js";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import type { JobQueue } from "./jobQueue.js";

export type JobRunner = (jobId: JobId) => Promise<void>;

/**
 * Runs queued jobs on a fixed number of slots. Dispatch happens when a job is
 * enqueued and when a slot frees up; running jobs are never preempted.
 */
export class Scheduler {
  private readonly running = new Map<JobId, Promise<void>>();
  private started = false;
  private idleWaiters: Array<() => void> = [];
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      queue: JobQueue;
      maxConcurrentJobs: number;
      runJob: JobRunner;
      logger?: Logger;
    }
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  get activeCount(): number {
    return this.running.size;
  }

  isRunning(jobId: JobId): boolean {
    return this.running.has(jobId);
  }

  submit(jobId: JobId, priority: number): void {
    this.deps.queue.enqueue(jobId, priority);
    this.dispatch();
  }

  /** Drops a job that has not started yet. */
  withdraw(jobId: JobId): boolean {
    return this.deps.queue.remove(jobId);
  }

  start(): void {
    this.started = true;
    this.dispatch();
  }

  /** Stops taking work from the queue. Running jobs are left to finish. */
  pause(): void {
    this.started = false;
  }

  async waitForIdle(): Promise<void> {
    if (this.running.size === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private dispatch(): void {
    while (this.started && this.running.size < this.deps.maxConcurrentJobs) {
      const entry = this.deps.queue.dequeue();
      if (!entry) return;
      this.launch(entry.jobId);
    }
  }

  private launch(jobId: JobId): void {
    const task = Promise.resolve()
      .then(() => this.deps.runJob(jobId))
      .catch((e: unknown) => {
        this.logger.error("scheduler.job_crashed", `runner for ${jobId} threw: ${errorMessage(e)}`, { job_id: jobId });
      })
      .finally(() => {
        this.running.delete(jobId);
        this.dispatch();
        if (this.running.size === 0) {
          const waiters = this.idleWaiters;
          this.idleWaiters = [];
          for (const w of waiters) w();
        }
      });
    this.running.set(jobId, task);
  }
}

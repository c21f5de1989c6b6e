import type { JobId } from "../core/ids.js";
import { JobServiceError } from "../core/errors.js";
import { MAX_PRIORITY } from "../core/job.js";

export interface QueueEntry {
  jobId: JobId;
  priority: number;
  enqueuedAtMs: number;
  seq: number;
}

export interface JobQueueOptions {
  maxQueuedJobs: number;
  /** 0 disables aging. */
  agingIntervalSeconds?: number;
  nowMs?: () => number;
}

/**
 * Bounded pending queue. Higher effective priority first; FIFO among equals.
 * The queue holds ids only; the record store owns job state.
 */
export class JobQueue {
  private readonly entries: QueueEntry[] = [];
  private nextSeq = 0;

  constructor(private readonly opts: JobQueueOptions) {}

  get size(): number {
    return this.entries.length;
  }

  private nowMs(): number {
    return this.opts.nowMs?.() ?? Date.now();
  }

  effectivePriority(entry: QueueEntry, nowMs: number = this.nowMs()): number {
    const interval = this.opts.agingIntervalSeconds ?? 0;
    if (interval <= 0) return entry.priority;
    const waitedSeconds = Math.max(0, nowMs - entry.enqueuedAtMs) / 1000;
    return Math.min(MAX_PRIORITY, entry.priority + Math.floor(waitedSeconds / interval));
  }

  /** Throws QueueFull when at capacity. */
  assertCapacity(): void {
    if (this.entries.length >= this.opts.maxQueuedJobs) {
      throw new JobServiceError("QueueFull", `queue is full (${this.opts.maxQueuedJobs} pending jobs)`);
    }
  }

  /** `force` admits past capacity; used when re-queuing jobs after a restart. */
  enqueue(jobId: JobId, priority: number, opts: { force?: boolean } = {}): QueueEntry {
    if (!opts.force) this.assertCapacity();
    if (this.has(jobId)) {
      throw new Error(`job already queued: ${jobId}`);
    }
    const entry: QueueEntry = { jobId, priority, enqueuedAtMs: this.nowMs(), seq: this.nextSeq++ };
    this.entries.push(entry);
    return entry;
  }

  has(jobId: JobId): boolean {
    return this.entries.some((e) => e.jobId === jobId);
  }

  remove(jobId: JobId): boolean {
    const idx = this.entries.findIndex((e) => e.jobId === jobId);
    if (idx < 0) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  /** Entries in dispatch order as of `nowMs`. */
  ordered(nowMs: number = this.nowMs()): QueueEntry[] {
    return [...this.entries].sort((a, b) => {
      const pa = this.effectivePriority(a, nowMs);
      const pb = this.effectivePriority(b, nowMs);
      if (pa !== pb) return pb - pa;
      return a.seq - b.seq;
    });
  }

  dequeue(): QueueEntry | undefined {
    const next = this.ordered()[0];
    if (next) this.remove(next.jobId);
    return next;
  }

  /** 1-based position in dispatch order, or null when not queued. */
  position(jobId: JobId): number | null {
    const idx = this.ordered().findIndex((e) => e.jobId === jobId);
    return idx < 0 ? null : idx + 1;
  }
}

import type { JobId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { JobPatch, JobRecord, JobRequest, JobState } from "../core/job.js";
import { JobServiceError, errorMessage } from "../core/errors.js";
import { canTransition, isTerminal, jobInvariantViolations } from "../core/jobState.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";

export const MAX_LIST_LIMIT = 500;

/** Where the store mirrors its writes. Calls arrive in the order the writes happened. */
export interface JobCheckpoint {
  saveJob(job: JobRecord): Promise<void>;
  deleteJob(jobId: JobId): Promise<void>;
  addJobEvent(jobId: JobId, kind: string, message: string, data: JsonObject | null): Promise<void>;
  loadJobs(): Promise<JobRecord[]>;
}

export interface JobListFilter {
  states?: JobState[];
  tags?: string[];
  limit?: number;
}

interface Slot {
  job: JobRecord;
  seq: number;
}

// Snapshots handed out are private copies; callers cannot reach the stored record.
function freeze(job: JobRecord): JobRecord {
  return Object.freeze({
    ...job,
    request: Object.freeze({
      ...job.request,
      databases: [...job.request.databases],
      outputFormats: [...job.request.outputFormats],
      tags: [...job.request.tags]
    }),
    resultRef: job.resultRef
      ? Object.freeze({ resultDir: job.resultRef.resultDir, files: job.resultRef.files.map((f) => Object.freeze({ ...f })) })
      : null,
    error: job.error ? Object.freeze({ ...job.error }) : null
  });
}

const PATCH_KEYS = ["state", "startedAt", "finishedAt", "workspacePath", "resultRef", "error", "cancelRequested"] as const;
const MUTABLE_AFTER_TERMINAL = new Set<keyof JobPatch>(["workspacePath"]);

/**
 * In-memory job table shared by the facade and the executor. Every mutation
 * builds a complete next record, validates it and swaps it in, so a reader
 * sees either the previous or the next state of a job and nothing in between.
 */
export class JobRecordStore {
  private readonly jobs = new Map<string, Slot>();
  private nextSeq = 0;
  private writes: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(private readonly opts: { checkpoint?: JobCheckpoint | null; logger?: Logger; now?: () => Date } = {}) {
    this.logger = opts.logger ?? silentLogger;
  }

  private now(): string {
    return (this.opts.now?.() ?? new Date()).toISOString();
  }

  create(input: { jobId: JobId; priority: number; request: JobRequest; inputSizeBytes: number }): JobRecord {
    if (this.jobs.has(input.jobId)) {
      throw new Error(`duplicate job id: ${input.jobId}`);
    }
    const job = freeze({
      jobId: input.jobId,
      state: "PENDING",
      priority: input.priority,
      submittedAt: this.now(),
      startedAt: null,
      finishedAt: null,
      request: input.request,
      inputSizeBytes: input.inputSizeBytes,
      workspacePath: null,
      resultRef: null,
      error: null,
      cancelRequested: false
    });
    this.assertConsistent(job);
    this.jobs.set(job.jobId, { job, seq: this.nextSeq++ });
    this.persist(job);
    return job;
  }

  /** Reinstates a record loaded from a checkpoint. */
  restore(job: JobRecord): JobRecord {
    if (this.jobs.has(job.jobId)) {
      throw new Error(`duplicate job id: ${job.jobId}`);
    }
    const frozen = freeze(job);
    this.assertConsistent(frozen);
    this.jobs.set(frozen.jobId, { job: frozen, seq: this.nextSeq++ });
    return frozen;
  }

  find(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId)?.job;
  }

  get(jobId: string): JobRecord {
    const job = this.find(jobId);
    if (!job) throw new JobServiceError("JobNotFound", `unknown job_id: ${jobId}`);
    return job;
  }

  update(jobId: JobId, patch: JobPatch): JobRecord {
    const slot = this.jobs.get(jobId);
    if (!slot) throw new JobServiceError("JobNotFound", `unknown job_id: ${jobId}`);
    const next = this.applyPatch(slot.job, patch);
    slot.job = next;
    this.persist(next);
    return next;
  }

  /** Applies `patch` only if the job is currently in one of `expected`; returns null otherwise. */
  compareAndUpdate(jobId: JobId, expected: readonly JobState[], patch: JobPatch): JobRecord | null {
    const slot = this.jobs.get(jobId);
    if (!slot) throw new JobServiceError("JobNotFound", `unknown job_id: ${jobId}`);
    if (!expected.includes(slot.job.state)) return null;
    return this.update(jobId, patch);
  }

  remove(jobId: JobId): boolean {
    const existed = this.jobs.delete(jobId);
    if (existed) {
      this.enqueueWrite(`delete ${jobId}`, (cp) => cp.deleteJob(jobId));
    }
    return existed;
  }

  list(filter: JobListFilter = {}): JobRecord[] {
    const limit = Math.max(1, Math.min(filter.limit ?? 20, MAX_LIST_LIMIT));
    const states = filter.states && filter.states.length > 0 ? new Set(filter.states) : null;
    const tags = filter.tags && filter.tags.length > 0 ? filter.tags : null;

    const slots = [...this.jobs.values()].filter(({ job }) => {
      if (states && !states.has(job.state)) return false;
      if (tags && !tags.every((t) => job.request.tags.includes(t))) return false;
      return true;
    });

    slots.sort((a, b) => {
      if (a.job.submittedAt !== b.job.submittedAt) return a.job.submittedAt < b.job.submittedAt ? 1 : -1;
      return b.seq - a.seq;
    });
    return slots.slice(0, limit).map((s) => s.job);
  }

  all(): JobRecord[] {
    return [...this.jobs.values()].map((s) => s.job);
  }

  addEvent(jobId: JobId, kind: string, message: string, data: JsonObject | null = null): void {
    this.logger.info(kind, message, { job_id: jobId, ...(data ?? {}) });
    this.enqueueWrite(`event ${kind} for ${jobId}`, (cp) => cp.addJobEvent(jobId, kind, message, data));
  }

  /** Resolves once every checkpoint write issued so far has settled. */
  async flush(): Promise<void> {
    await this.writes;
  }

  private applyPatch(current: JobRecord, patch: JobPatch): JobRecord {
    if (isTerminal(current.state)) {
      for (const key of PATCH_KEYS) {
        if (patch[key] === undefined) continue;
        if (!MUTABLE_AFTER_TERMINAL.has(key)) {
          throw new Error(`job ${current.jobId} is ${current.state}; ${key} can no longer change`);
        }
        if (patch[key] !== null) {
          throw new Error(`job ${current.jobId} is ${current.state}; ${key} can only be cleared`);
        }
      }
    }

    if (patch.state !== undefined && patch.state !== current.state && !canTransition(current.state, patch.state)) {
      throw new Error(`illegal transition for ${current.jobId}: ${current.state} -> ${patch.state}`);
    }

    if (patch.cancelRequested === false && current.cancelRequested) {
      throw new Error(`cancelRequested cannot be cleared for ${current.jobId}`);
    }

    const next = freeze({
      ...current,
      state: patch.state ?? current.state,
      startedAt: patch.startedAt !== undefined ? patch.startedAt : current.startedAt,
      finishedAt: patch.finishedAt !== undefined ? patch.finishedAt : current.finishedAt,
      workspacePath: patch.workspacePath !== undefined ? patch.workspacePath : current.workspacePath,
      resultRef: patch.resultRef !== undefined ? patch.resultRef : current.resultRef,
      error: patch.error !== undefined ? patch.error : current.error,
      cancelRequested: patch.cancelRequested ?? current.cancelRequested
    });
    this.assertConsistent(next);
    return next;
  }

  private assertConsistent(job: JobRecord): void {
    const problems = jobInvariantViolations(job);
    if (problems.length > 0) {
      throw new Error(`inconsistent job ${job.jobId}: ${problems.join("; ")}`);
    }
  }

  private persist(job: JobRecord): void {
    this.enqueueWrite(`save ${job.jobId}`, (cp) => cp.saveJob(job));
  }

  private enqueueWrite(what: string, write: (checkpoint: JobCheckpoint) => Promise<void>): void {
    const checkpoint = this.opts.checkpoint;
    if (!checkpoint) return;
    this.writes = this.writes
      .then(() => write(checkpoint))
      .catch((e: unknown) => {
        this.logger.error("checkpoint.write_failed", `${what}: ${errorMessage(e)}`);
      });
  }
}

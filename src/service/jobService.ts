import path from "path";
import type { ResultStore } from "../artifacts/resultStore.js";
import { JobServiceError, errorMessage } from "../core/errors.js";
import { newJobId, type JobId } from "../core/ids.js";
import {
  DEFAULT_PRIORITY,
  MAX_PRIORITY,
  MIN_PRIORITY,
  OUTPUT_FORMATS,
  toJobSummary,
  type JobErrorDetail,
  type JobRecord,
  type JobRequest,
  type JobState,
  type JobSummary,
  type OutputFormat,
  type ResultRef
} from "../core/job.js";
import { isTerminal } from "../core/jobState.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import type { ResourceGuard } from "../execution/resourceGuard.js";
import type { WorkspaceManager } from "../execution/workspace.js";
import type { JobExecutor } from "../executor/jobExecutor.js";
import type { CompletionNotifier } from "../notify/notifier.js";
import type { JobQueue } from "../scheduler/jobQueue.js";
import type { Scheduler } from "../scheduler/scheduler.js";
import type { JobCheckpoint, JobRecordStore } from "../store/jobRecordStore.js";
import { MAX_LIST_LIMIT } from "../store/jobRecordStore.js";

export interface SubmitInput {
  inputFile: string;
  databases?: string[];
  outputFormats?: string[];
  goterms?: boolean;
  pathways?: boolean;
  priority?: number;
  tags?: string[];
  notificationEmail?: string | null;
}

export interface SubmitReceipt {
  jobId: JobId;
  state: JobState;
  priority: number;
  submittedAt: string;
  queuePosition: number | null;
}

export interface JobProgress {
  queuePosition: number | null;
  elapsedSeconds: number | null;
  timeoutSeconds: number | null;
  message: string;
}

export interface JobStatus {
  jobId: JobId;
  state: JobState;
  priority: number;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  cancelRequested: boolean;
  tags: string[];
  error: JobErrorDetail | null;
  progress: JobProgress;
}

export interface CancelAck {
  jobId: JobId;
  state: JobState;
  cancelRequested: boolean;
  alreadyTerminal: boolean;
}

export interface ListFilter {
  state?: JobState;
  tags?: string[];
  limit?: number;
}

export interface RestoreSummary {
  restored: number;
  requeued: number;
  interrupted: number;
}

const DATABASE_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const TAG_RE = /^[\w.:-]{1,64}$/;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MAX_PREVIEW_BYTES = 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

function normalizeRequest(input: SubmitInput): JobRequest {
  const inputFile = input.inputFile.trim();
  if (!inputFile) {
    throw new JobServiceError("InvalidRequest", "input_file is required");
  }

  const databases = unique((input.databases ?? []).map((d) => d.trim()).filter((d) => d.length > 0));
  const badDb = databases.find((d) => !DATABASE_NAME_RE.test(d));
  if (badDb !== undefined) {
    throw new JobServiceError("InvalidRequest", `invalid database name: ${badDb}`);
  }

  const rawFormats = (input.outputFormats ?? []).map((f) => f.trim().toLowerCase()).filter((f) => f.length > 0);
  const outputFormats: OutputFormat[] = [];
  for (const f of rawFormats.length > 0 ? rawFormats : ["tsv"]) {
    if (!isOutputFormat(f)) {
      throw new JobServiceError("InvalidRequest", `unsupported output format: ${f} (expected one of ${OUTPUT_FORMATS.join(", ")})`);
    }
    if (!outputFormats.includes(f)) outputFormats.push(f);
  }

  const tags = unique((input.tags ?? []).map((t) => t.trim()).filter((t) => t.length > 0));
  const badTag = tags.find((t) => !TAG_RE.test(t));
  if (badTag !== undefined) {
    throw new JobServiceError("InvalidRequest", `invalid tag: ${badTag}`);
  }

  const email = input.notificationEmail?.trim() || null;
  if (email !== null && !EMAIL_RE.test(email)) {
    throw new JobServiceError("InvalidRequest", `invalid notification_email: ${email}`);
  }

  return {
    inputFile: path.resolve(inputFile),
    databases,
    outputFormats,
    goterms: input.goterms ?? true,
    pathways: input.pathways ?? true,
    notificationEmail: email,
    tags
  };
}

function checkPriority(priority: number | undefined): number {
  const p = priority ?? DEFAULT_PRIORITY;
  if (!Number.isInteger(p) || p < MIN_PRIORITY || p > MAX_PRIORITY) {
    throw new JobServiceError("InvalidPriority", `priority must be an integer in [${MIN_PRIORITY}, ${MAX_PRIORITY}], got ${p}`);
  }
  return p;
}

export interface JobServiceDeps {
  store: JobRecordStore;
  queue: JobQueue;
  scheduler: Scheduler;
  executor: JobExecutor;
  guard: ResourceGuard;
  workspaces: WorkspaceManager;
  results: ResultStore;
  notifier: CompletionNotifier;
  listDefaultLimit: number;
  resultRetentionDays: number;
  retentionSweepSeconds: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Caller-facing job operations. Nothing here waits on a job: submit returns
 * once the input has been checked and the job is queued; the other calls are
 * reads or single writes against the record store.
 */
export class JobService {
  private readonly logger: Logger;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly deps: JobServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  async submit(input: SubmitInput): Promise<SubmitReceipt> {
    const request = normalizeRequest(input);
    const priority = checkPriority(input.priority);
    this.deps.queue.assertCapacity();

    const inputSizeBytes = await this.deps.guard.validateSize(request.inputFile);
    // The queue may have filled while the file was checked.
    this.deps.queue.assertCapacity();

    const job = this.deps.store.create({ jobId: newJobId(), priority, request, inputSizeBytes });
    this.deps.store.addEvent(job.jobId, "job.submitted", "job accepted", {
      priority,
      input_size_bytes: inputSizeBytes,
      output_formats: request.outputFormats
    });
    this.deps.scheduler.submit(job.jobId, priority);

    return {
      jobId: job.jobId,
      state: job.state,
      priority: job.priority,
      submittedAt: job.submittedAt,
      queuePosition: this.deps.queue.position(job.jobId)
    };
  }

  status(jobId: string): JobStatus {
    const job = this.deps.store.get(jobId);
    return {
      jobId: job.jobId,
      state: job.state,
      priority: job.priority,
      submittedAt: job.submittedAt,
      startedAt: job.startedAt,
      finishedAt: job.finishedAt,
      cancelRequested: job.cancelRequested,
      tags: [...job.request.tags],
      error: job.error,
      progress: this.progress(job)
    };
  }

  result(jobId: string): ResultRef {
    const job = this.deps.store.get(jobId);
    switch (job.state) {
      case "PENDING":
      case "RUNNING":
        throw new JobServiceError("ResultNotReady", `job ${job.jobId} is ${job.state}; poll get_job_status and try again`);
      case "CANCELLED":
        throw new JobServiceError("Cancelled", `job ${job.jobId} was cancelled`);
      case "FAILED":
      case "TIMED_OUT": {
        const err = job.error;
        if (!err) throw new Error(`job ${job.jobId} is ${job.state} without an error`);
        throw new JobServiceError(err.kind, err.message, { exitCode: err.exitCode, stderrTail: err.stderrTail });
      }
      case "COMPLETED": {
        if (!job.resultRef) throw new Error(`job ${job.jobId} is COMPLETED without a result`);
        return job.resultRef;
      }
    }
  }

  async preview(
    jobId: string,
    opts: { fileName?: string; maxBytes: number; maxLines: number }
  ): Promise<{ fileName: string; preview: string; truncated: boolean }> {
    const ref = this.result(jobId);
    const fileName = opts.fileName ?? ref.files[0]?.name;
    if (fileName === undefined) {
      throw new JobServiceError("InvalidRequest", `job ${jobId} has no result files`);
    }
    if (!ref.files.some((f) => f.name === fileName)) {
      throw new JobServiceError("InvalidRequest", `job ${jobId} has no result file named ${fileName}`);
    }
    const maxBytes = Math.max(1, Math.min(opts.maxBytes, MAX_PREVIEW_BYTES));
    const maxLines = Math.max(1, opts.maxLines);
    const { preview, truncated } = await this.deps.results.readTextPreview(ref, fileName, { maxBytes, maxLines });
    return { fileName, preview, truncated };
  }

  cancel(jobId: string): CancelAck {
    const job = this.deps.store.get(jobId);
    if (isTerminal(job.state)) {
      return { jobId: job.jobId, state: job.state, cancelRequested: job.cancelRequested, alreadyTerminal: true };
    }

    if (job.state === "PENDING") {
      this.deps.scheduler.withdraw(job.jobId);
      const cancelled = this.deps.store.compareAndUpdate(job.jobId, ["PENDING"], {
        state: "CANCELLED",
        cancelRequested: true,
        finishedAt: this.now().toISOString()
      });
      if (cancelled) {
        this.deps.store.addEvent(job.jobId, "job.finished", "job CANCELLED before it started", { state: "CANCELLED", error_kind: null });
        this.deps.notifier.dispatch(cancelled);
        return { jobId: cancelled.jobId, state: cancelled.state, cancelRequested: true, alreadyTerminal: false };
      }
    }

    const current = this.deps.store.get(job.jobId);
    if (isTerminal(current.state)) {
      return { jobId: current.jobId, state: current.state, cancelRequested: current.cancelRequested, alreadyTerminal: true };
    }
    const flagged = current.cancelRequested ? current : this.deps.store.update(current.jobId, { cancelRequested: true });
    if (!current.cancelRequested) {
      this.deps.store.addEvent(current.jobId, "job.cancel_requested", "cancellation requested while running");
    }
    this.deps.executor.abort(current.jobId, "cancel");
    return { jobId: flagged.jobId, state: flagged.state, cancelRequested: true, alreadyTerminal: false };
  }

  list(filter: ListFilter = {}): JobSummary[] {
    const requested = filter.limit ?? this.deps.listDefaultLimit;
    const limit = Number.isFinite(requested) ? Math.max(1, Math.min(Math.floor(requested), MAX_LIST_LIMIT)) : this.deps.listDefaultLimit;
    return this.deps.store
      .list({ states: filter.state ? [filter.state] : undefined, tags: filter.tags, limit })
      .map(toJobSummary);
  }

  start(): void {
    this.deps.scheduler.start();
    if (this.sweepTimer === null) {
      this.sweepTimer = setInterval(() => {
        this.sweepExpired().catch((e: unknown) => {
          this.logger.error("retention.sweep_failed", errorMessage(e));
        });
      }, this.deps.retentionSweepSeconds * 1000);
      this.sweepTimer.unref();
    }
  }

  /**
   * Stops dispatching, interrupts running jobs and waits for them to settle.
   * Queued jobs stay PENDING in the checkpoint.
   */
  async stop(): Promise<void> {
    this.deps.scheduler.pause();
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const interrupted = this.deps.executor.abortAll("shutdown");
    if (interrupted > 0) {
      this.logger.info("service.stopping", `interrupting ${interrupted} running job(s)`);
    }
    await this.deps.scheduler.waitForIdle();
    await this.deps.notifier.flush();
    await this.deps.store.flush();
  }

  /** Loads checkpointed jobs. Call before start(). */
  async restore(checkpoint: JobCheckpoint): Promise<RestoreSummary> {
    const jobs = await checkpoint.loadJobs();
    const summary: RestoreSummary = { restored: 0, requeued: 0, interrupted: 0 };

    for (const job of jobs) {
      if (this.deps.store.find(job.jobId)) continue;
      this.deps.store.restore(job);
      summary.restored += 1;

      if (job.state === "PENDING") {
        this.deps.queue.enqueue(job.jobId, job.priority, { force: true });
        summary.requeued += 1;
      } else if (job.state === "RUNNING") {
        await this.interruptRestored(job);
        summary.interrupted += 1;
      }
    }

    this.logger.info("service.restored", `restored ${summary.restored} job(s)`, {
      requeued: summary.requeued,
      interrupted: summary.interrupted
    });
    return summary;
  }

  /** Removes terminal jobs finished more than the retention period ago. */
  async sweepExpired(now: Date = this.now()): Promise<JobId[]> {
    const cutoff = now.getTime() - this.deps.resultRetentionDays * DAY_MS;
    const removed: JobId[] = [];

    for (const job of this.deps.store.all()) {
      if (!isTerminal(job.state) || job.finishedAt === null) continue;
      if (Date.parse(job.finishedAt) > cutoff) continue;

      try {
        await this.deps.results.remove(job.jobId);
        if (job.workspacePath !== null) {
          await this.deps.workspaces.release(job.workspacePath);
        }
      } catch (e) {
        this.logger.warn("retention.remove_failed", `could not remove files of ${job.jobId}: ${errorMessage(e)}`, { job_id: job.jobId });
        continue;
      }
      this.deps.store.remove(job.jobId);
      removed.push(job.jobId);
    }

    if (removed.length > 0) {
      this.logger.info("retention.swept", `removed ${removed.length} expired job(s)`, { job_ids: removed });
    }
    return removed;
  }

  private async interruptRestored(job: JobRecord): Promise<void> {
    let current = this.deps.store.update(job.jobId, {
      state: "FAILED",
      finishedAt: this.now().toISOString(),
      error: { kind: "Interrupted", message: "gateway restarted while the job was running", exitCode: null, stderrTail: null }
    });
    this.deps.store.addEvent(job.jobId, "job.finished", "job FAILED after restart", { state: "FAILED", error_kind: "Interrupted" });

    if (current.workspacePath !== null) {
      try {
        await this.deps.workspaces.release(current.workspacePath);
        current = this.deps.store.update(job.jobId, { workspacePath: null });
      } catch (e) {
        this.logger.warn("workspace.release_failed", errorMessage(e), { job_id: job.jobId });
      }
    }
    this.deps.notifier.dispatch(current);
  }

  private progress(job: JobRecord): JobProgress {
    const timeoutSeconds = this.deps.guard.timeoutSeconds;
    switch (job.state) {
      case "PENDING": {
        const queuePosition = this.deps.queue.position(job.jobId);
        return {
          queuePosition,
          elapsedSeconds: null,
          timeoutSeconds: null,
          message: queuePosition === null ? "waiting for an execution slot" : `queued at position ${queuePosition}`
        };
      }
      case "RUNNING": {
        const startedMs = job.startedAt ? Date.parse(job.startedAt) : this.now().getTime();
        const elapsedSeconds = Math.max(0, Math.floor((this.now().getTime() - startedMs) / 1000));
        const suffix = job.cancelRequested ? "; cancellation requested" : "";
        return {
          queuePosition: null,
          elapsedSeconds,
          timeoutSeconds,
          message: `running for ${elapsedSeconds}s of ${timeoutSeconds}s allowed${suffix}`
        };
      }
      case "COMPLETED":
        return {
          queuePosition: null,
          elapsedSeconds: null,
          timeoutSeconds: null,
          message: `completed with ${job.resultRef?.files.length ?? 0} result file(s)`
        };
      case "FAILED":
      case "TIMED_OUT":
        return {
          queuePosition: null,
          elapsedSeconds: null,
          timeoutSeconds: null,
          message: job.error ? `${job.error.kind}: ${job.error.message}` : job.state
        };
      case "CANCELLED":
        return { queuePosition: null, elapsedSeconds: null, timeoutSeconds: null, message: "cancelled" };
    }
  }
}

import { promises as fs } from "fs";
import type { ResultStore } from "../artifacts/resultStore.js";
import { JobServiceError, errorMessage } from "../core/errors.js";
import type { JobId } from "../core/ids.js";
import { isExecutionErrorKind, type ExecutionErrorKind, type JobErrorDetail, type JobPatch, type JobRecord, type ResultRef } from "../core/job.js";
import { isTerminal } from "../core/jobState.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import { buildInterProScanInvocation, missingOutputs, stagedInputName } from "../execution/interproscan.js";
import type { BoundedRunResult } from "../execution/backends/types.js";
import type { ResourceGuard } from "../execution/resourceGuard.js";
import { WorkspaceReleaseError, type JobWorkspace, type WorkspaceManager } from "../execution/workspace.js";
import type { CompletionNotifier } from "../notify/notifier.js";
import type { JobRecordStore } from "../store/jobRecordStore.js";

export type AbortReason = "cancel" | "shutdown";

const STDERR_TAIL_CHARS = 4000;

function tail(text: string, max = STDERR_TAIL_CHARS): string | null {
  const trimmed = text.trimEnd();
  if (!trimmed) return null;
  return trimmed.length > max ? trimmed.slice(trimmed.length - max) : trimmed;
}

function toErrorDetail(e: unknown, fallback: ExecutionErrorKind): JobErrorDetail {
  if (e instanceof JobServiceError && isExecutionErrorKind(e.kind)) {
    return { kind: e.kind, message: e.message, exitCode: e.details.exitCode ?? null, stderrTail: e.details.stderrTail ?? null };
  }
  return { kind: fallback, message: errorMessage(e), exitCode: null, stderrTail: null };
}

export interface JobExecutorDeps {
  store: JobRecordStore;
  guard: ResourceGuard;
  workspaces: WorkspaceManager;
  results: ResultStore;
  notifier: CompletionNotifier;
  toolPath: string;
  disablePrecalc: boolean;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Drives one job from PENDING to a terminal state. Only the executor moves a
 * RUNNING job; cancel and shutdown reach it through the job's abort signal.
 */
export class JobExecutor {
  private readonly controllers = new Map<JobId, AbortController>();
  private readonly logger: Logger;

  constructor(private readonly deps: JobExecutorDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  private now(): string {
    return (this.deps.now?.() ?? new Date()).toISOString();
  }

  abort(jobId: JobId, reason: AbortReason): boolean {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    if (!controller.signal.aborted) controller.abort(reason);
    return true;
  }

  abortAll(reason: AbortReason): number {
    let n = 0;
    for (const jobId of this.controllers.keys()) {
      if (this.abort(jobId, reason)) n += 1;
    }
    return n;
  }

  async run(jobId: JobId): Promise<void> {
    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    try {
      const claimed = this.deps.store.compareAndUpdate(jobId, ["PENDING"], { state: "RUNNING", startedAt: this.now() });
      if (!claimed) {
        this.logger.debug("executor.skip", `job ${jobId} is no longer pending`, { job_id: jobId });
        return;
      }
      this.deps.store.addEvent(jobId, "job.started", "job claimed by executor", { priority: claimed.priority });

      const finished = await this.execute(claimed, controller.signal);
      this.deps.notifier.dispatch(finished);
    } finally {
      this.controllers.delete(jobId);
    }
  }

  private async execute(job: JobRecord, signal: AbortSignal): Promise<JobRecord> {
    const { jobId } = job;

    try {
      await this.deps.guard.validateSize(job.request.inputFile);
    } catch (e) {
      return this.fail(jobId, toErrorDetail(e, "InvalidRequest"));
    }
    if (signal.aborted) return this.finishAborted(jobId, signal.reason);

    let final: JobRecord;
    try {
      final = await this.deps.workspaces.withWorkspace(jobId, async (workspace) => {
        this.deps.store.update(jobId, { workspacePath: workspace.rootDir });
        return this.runInWorkspace(job, workspace, signal);
      });
    } catch (e) {
      const releaseError = e instanceof WorkspaceReleaseError ? e : null;
      if (releaseError) {
        this.deps.store.addEvent(jobId, "workspace.release_failed", releaseError.message, {
          workspace_path: releaseError.workspacePath
        });
        this.logger.warn("workspace.release_failed", releaseError.message, { job_id: jobId });
      }
      const current = this.deps.store.get(jobId);
      if (isTerminal(current.state)) {
        if (!releaseError) this.logger.warn("executor.run_failed", `job ${jobId} failed after finishing: ${errorMessage(e)}`, { job_id: jobId });
        final = current;
      } else {
        final = this.fail(jobId, toErrorDetail(releaseError?.runError ?? e, "WorkspaceError"));
      }
      // The directory is still on disk; the retention sweep retries it.
      if (releaseError) return final;
    }

    if (final.workspacePath !== null) {
      final = this.deps.store.update(jobId, { workspacePath: null });
    }
    return final;
  }

  private async runInWorkspace(job: JobRecord, workspace: JobWorkspace, signal: AbortSignal): Promise<JobRecord> {
    const { jobId, request } = job;
    const stagedPath = workspace.inPath(stagedInputName(request.inputFile));
    try {
      await fs.copyFile(request.inputFile, stagedPath);
    } catch (e) {
      return this.fail(jobId, { kind: "WorkspaceError", message: `failed to stage input: ${errorMessage(e)}`, exitCode: null, stderrTail: null });
    }
    if (signal.aborted) return this.finishAborted(jobId, signal.reason);

    const invocation = buildInterProScanInvocation({
      toolPath: this.deps.toolPath,
      disablePrecalc: this.deps.disablePrecalc,
      request,
      workspace,
      stagedInputPath: stagedPath
    });
    this.deps.store.addEvent(jobId, "tool.started", "InterProScan started", { argv: invocation.argv });

    let outcome: BoundedRunResult;
    try {
      outcome = await this.deps.guard.runBounded({ argv: invocation.argv, cwd: workspace.rootDir }, { signal });
    } catch (e) {
      return this.fail(jobId, {
        kind: "ToolExecutionFailed",
        message: `failed to start InterProScan: ${errorMessage(e)}`,
        exitCode: null,
        stderrTail: null
      });
    }

    if (outcome.kind === "aborted") {
      return this.finishAborted(jobId, outcome.reason);
    }
    if (outcome.kind === "timed_out") {
      return this.finish(jobId, {
        state: "TIMED_OUT",
        error: {
          kind: "TimeoutExceeded",
          message: `InterProScan exceeded the ${outcome.timeoutSeconds}s timeout`,
          exitCode: null,
          stderrTail: tail(outcome.stderr)
        }
      });
    }
    // A cancel observed once the tool has exited supersedes its outcome.
    if (this.cancelObserved(jobId, signal)) return this.finishAborted(jobId, signal.reason ?? "cancel");
    if (outcome.exitCode !== 0) {
      const how = outcome.exitCode === null ? `was terminated by ${outcome.signal ?? "a signal"}` : `exited with code ${outcome.exitCode}`;
      return this.fail(jobId, {
        kind: "ToolExecutionFailed",
        message: `InterProScan ${how}`,
        exitCode: outcome.exitCode,
        stderrTail: tail(outcome.stderr)
      });
    }

    const missing = await missingOutputs(invocation.declaredOutputs);
    if (this.cancelObserved(jobId, signal)) return this.finishAborted(jobId, signal.reason ?? "cancel");
    if (missing.length > 0) {
      return this.fail(jobId, {
        kind: "ToolExecutionFailed",
        message: `InterProScan produced no ${missing.join(", ")}`,
        exitCode: 0,
        stderrTail: tail(outcome.stderr)
      });
    }

    let resultRef: ResultRef;
    try {
      resultRef = await this.deps.results.collect(jobId, invocation.declaredOutputs);
    } catch (e) {
      return this.fail(jobId, { kind: "WorkspaceError", message: `failed to store results: ${errorMessage(e)}`, exitCode: null, stderrTail: null });
    }

    // A cancel that lands while results are copied still wins.
    if (this.cancelObserved(jobId, signal)) {
      await this.deps.results.remove(jobId);
      return this.finishAborted(jobId, signal.reason ?? "cancel");
    }

    return this.finish(jobId, { state: "COMPLETED", resultRef });
  }

  private cancelObserved(jobId: JobId, signal: AbortSignal): boolean {
    return signal.aborted || this.deps.store.get(jobId).cancelRequested;
  }

  private finishAborted(jobId: JobId, reason: unknown): JobRecord {
    if (reason === "shutdown") {
      return this.fail(jobId, { kind: "Interrupted", message: "job interrupted by gateway shutdown", exitCode: null, stderrTail: null });
    }
    return this.finish(jobId, { state: "CANCELLED" });
  }

  private fail(jobId: JobId, error: JobErrorDetail): JobRecord {
    return this.finish(jobId, { state: "FAILED", error });
  }

  private finish(jobId: JobId, patch: JobPatch & { state: JobRecord["state"] }): JobRecord {
    const finished = this.deps.store.update(jobId, { ...patch, finishedAt: this.now() });
    this.deps.store.addEvent(jobId, "job.finished", `job ${finished.state}`, {
      state: finished.state,
      error_kind: finished.error?.kind ?? null
    });
    return finished;
  }
}

import type { JobId } from "../core/ids.js";
import type { JobRecord, JobState } from "../core/job.js";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import type { JobRecordStore } from "../store/jobRecordStore.js";

export interface CompletionNotice {
  jobId: JobId;
  state: JobState;
  notificationEmail: string;
  inputFile: string;
  submittedAt: string;
  finishedAt: string | null;
  errorKind: string | null;
  errorMessage: string | null;
  resultFiles: string[];
}

export type SendOutcome = "sent" | "skipped";

export interface NotificationTransport {
  send(notice: CompletionNotice): Promise<SendOutcome>;
}

type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

/** POSTs the notice as JSON. Without a URL every notice is skipped. */
export class WebhookTransport implements NotificationTransport {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly opts: { url: string | null; timeoutSeconds: number; fetchImpl?: FetchLike; logger?: Logger }
  ) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async send(notice: CompletionNotice): Promise<SendOutcome> {
    if (!this.opts.url) {
      (this.opts.logger ?? silentLogger).info("notify.skipped", `no webhook URL set, skipping notification for ${notice.jobId}`, {
        job_id: notice.jobId
      });
      return "skipped";
    }

    const response = await this.fetchImpl(this.opts.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ event: "job.finished", ...notice }),
      signal: AbortSignal.timeout(this.opts.timeoutSeconds * 1000)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`webhook failed (${response.status}): ${text.slice(0, 500)}`);
    }
    return "sent";
  }
}

export function toCompletionNotice(job: JobRecord, email: string): CompletionNotice {
  return {
    jobId: job.jobId,
    state: job.state,
    notificationEmail: email,
    inputFile: job.request.inputFile,
    submittedAt: job.submittedAt,
    finishedAt: job.finishedAt,
    errorKind: job.error?.kind ?? null,
    errorMessage: job.error?.message ?? null,
    resultFiles: job.resultRef?.files.map((f) => f.name) ?? []
  };
}

/**
 * One attempt per finished job. Delivery runs in the background; a failure is
 * logged and recorded on the job and never changes its state.
 */
export class CompletionNotifier {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(
    private readonly deps: { transport: NotificationTransport; store: JobRecordStore; logger?: Logger }
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  dispatch(job: JobRecord): void {
    const email = job.request.notificationEmail;
    if (!email) return;

    const notice = toCompletionNotice(job, email);
    const task = this.deliver(notice).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  /** Resolves when every delivery dispatched so far has settled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async deliver(notice: CompletionNotice): Promise<void> {
    try {
      const outcome = await this.deps.transport.send(notice);
      if (outcome === "sent") {
        this.deps.store.addEvent(notice.jobId, "notify.sent", `notification sent for ${notice.state} job`);
      }
    } catch (e) {
      this.logger.warn("notify.failed", `notification for ${notice.jobId} failed: ${errorMessage(e)}`, { job_id: notice.jobId });
      if (this.deps.store.find(notice.jobId)) {
        this.deps.store.addEvent(notice.jobId, "notify.failed", errorMessage(e));
      }
    }
  }
}

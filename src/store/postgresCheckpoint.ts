import type { Kysely, Selectable } from "kysely";
import * as z from "zod/v4";
import { isJobId, type JobId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { EXECUTION_ERROR_KINDS, OUTPUT_FORMATS, type JobRecord } from "../core/job.js";
import { jobInvariantViolations } from "../core/jobState.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import type { DB, JobsTable } from "../db/types.js";
import type { JobCheckpoint } from "./jobRecordStore.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return new Date(value).toISOString();
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

// Drivers differ on whether JSONB arrives parsed or as text.
function jsonValue(value: unknown): unknown {
  return typeof value === "string" ? JSON.parse(value) : value;
}

const zJobId = z.custom<JobId>((v) => typeof v === "string" && isJobId(v), "invalid job id");
const zChecksum = z.custom<`sha256:${string}`>((v) => typeof v === "string" && v.startsWith("sha256:"), "invalid checksum");
const zOutputFormat = z.enum(OUTPUT_FORMATS);

const zJobRequest = z.object({
  inputFile: z.string(),
  databases: z.array(z.string()),
  outputFormats: z.array(zOutputFormat),
  goterms: z.boolean(),
  pathways: z.boolean(),
  notificationEmail: z.string().nullable(),
  tags: z.array(z.string())
});

const zResultRef = z.object({
  resultDir: z.string(),
  files: z.array(
    z.object({
      name: z.string(),
      format: zOutputFormat,
      path: z.string(),
      sizeBytes: z.number().int().nonnegative(),
      checksumSha256: zChecksum
    })
  )
});

const zJobError = z.object({
  kind: z.enum(EXECUTION_ERROR_KINDS),
  message: z.string(),
  exitCode: z.number().int().nullable(),
  stderrTail: z.string().nullable()
});

const zState = z.enum(["PENDING", "RUNNING", "COMPLETED", "FAILED", "TIMED_OUT", "CANCELLED"]);

function rowToJob(row: Selectable<JobsTable>): JobRecord {
  return {
    jobId: zJobId.parse(row.job_id),
    state: zState.parse(row.state),
    priority: row.priority,
    submittedAt: toIso(row.submitted_at),
    startedAt: toIsoOrNull(row.started_at),
    finishedAt: toIsoOrNull(row.finished_at),
    request: zJobRequest.parse(jsonValue(row.request)),
    inputSizeBytes: Number(row.input_size_bytes),
    workspacePath: row.workspace_path,
    resultRef: row.result_ref === null ? null : zResultRef.parse(jsonValue(row.result_ref)),
    error: row.error === null ? null : zJobError.parse(jsonValue(row.error)),
    cancelRequested: row.cancel_requested
  };
}

/** Mirrors job records and their event log into Postgres so a restart can resume. */
export class PostgresJobCheckpoint implements JobCheckpoint {
  private readonly logger: Logger;

  constructor(
    private readonly db: Kysely<DB>,
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  async saveJob(job: JobRecord): Promise<void> {
    const values = {
      state: job.state,
      priority: job.priority,
      submitted_at: job.submittedAt,
      started_at: job.startedAt,
      finished_at: job.finishedAt,
      request: JSON.stringify(job.request),
      input_size_bytes: job.inputSizeBytes,
      workspace_path: job.workspacePath,
      result_ref: job.resultRef === null ? null : JSON.stringify(job.resultRef),
      error: job.error === null ? null : JSON.stringify(job.error),
      cancel_requested: job.cancelRequested
    };

    await this.db
      .insertInto("jobs")
      .values({ job_id: job.jobId, ...values })
      .onConflict((oc) => oc.column("job_id").doUpdateSet({ ...values, updated_at: new Date().toISOString() }))
      .execute();
  }

  async deleteJob(jobId: JobId): Promise<void> {
    await this.db.deleteFrom("job_events").where("job_id", "=", jobId).execute();
    await this.db.deleteFrom("jobs").where("job_id", "=", jobId).execute();
  }

  async addJobEvent(jobId: JobId, kind: string, message: string, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("job_events")
      .values({ job_id: jobId, kind, message, data: data === null ? null : JSON.stringify(data) })
      .execute();
  }

  async listJobEvents(jobId: JobId): Promise<Array<{ ts: string; kind: string; message: string | null; data: unknown }>> {
    const rows = await this.db
      .selectFrom("job_events")
      .select(["ts", "kind", "message", "data"])
      .where("job_id", "=", jobId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      ts: toIso(r.ts),
      kind: r.kind,
      message: r.message,
      data: r.data === null ? null : jsonValue(r.data)
    }));
  }

  /** Rows that fail validation are logged and left out. */
  async loadJobs(): Promise<JobRecord[]> {
    const rows = await this.db.selectFrom("jobs").selectAll().orderBy("submitted_at", "asc").execute();
    const jobs: JobRecord[] = [];
    for (const row of rows) {
      let job: JobRecord;
      try {
        job = rowToJob(row);
      } catch (e) {
        this.logger.warn("checkpoint.row_invalid", `skipping job row ${row.job_id}`, {
          job_id: row.job_id,
          error: e instanceof z.ZodError ? z.prettifyError(e) : String(e)
        });
        continue;
      }
      const problems = jobInvariantViolations(job);
      if (problems.length > 0) {
        this.logger.warn("checkpoint.row_invalid", `skipping job row ${row.job_id}`, { job_id: row.job_id, error: problems.join("; ") });
        continue;
      }
      jobs.push(job);
    }
    return jobs;
  }
}

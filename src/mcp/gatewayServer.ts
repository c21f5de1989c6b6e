import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type * as z from "zod/v4";
import { JobServiceError } from "../core/errors.js";
import type { JobErrorDetail, JobSummary, ResultRef } from "../core/job.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import type { JobService, JobStatus } from "../service/jobService.js";
import {
  zCancelJobOutput,
  zInterproRunAsyncInput,
  zInterproRunAsyncOutput,
  zJobIdInput,
  zJobResultInput,
  zJobResultOutput,
  zJobStatusOutput,
  zListJobsInput,
  zListJobsOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  service: JobService;
  logger?: Logger;
}

export const GATEWAY_NAME = "interproscan-job-gateway";
export const GATEWAY_VERSION = "0.1.0";

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function toErrorOut(error: JobErrorDetail | null): z.infer<typeof zJobStatusOutput>["error"] {
  if (!error) return null;
  return { kind: error.kind, message: error.message, exit_code: error.exitCode, stderr_tail: error.stderrTail };
}

function toStatusOut(s: JobStatus): z.infer<typeof zJobStatusOutput> {
  return {
    job_id: s.jobId,
    state: s.state,
    priority: s.priority,
    submitted_at: s.submittedAt,
    started_at: s.startedAt,
    finished_at: s.finishedAt,
    cancel_requested: s.cancelRequested,
    tags: s.tags,
    error: toErrorOut(s.error),
    progress: {
      queue_position: s.progress.queuePosition,
      elapsed_seconds: s.progress.elapsedSeconds,
      timeout_seconds: s.progress.timeoutSeconds,
      message: s.progress.message
    }
  };
}

function toSummaryOut(j: JobSummary): z.infer<typeof zListJobsOutput>["jobs"][number] {
  return {
    job_id: j.jobId,
    state: j.state,
    priority: j.priority,
    submitted_at: j.submittedAt,
    started_at: j.startedAt,
    finished_at: j.finishedAt,
    input_file: j.inputFile,
    tags: j.tags
  };
}

function toFilesOut(ref: ResultRef): z.infer<typeof zJobResultOutput>["files"] {
  return ref.files.map((f) => ({
    name: f.name,
    format: f.format,
    path: f.path,
    size_bytes: f.sizeBytes,
    checksum_sha256: f.checksumSha256
  }));
}

/** Service errors become tool results so the caller sees the kind; anything else propagates. */
function serviceErrorResult(e: unknown, logger: Logger, toolName: string): CallToolResult {
  if (!(e instanceof JobServiceError)) throw e;
  logger.info("tool.rejected", `${toolName}: ${e.kind}`, { tool: toolName, kind: e.kind });
  const lines = [`${e.kind}: ${e.message}`];
  if (e.details.exitCode !== undefined && e.details.exitCode !== null) lines.push(`exit code: ${e.details.exitCode}`);
  if (e.details.stderrTail) lines.push(`stderr (tail):\n${e.details.stderrTail}`);
  return { content: [{ type: "text", text: lines.join("\n") }], isError: true };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const logger = deps.logger ?? silentLogger;
  const { service } = deps;

  const mcp = new McpServer({
    name: GATEWAY_NAME,
    version: GATEWAY_VERSION
  });

  mcp.registerTool(
    "interpro_run_async",
    {
      description:
        "Submit an InterProScan protein domain/family scan as a background job. Returns a job_id immediately; " +
        "scans typically take 30 minutes to several hours. Poll get_job_status, then call get_job_result.",
      inputSchema: zInterproRunAsyncInput,
      outputSchema: zInterproRunAsyncOutput
    },
    async (args) => {
      try {
        const receipt = await service.submit({
          inputFile: args.input_file,
          databases: splitList(args.databases),
          outputFormats: splitList(args.output_format),
          goterms: args.goterms,
          pathways: args.pathways,
          priority: args.priority,
          tags: args.tags,
          notificationEmail: args.notification_email ?? null
        });

        const structured: z.infer<typeof zInterproRunAsyncOutput> = {
          job_id: receipt.jobId,
          state: receipt.state,
          priority: receipt.priority,
          submitted_at: receipt.submittedAt,
          queue_position: receipt.queuePosition
        };
        const position = receipt.queuePosition === null ? "" : ` (queue position ${receipt.queuePosition})`;
        return {
          content: [
            {
              type: "text",
              text:
                `InterProScan job submitted: ${receipt.jobId}${position}\n` +
                `Use get_job_status with this job_id to check progress.`
            }
          ],
          structuredContent: structured
        };
      } catch (e) {
        return serviceErrorResult(e, logger, "interpro_run_async");
      }
    }
  );

  mcp.registerTool(
    "get_job_status",
    {
      description: "Get the state and progress of a submitted job.",
      inputSchema: zJobIdInput,
      outputSchema: zJobStatusOutput
    },
    async (args) => {
      try {
        const status = service.status(args.job_id);
        return {
          content: [{ type: "text", text: `${status.jobId}: ${status.state} (${status.progress.message})` }],
          structuredContent: toStatusOut(status)
        };
      } catch (e) {
        return serviceErrorResult(e, logger, "get_job_status");
      }
    }
  );

  mcp.registerTool(
    "get_job_result",
    {
      description:
        "Get the result files of a completed job, optionally with a text preview. Fails with ResultNotReady while the job is queued or running.",
      inputSchema: zJobResultInput,
      outputSchema: zJobResultOutput
    },
    async (args) => {
      try {
        const ref = service.result(args.job_id);
        const preview =
          args.preview_bytes > 0
            ? await service.preview(args.job_id, { fileName: args.file, maxBytes: args.preview_bytes, maxLines: args.preview_lines })
            : null;

        const structured: z.infer<typeof zJobResultOutput> = {
          job_id: args.job_id,
          result_dir: ref.resultDir,
          files: toFilesOut(ref),
          preview: preview ? { file: preview.fileName, text: preview.preview, truncated: preview.truncated } : null
        };
        const listing = ref.files.map((f) => `- ${f.name} (${f.sizeBytes} bytes)`).join("\n");
        return {
          content: [{ type: "text", text: `Results for ${args.job_id} in ${ref.resultDir}:\n${listing}` }],
          structuredContent: structured
        };
      } catch (e) {
        return serviceErrorResult(e, logger, "get_job_result");
      }
    }
  );

  mcp.registerTool(
    "list_my_jobs",
    {
      description: "List recent jobs, newest first. Filter by state or tag.",
      inputSchema: zListJobsInput,
      outputSchema: zListJobsOutput
    },
    async (args) => {
      const jobs = service.list({
        state: args.state,
        tags: args.tag ? [args.tag] : undefined,
        limit: args.limit
      });
      const structured: z.infer<typeof zListJobsOutput> = { count: jobs.length, jobs: jobs.map(toSummaryOut) };
      const text = jobs.length === 0 ? "No jobs found." : jobs.map((j) => `${j.jobId}  ${j.state}  p${j.priority}  ${j.submittedAt}`).join("\n");
      return {
        content: [{ type: "text", text }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "cancel_job",
    {
      description: "Cancel a queued or running job. Cancelling a finished job is a no-op.",
      inputSchema: zJobIdInput,
      outputSchema: zCancelJobOutput
    },
    async (args) => {
      try {
        const ack = service.cancel(args.job_id);
        const structured: z.infer<typeof zCancelJobOutput> = {
          job_id: ack.jobId,
          state: ack.state,
          cancel_requested: ack.cancelRequested,
          already_terminal: ack.alreadyTerminal
        };
        const text = ack.alreadyTerminal
          ? `Job ${ack.jobId} already finished (${ack.state}); nothing to cancel.`
          : ack.state === "CANCELLED"
            ? `Job ${ack.jobId} cancelled.`
            : `Cancellation requested for running job ${ack.jobId}.`;
        return {
          content: [{ type: "text", text }],
          structuredContent: structured
        };
      } catch (e) {
        return serviceErrorResult(e, logger, "cancel_job");
      }
    }
  );

  return mcp;
}

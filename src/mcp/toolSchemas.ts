import * as z from "zod/v4";
import { EXECUTION_ERROR_KINDS, OUTPUT_FORMATS } from "../core/job.js";

export const zJobState = z.enum(["PENDING", "RUNNING", "COMPLETED", "FAILED", "TIMED_OUT", "CANCELLED"]);
export const zJobIdArg = z.string().min(1).max(128);

export const zJobError = z.object({
  kind: z.enum(EXECUTION_ERROR_KINDS),
  message: z.string(),
  exit_code: z.number().int().nullable(),
  stderr_tail: z.string().nullable()
});

export const zInterproRunAsyncInput = z.object({
  input_file: z.string().min(1).describe("Path to a protein FASTA file readable by the gateway"),
  databases: z.string().optional().describe("Comma-separated member databases (e.g. Pfam,PANTHER); all when omitted"),
  output_format: z.string().default("tsv").describe(`Comma-separated output formats (${OUTPUT_FORMATS.join(", ")})`),
  goterms: z.boolean().default(true).describe("Include GO term annotations"),
  pathways: z.boolean().default(true).describe("Include pathway annotations"),
  priority: z.number().optional().describe("Integer 1-10, higher runs first (default 5)"),
  tags: z.array(z.string()).optional().describe("Labels for list_my_jobs filtering"),
  notification_email: z.string().optional().describe("Address notified when the job finishes")
});

export const zInterproRunAsyncOutput = z.object({
  job_id: z.string(),
  state: zJobState,
  priority: z.number().int(),
  submitted_at: z.string(),
  queue_position: z.number().int().nullable()
});

export const zJobIdInput = z.object({
  job_id: zJobIdArg
});

export const zJobStatusOutput = z.object({
  job_id: z.string(),
  state: zJobState,
  priority: z.number().int(),
  submitted_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  cancel_requested: z.boolean(),
  tags: z.array(z.string()),
  error: zJobError.nullable(),
  progress: z.object({
    queue_position: z.number().int().nullable(),
    elapsed_seconds: z.number().nullable(),
    timeout_seconds: z.number().nullable(),
    message: z.string()
  })
});

export const zJobResultInput = z.object({
  job_id: zJobIdArg,
  file: z.string().min(1).optional().describe("Result file to preview; the first file when omitted"),
  preview_bytes: z.number().int().min(0).max(1048576).default(0).describe("Bytes of text preview to include (0 = none)"),
  preview_lines: z.number().int().min(1).max(10000).default(50)
});

export const zResultFile = z.object({
  name: z.string(),
  format: z.enum(OUTPUT_FORMATS),
  path: z.string(),
  size_bytes: z.number().int(),
  checksum_sha256: z.string()
});

export const zJobResultOutput = z.object({
  job_id: z.string(),
  result_dir: z.string(),
  files: z.array(zResultFile),
  preview: z
    .object({
      file: z.string(),
      text: z.string(),
      truncated: z.boolean()
    })
    .nullable()
});

export const zListJobsInput = z.object({
  state: zJobState.optional(),
  tag: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(500).optional()
});

export const zJobSummary = z.object({
  job_id: z.string(),
  state: zJobState,
  priority: z.number().int(),
  submitted_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  input_file: z.string(),
  tags: z.array(z.string())
});

export const zListJobsOutput = z.object({
  count: z.number().int(),
  jobs: z.array(zJobSummary)
});

export const zCancelJobOutput = z.object({
  job_id: z.string(),
  state: zJobState,
  cancel_requested: z.boolean(),
  already_terminal: z.boolean()
});

import type { JobId } from "./ids.js";

export type JobState = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "TIMED_OUT" | "CANCELLED";

export type OutputFormat = "tsv" | "xml" | "json" | "gff3";

export const OUTPUT_FORMATS = ["tsv", "xml", "json", "gff3"] as const satisfies readonly OutputFormat[];

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;
export const DEFAULT_PRIORITY = 5;

export type JobRequest = {
  inputFile: string;
  databases: string[];
  outputFormats: OutputFormat[];
  goterms: boolean;
  pathways: boolean;
  notificationEmail: string | null;
  tags: string[];
};

// Kinds recorded on a job; caller-facing kinds live in errors.ts.
export const EXECUTION_ERROR_KINDS = [
  "TimeoutExceeded",
  "ToolExecutionFailed",
  "WorkspaceError",
  "SizeLimitExceeded",
  "InvalidRequest",
  "Interrupted"
] as const;

export type ExecutionErrorKind = (typeof EXECUTION_ERROR_KINDS)[number];

export function isExecutionErrorKind(value: string): value is ExecutionErrorKind {
  return EXECUTION_ERROR_KINDS.some((k) => k === value);
}

export type JobErrorDetail = {
  kind: ExecutionErrorKind;
  message: string;
  exitCode: number | null;
  stderrTail: string | null;
};

export type ResultFile = {
  name: string;
  format: OutputFormat;
  path: string;
  sizeBytes: number;
  checksumSha256: `sha256:${string}`;
};

export type ResultRef = {
  resultDir: string;
  files: ResultFile[];
};

export interface JobRecord {
  readonly jobId: JobId;
  readonly state: JobState;
  readonly priority: number;
  readonly submittedAt: string;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
  readonly request: Readonly<JobRequest>;
  readonly inputSizeBytes: number;
  readonly workspacePath: string | null;
  readonly resultRef: ResultRef | null;
  readonly error: JobErrorDetail | null;
  readonly cancelRequested: boolean;
}

export type JobPatch = Partial<
  Pick<JobRecord, "state" | "startedAt" | "finishedAt" | "workspacePath" | "resultRef" | "error" | "cancelRequested">
>;

export interface JobSummary {
  jobId: JobId;
  state: JobState;
  priority: number;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  inputFile: string;
  tags: string[];
}

export function toJobSummary(job: JobRecord): JobSummary {
  return {
    jobId: job.jobId,
    state: job.state,
    priority: job.priority,
    submittedAt: job.submittedAt,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt,
    inputFile: job.request.inputFile,
    tags: [...job.request.tags]
  };
}

import type { ExecutionErrorKind } from "./job.js";

export type JobServiceErrorKind =
  | ExecutionErrorKind
  | "InvalidPriority"
  | "QueueFull"
  | "JobNotFound"
  | "ResultNotReady"
  | "Cancelled";

export class JobServiceError extends Error {
  constructor(
    readonly kind: JobServiceErrorKind,
    message: string,
    readonly details: { exitCode?: number | null; stderrTail?: string | null } = {}
  ) {
    super(message);
    this.name = "JobServiceError";
  }
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}

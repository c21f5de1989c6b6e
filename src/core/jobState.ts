import type { JobRecord, JobState } from "./job.js";

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  PENDING: ["RUNNING", "CANCELLED"],
  RUNNING: ["COMPLETED", "FAILED", "TIMED_OUT", "CANCELLED"],
  COMPLETED: [],
  FAILED: [],
  TIMED_OUT: [],
  CANCELLED: []
};

const TERMINAL = new Set<JobState>(["COMPLETED", "FAILED", "TIMED_OUT", "CANCELLED"]);

export function isTerminal(state: JobState): boolean {
  return TERMINAL.has(state);
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Checks the cross-field invariants of a record. Returns a list of violations;
 * an empty list means the record is consistent.
 */
export function jobInvariantViolations(job: JobRecord): string[] {
  const problems: string[] = [];
  const terminal = isTerminal(job.state);

  if ((job.resultRef !== null) !== (job.state === "COMPLETED")) {
    problems.push(`resultRef must be set iff state is COMPLETED (state=${job.state})`);
  }

  const errorExpected = job.state === "FAILED" || job.state === "TIMED_OUT";
  if ((job.error !== null) !== errorExpected) {
    problems.push(`error must be set iff state is FAILED or TIMED_OUT (state=${job.state})`);
  }

  if ((job.finishedAt !== null) !== terminal) {
    problems.push(`finishedAt must be set iff state is terminal (state=${job.state})`);
  }

  const mustHaveStarted = job.state !== "PENDING" && job.state !== "CANCELLED";
  if (mustHaveStarted && job.startedAt === null) {
    problems.push(`startedAt must be set for state ${job.state}`);
  }
  if (job.state === "PENDING" && job.startedAt !== null) {
    problems.push("startedAt must be null while PENDING");
  }

  if (!Number.isInteger(job.priority) || job.priority < 1 || job.priority > 10) {
    problems.push(`priority out of range: ${job.priority}`);
  }

  return problems;
}
